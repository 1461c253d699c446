import { describe, it, expect } from "vitest";
import { describeSnapshot, maskCredential, withApiVersion } from "./snapshot.js";
import { loadConfig } from "./load-config.js";

const config = loadConfig({
  BACKUP_API_URL: "https://master.test:1556/netbackup",
  BACKUP_API_KEY: "abcdefghijklmnopwxyz",
});

describe("maskCredential", () => {
  it("keeps the first and last four characters", () => {
    expect(maskCredential("abcdefghijklmnopwxyz")).toBe("abcd****wxyz");
    expect(maskCredential("123456789")).toBe("1234****6789");
  });

  it("hides short credentials completely", () => {
    expect(maskCredential("12345678")).toBe("****");
    expect(maskCredential("short")).toBe("****");
  });
});

describe("withApiVersion", () => {
  it("returns a new frozen snapshot and leaves the original alone", () => {
    const negotiated = withApiVersion(config, "12.0");

    expect(negotiated.apiVersion).toBe("12.0");
    expect(config.apiVersion).toBeNull();
    expect(negotiated).not.toBe(config);
    expect(Object.isFrozen(negotiated)).toBe(true);
    expect(negotiated.timeouts).toBe(config.timeouts);
  });
});

describe("describeSnapshot", () => {
  it("masks the credential", () => {
    expect(describeSnapshot(config)).toMatchObject({
      credentialMask: "abcd****wxyz",
      apiVersion: "auto",
    });
  });
});

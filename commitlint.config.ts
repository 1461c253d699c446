export default {
  extends: ["@commitlint/config-conventional"],
  rules: {
    // Allow these scopes matching project structure
    "scope-enum": [
      2,
      "always",
      [
        "shared",
        "exporter",
        "client",
        "collector",
        "config",
        "metrics",
        "deps",
        "ci",
      ],
    ],
    "scope-empty": [0], // scope is optional
  },
};

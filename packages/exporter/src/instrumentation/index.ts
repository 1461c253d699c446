export { noopInstrumentation } from "./instrumentation.js";
export type {
  Attributes,
  AttributeValue,
  Instrumentation,
  OperationName,
  OperationSpan,
} from "./instrumentation.js";
export { OtelInstrumentation, TRACER_NAME } from "./otel-instrumentation.js";
export type { OtelInstrumentationOptions } from "./otel-instrumentation.js";
export { SERVICE_VERSION, createSampler, exporterUrl, startTracing } from "./otel-sdk.js";
export type { StartTracingOptions } from "./otel-sdk.js";

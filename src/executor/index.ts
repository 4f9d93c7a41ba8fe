export { RestRequestExecutor } from "./rest-request-executor.js";
export { RestRequestExecutorBuilder } from "./builder.js";
export type { ExecuteOptions, ExecutionResult, ExecutorConfig, StopReason } from "./types.js";

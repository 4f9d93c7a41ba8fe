export { RequestTracer } from "./request-tracer.js";
export type { StampOptions } from "./types.js";

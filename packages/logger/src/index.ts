import pino from "pino";

export { createNodeLogger, flushLogger, withRunContext } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

export { pino };
export type { Logger } from "pino";

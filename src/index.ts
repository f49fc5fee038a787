export * from "./errors.js";
export { createLogger, silentLogger, type Logger } from "./logging.js";
export * from "./integrity/index.js";
export * from "./codec/index.js";
export * from "./store/index.js";
export * from "./contracts/index.js";
export * from "./pipeline/index.js";

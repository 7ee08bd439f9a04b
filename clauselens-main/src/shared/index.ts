export { devDebug, devLog, devWarn, devError, currentLogLevel } from "./debug-log.js";
export type { LogLevel } from "./debug-log.js";

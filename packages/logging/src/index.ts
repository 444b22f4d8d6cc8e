/**
 * @clinic-relay/logging: structured JSON logging.
 */

export { Logger, rootLogger, parseLogLevel, type LogLevel } from "./logger.js";

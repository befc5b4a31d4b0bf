export { LoggerImpl, formatLogLine } from "./logger-impl.js";
export { LOG_LEVELS, getCurrentLevel, isLogLevel, setLogLevel, type LogLevel } from "./log-level.js";

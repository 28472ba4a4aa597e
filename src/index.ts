export * from "./server/feed";
export { buildUserAgent, type UserAgentOptions } from "./server/http/user-agent";
export { createLogger, logger, type Logger, type LogLevel, type LogContext } from "./lib/logger";

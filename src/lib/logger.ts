export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogConfig = {
  level: LogLevel;
  enabled: string[];
  disabled: string[];
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);

const parseList = (value?: string) => {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
};

const readConfig = (): LogConfig => {
  const level = process.env.NEXT_PUBLIC_LOG_LEVEL ?? process.env.LOG_LEVEL;
  return {
    level: isLogLevel(level) ? level : "info",
    enabled: parseList(process.env.LOG_ENABLED),
    disabled: parseList(process.env.LOG_DISABLED)
  };
};

let config: LogConfig = readConfig();

export const configureLogger = (next: Partial<LogConfig>) => {
  config = { ...config, ...next };
};

export const resetLoggerConfig = () => {
  config = readConfig();
};

// "Delta" matches "Delta" and "Delta:tickers".
const tagMatches = (tag: string, pattern: string) =>
  tag === pattern || tag.startsWith(`${pattern}:`);

const shouldLog = (tag: string, level: LogLevel) => {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[config.level]) return false;
  if (config.disabled.some((pattern) => tagMatches(tag, pattern))) return false;
  if (config.enabled.length > 0) {
    return config.enabled.some((pattern) => tagMatches(tag, pattern));
  }
  return true;
};

const write = (level: LogLevel, tag: string, message: string, args: unknown[]) => {
  if (!shouldLog(tag, level)) return;
  const formatted = `[${tag}] ${message}`;
  switch (level) {
    case "warn":
      console.warn(formatted, ...args);
      break;
    case "error":
      console.error(formatted, ...args);
      break;
    default:
      console.log(formatted, ...args);
  }
};

export const debug = (tag: string, message: string, ...args: unknown[]) =>
  write("debug", tag, message, args);
export const log = (tag: string, message: string, ...args: unknown[]) =>
  write("info", tag, message, args);
export const warn = (tag: string, message: string, ...args: unknown[]) =>
  write("warn", tag, message, args);
export const error = (tag: string, message: string, ...args: unknown[]) =>
  write("error", tag, message, args);

export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
  log: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
};

export const createLogger = (tag: string): Logger => ({
  debug: (message, ...args) => debug(tag, message, ...args),
  log: (message, ...args) => log(tag, message, ...args),
  warn: (message, ...args) => warn(tag, message, ...args),
  error: (message, ...args) => error(tag, message, ...args)
});

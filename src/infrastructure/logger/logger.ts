import pino from "pino";
import { LogData, Logger, LogLevel } from "./types";

type LogArgs = [LogData] | [Partial<LogData>, string] | [string];

const SERVICE_NAME = "nowpayments-client";
const nodeEnv = process.env.NODE_ENV;
const isProduction = nodeEnv === "production";
const isTest = nodeEnv === "test";

const defaultLevel = (): string => {
  if (isProduction) return "info";
  if (isTest) return "silent";
  return "debug";
};

// pino-pretty roda em worker thread; só em desenvolvimento
const transport =
  isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          messageFormat: "{type} {msg}",
          customColors: "info:blue,warn:yellow,error:red,debug:magenta",
          levelFirst: true,
        },
      };

const pinoLogger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  base: {
    service: SERVICE_NAME,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

const normalizeLogInput = (args: LogArgs): LogData => {
  if (args.length === 2) {
    const [partial, message] = args;
    return {
      ...partial,
      type: partial.type ?? "HTTP_LOG",
      message,
    };
  }

  const [first] = args;
  if (typeof first === "string") {
    return { type: "GENERAL", message: first };
  }

  return {
    ...first,
    type: first.type ?? "GENERAL",
    message: first.message ?? "Log",
  };
};

const formatLogData = ({ message, error, type, payload, ...context }: LogData) => ({
  ...context,
  msg: message,
  type: `[${type ?? "GENERAL"}]`,
  payload,
  err: error,
});

const logWithLevel = (level: LogLevel, args: LogArgs): void => {
  const structured = normalizeLogInput(args);
  pinoLogger[level](formatLogData(structured));
};

const AppLogger: Logger = {
  debug: (...args: LogArgs) => logWithLevel("debug", args),
  info: (...args: LogArgs) => logWithLevel("info", args),
  warn: (...args: LogArgs) => logWithLevel("warn", args),
  error: (...args: LogArgs) => logWithLevel("error", args),
};

export default (): Logger => AppLogger;
export { pinoLogger };

import pino from "pino";

const level =
  process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info");

const logger = pino({
  level,
  base: { service: "condition-kb" },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env.LOG_PRETTY === "true"
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard" },
        },
      }
    : {}),
});

export type Logger = typeof logger;

export default logger;

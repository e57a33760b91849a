import pino from "pino";

type LogContext = Record<string, unknown>;

const base = pino({
  level: process.env.LOG_LEVEL || "info",
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

export const logger = {
  debug(message: string, context: LogContext = {}) {
    base.debug(context, message);
  },
  info(message: string, context: LogContext = {}) {
    base.info(context, message);
  },
  warn(message: string, context: LogContext = {}) {
    base.warn(context, message);
  },
  error(message: string, context: LogContext = {}) {
    base.error(context, message);
  },
};

export default logger;

import { pino, type Logger as PinoLogger } from "pino";
import type { Logger } from "../types/logger.js";

const REDACTED_FIELDS = [
  "clientSecret",
  "client_secret",
  "clientAssertion",
  "client_assertion",
  "accessToken",
  "access_token",
];

function createPinoAdapter(pinoLogger: PinoLogger): Logger {
  return {
    debug: (message: string, context?: Record<string, unknown>) =>
      pinoLogger.debug(context, message),
    info: (message: string, context?: Record<string, unknown>) =>
      pinoLogger.info(context, message),
    warn: (message: string, context?: Record<string, unknown>) =>
      pinoLogger.warn(context, message),
    error: (message: string, context?: Record<string, unknown>) =>
      pinoLogger.error(context, message),
    child: (context: Record<string, unknown>) =>
      createPinoAdapter(pinoLogger.child(context)),
  };
}

let rootLogger: Logger | undefined;

function initializeLogger(): Logger {
  const pinoLogger = pino({
    level: process.env.LOG_LEVEL || "info",
    redact: { paths: REDACTED_FIELDS, censor: "[redacted]" },
    ...(process.env.NODE_ENV === "development" && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    }),
  });

  return createPinoAdapter(pinoLogger);
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = initializeLogger();
  }
  return rootLogger;
}

export function getLogger(
  component?: string,
  bindings?: Record<string, unknown>,
): Logger {
  const logger = getRootLogger();
  if (!component && !bindings) {
    return logger;
  }
  return (
    logger.child?.({ ...(component ? { component } : {}), ...bindings }) ||
    logger
  );
}

export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

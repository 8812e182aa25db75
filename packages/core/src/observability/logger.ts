import pino from "pino";

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  redact?: string[];
}

export type Logger = pino.Logger;

function createBaseLogger(config: LoggerConfig = {}) {
  const {
    level = process.env.LOG_LEVEL || "info",
    pretty = process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development",
    redact = [
      "password",
      "secret",
      "authorization",
      "cookie",
      "credentials",
      "*.credentials",
      "private_key",
      "*.private_key",
      "apiSecret",
      "*.apiSecret",
    ],
  } = config;

  const transport = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      })
    : undefined;

  return pino(
    {
      level,
      redact,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    transport,
  );
}

export let logger = createBaseLogger();

/** Rebuilds the root logger from loaded config; child loggers created afterwards inherit it. */
export function configureLogger(config: LoggerConfig) {
  logger = createBaseLogger(config);
  return logger;
}

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function createRequestLogger() {
  return createChildLogger({ component: "http" });
}

export function createStorageLogger(kind?: string) {
  return createChildLogger({ component: "storage", kind });
}

export function createCaptureLogger() {
  return createChildLogger({ component: "capture" });
}

export function createLinkLogger() {
  return createChildLogger({ component: "links" });
}

export function createConfigLogger() {
  return createChildLogger({ component: "provider-config" });
}

export function createDatabaseLogger() {
  return createChildLogger({ component: "database" });
}

// Log-safe link reference: the full token is a bearer capability.
export function tokenRef(token: string): string {
  return token.length > 6 ? `${token.slice(0, 6)}…` : token;
}

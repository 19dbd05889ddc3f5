import { pino, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggingOptions {
  level?: string;
  /** Pipe output through pino-pretty. */
  pretty?: boolean;
}

let logger: Logger | undefined;

function createLogger(options: LoggingOptions): Logger {
  const level = options.level ?? process.env["LLM_GATEWAY_LOG_LEVEL"] ?? "info";
  if (options.pretty) {
    return pino({
      name: "llm-gateway",
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino({ name: "llm-gateway", level });
}

/** Root logger, created on first use. */
export function getLogger(): Logger {
  if (!logger) {
    logger = createLogger({});
  }
  return logger;
}

export function setLogger(next: Logger): void {
  logger = next;
}

/** Replace the root logger according to configuration. */
export function configureLogging(options: LoggingOptions): Logger {
  logger = createLogger(options);
  return logger;
}

/** Child logger bound to a component name. */
export function componentLogger(
  component: string,
  bindings?: Record<string, unknown>,
): Logger {
  return getLogger().child({ component, ...bindings });
}

import pino from "pino";
import pretty from "pino-pretty";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  json(data: unknown): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  debug?: boolean;
}

function resolveLevel(options?: LoggerOptions): LogLevel {
  const { verbose = false, quiet = false, debug = false } = options ?? {};
  if (debug || verbose) {
    return "debug";
  }
  return quiet ? "error" : "info";
}

function createPinoLogger(options?: LoggerOptions): pino.Logger {
  const level = resolveLevel(options);

  // Raw ndjson for --debug, pretty single lines otherwise
  if (options?.debug) {
    return pino({
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  const stream = pretty({
    colorize: !(options?.noColor ?? false),
    ignore: "pid,hostname,time,level",
    messageFormat: (log, messageKey) => {
      const msg = String(log[messageKey]);
      if (log.level === 30) return msg;
      const levelLabel =
        log.level === 40 ? "WARN" : log.level === 50 ? "ERROR" : "DEBUG";
      return `${levelLabel}: ${msg}`;
    },
    singleLine: true,
  });

  return pino({ level }, stream);
}

function createFallbackLogger(options?: LoggerOptions): pino.Logger {
  return pino({
    level: resolveLevel(options),
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createLogger(options?: LoggerOptions): Logger {
  let pinoLogger: pino.Logger;

  try {
    pinoLogger = createPinoLogger(options);
  } catch {
    pinoLogger = createFallbackLogger(options);
  }

  const emit = (
    level: LogLevel,
    message: string,
    args: unknown[],
  ): void => {
    if (args.length > 0) {
      pinoLogger[level]({ args }, message);
    } else {
      pinoLogger[level](message);
    }
  };

  return {
    debug(message: string, ...args: unknown[]): void {
      emit("debug", message, args);
    },
    info(message: string, ...args: unknown[]): void {
      emit("info", message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      emit("warn", message, args);
    },
    error(message: string, ...args: unknown[]): void {
      emit("error", message, args);
    },
    json(data: unknown): void {
      console.log(JSON.stringify(data));
    },
  };
}

export let logger: Logger = createLogger();

export function setLogger(l: Logger): void {
  logger = l;
}

export function initLogger(options?: LoggerOptions): Logger {
  const l = createLogger(options);
  setLogger(l);
  return l;
}

/**
 * @fileoverview Sistema de logging centralizado del motor (electron-log, entrada Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child), formato de objetos y operaciones cronometradas.
 * Los niveles por transporte salen de config.logging; 'off' deshabilita el transporte.
 */

import log from 'electron-log/node';
import config from '../config';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

type LevelOption = import('electron-log').LevelOption;

export interface ConfigureLoggerOptions {
  fileLevel?: string;
  consoleLevel?: string;
  maxSize?: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/** Convierte 'off' / valores desconocidos a false; los niveles válidos pasan tal cual. */
export function toLevelOption(level: string): LevelOption {
  const normalized = level.toLowerCase();
  return isLogLevel(normalized) ? normalized : false;
}

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  silly: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogLevel) =>
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    verbose: logMethod('verbose'),
    debug: logMethod('debug'),
    silly: logMethod('silly'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.info(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura el logger global (archivo y consola).
 * Por defecto usa config.logging y maxSize 10 MB.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    fileLevel = config.logging.fileLevel,
    consoleLevel = config.logging.consoleLevel,
    maxSize = 10 * 1024 * 1024,
  } = options;

  log.transports.file.level = toLevelOption(fileLevel);
  log.transports.file.maxSize = maxSize;
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';

  log.transports.console.level = toLevelOption(consoleLevel);
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  log.debug(`Logger inicializado (consola: ${consoleLevel}, archivo: ${fileLevel})`);
}

export const logger = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  configure: configureLogger,
};

export { logger as log };

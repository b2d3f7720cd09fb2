/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 *
 * httpClient se consume por ruta directa desde los descargadores; aquí se reexporta solo para
 * quien use el motor como librería.
 */

export {
  logger,
  log,
  configureLogger,
  createScopedLogger,
  formatObject,
  toLevelOption,
} from './logger';
export type { LogLevel, ScopedLogger, ConfigureLoggerOptions } from './logger';

export * from './fileHelpers';
export * from './validation';
export * from './schemas';
export { createHttpClient, describeNetworkError, readHeader, readIntegerHeader } from './httpClient';
export type { HttpClient } from './httpClient';

/**
 * Entrada pública de segdl: motor de descargas segmentadas por rangos HTTP.
 *
 * @module segdl
 */

export * from './engines';
export { configureLogger, logger, resolveSavePath, sanitizeFilename, isValidUrl } from './utils';
export type { ConfigureLoggerOptions, EngineSettingsInput } from './utils';
export { default as config } from './config';
export type { AppConfig } from './config.d';
export { ERRORS, DOWNLOAD_ERRORS, VALIDATION_ERRORS } from './constants/errors';

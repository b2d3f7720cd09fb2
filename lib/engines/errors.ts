/**
 * Errores tipados del motor de descargas.
 *
 * DownloadEngineError lleva un `kind` discriminante que decide el fallback en el orquestador;
 * DownloadCancelledError es el motivo con el que se aborta una descarga al pausar/cancelar y
 * nunca se publica como fallo.
 *
 * @module engines/errors
 */

import { DOWNLOAD_ERRORS } from '../constants/errors';
import type { DownloadErrorKind } from '../../shared/types';

export type { DownloadErrorKind };

const DEFAULT_MESSAGES: Record<DownloadErrorKind, string> = {
  invalid_response: DOWNLOAD_ERRORS.INVALID_RESPONSE,
  missing_content_length: DOWNLOAD_ERRORS.MISSING_CONTENT_LENGTH,
  merge_failed: DOWNLOAD_ERRORS.MERGE_FAILED,
  range_not_supported: DOWNLOAD_ERRORS.RANGE_NOT_SUPPORTED,
};

export interface DownloadEngineErrorOptions {
  statusCode?: number;
  cause?: unknown;
}

export class DownloadEngineError extends Error {
  readonly kind: DownloadErrorKind;
  readonly statusCode: number | null;

  constructor(kind: DownloadErrorKind, detail?: string, options: DownloadEngineErrorOptions = {}) {
    const base = DEFAULT_MESSAGES[kind];
    super(detail ? `${base}: ${detail}` : base, { cause: options.cause });
    this.name = 'DownloadEngineError';
    this.kind = kind;
    this.statusCode = options.statusCode ?? null;
  }
}

export class DownloadCancelledError extends Error {
  readonly downloadId: string;

  constructor(downloadId: string) {
    super(`${DOWNLOAD_ERRORS.CANCELLED}: ${downloadId}`);
    this.name = 'DownloadCancelledError';
    this.downloadId = downloadId;
  }
}

/** Lee un campo string de un error de cualquier realm. */
function readStringField(error: unknown, field: 'name' | 'message'): string | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

export function isDownloadEngineError(error: unknown): error is DownloadEngineError {
  return error instanceof DownloadEngineError;
}

/**
 * Indica si el error corresponde a una cancelación. Si se pasa la señal, su estado manda:
 * una vez abortada, cualquier error que suba (socket destruido, stream cerrado) es cancelación.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  if (error instanceof DownloadCancelledError) return true;
  const name = readStringField(error, 'name');
  return name === 'AbortError' || name === 'CanceledError';
}

/** Lanza el motivo de aborto de la señal si ya fue abortada. */
export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new DownloadCancelledError('unknown');
  }
}

/** Tipo de error para el evento downloadFailed. */
export function errorKindOf(error: unknown): DownloadErrorKind | 'unknown' {
  return isDownloadEngineError(error) ? error.kind : 'unknown';
}

export function errorMessageOf(error: unknown): string {
  return readStringField(error, 'message') ?? String(error);
}

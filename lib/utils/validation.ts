/**
 * @fileoverview Validaciones y saneado de URLs, nombres de archivo y rutas de destino.
 * @module utils/validation
 */

import path from 'path';
import { createScopedLogger } from './logger';

const log = createScopedLogger('Validation');

const MAX_FILENAME_LENGTH = 255;

/** Solo http y https; el resto de protocolos no tiene semántica de Range. */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      log.warn('URL rechazada: protocolo no soportado', urlString);
      return false;
    }
    return true;
  } catch (error) {
    log.debug('URL inválida:', urlString, error instanceof Error ? error.message : String(error));
    return false;
  }
}

export function sanitizeFilename(filename: string): string {
  if (!filename) return 'unnamed';

  let sanitized = filename
    .replace(/[<>:"|?*]/g, '_')
    .replace(/\\/g, '_')
    .replace(/\//g, '_')
    // Caracteres de control y DEL intencionados para sanitizar
    /* eslint-disable-next-line no-control-regex */
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .trim();

  const reservedNames = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])(\..*)?$/i;
  if (reservedNames.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);
  }

  if (!sanitized || sanitized === '.' || sanitized === '..') {
    sanitized = 'unnamed';
  }

  return sanitized;
}

/**
 * Deriva la ruta de guardado a partir del último segmento del path de la URL.
 * Sin segmento (p. ej. "https://host/") se usa "download".
 */
export function resolveSavePath(urlString: string, downloadDir: string): string {
  const url = new URL(urlString);
  const segments = url.pathname.split('/').filter(Boolean);
  const last = segments.length > 0 ? segments[segments.length - 1] : '';
  let name = 'download';
  if (last) {
    try {
      name = decodeURIComponent(last);
    } catch {
      name = last;
    }
  }
  return path.join(downloadDir, sanitizeFilename(name));
}

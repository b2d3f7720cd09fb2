/**
 * Sondeo de capacidades del servidor: soporte de Range y tamaño total.
 *
 * Primero HEAD; si falla o no da un tamaño utilizable, GET con `Range: bytes=0-0` (el cuerpo se
 * descarta sin leerlo). Nunca lanza: sin información se devuelve {totalBytes: null,
 * supportsRanges: false}, que fuerza el stream único.
 *
 * @module RangeProber
 */

import type { Readable } from 'stream';
import { logger } from '../utils';
import { readHeader, readIntegerHeader, type HttpClient } from '../utils/httpClient';
import type { RangeSupportInfo } from './types';

const log = logger.child('RangeProber');

const NO_RANGE_SUPPORT: RangeSupportInfo = Object.freeze({ totalBytes: null, supportsRanges: false });

function acceptsByteRanges(headers: Record<string, unknown>): boolean {
  return (readHeader(headers, 'accept-ranges') ?? '').toLowerCase().includes('bytes');
}

/** Total de `Content-Range: bytes 0-0/12345`; null si falta o es `*`. */
export function parseContentRangeTotal(value: string | undefined): number | null {
  if (!value) return null;
  const match = /\/\s*(\d+)\s*$/.exec(value);
  if (!match) return null;
  const total = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(total) ? total : null;
}

async function headRequest(
  client: HttpClient,
  url: string,
  signal?: AbortSignal
): Promise<RangeSupportInfo | null> {
  const response = await client.head(url, { signal });
  if (response.status < 200 || response.status >= 400) {
    log.debug(`HEAD ${url} respondió ${response.status}`);
    return null;
  }
  const length = readIntegerHeader(response.headers, 'content-length');
  if (length === null || length <= 0) return null;
  return { totalBytes: length, supportsRanges: acceptsByteRanges(response.headers) };
}

async function rangeProbe(
  client: HttpClient,
  url: string,
  signal?: AbortSignal
): Promise<RangeSupportInfo | null> {
  const response = await client.get<Readable>(url, {
    headers: { Range: 'bytes=0-0' },
    responseType: 'stream',
    signal,
  });
  response.data.destroy();

  if (response.status >= 400) {
    log.debug(`Sondeo de rango ${url} respondió ${response.status}`);
    return null;
  }

  const supportsRanges = response.status === 206 || acceptsByteRanges(response.headers);
  let totalBytes = parseContentRangeTotal(readHeader(response.headers, 'content-range'));
  // Con 206 el Content-Length describe el byte sondeado, no la entidad.
  if (totalBytes === null && response.status === 200) {
    totalBytes = readIntegerHeader(response.headers, 'content-length');
  }
  return { totalBytes, supportsRanges };
}

/**
 * Determina soporte de Range y tamaño total de la URL.
 */
export async function probeRangeSupport(
  client: HttpClient,
  url: string,
  signal?: AbortSignal
): Promise<RangeSupportInfo> {
  try {
    const headInfo = await headRequest(client, url, signal);
    if (headInfo) {
      log.debug(`HEAD ${url}: ${headInfo.totalBytes} bytes, ranges=${headInfo.supportsRanges}`);
      return headInfo;
    }
  } catch (error) {
    log.debug(`HEAD falló para ${url}:`, error instanceof Error ? error.message : String(error));
  }

  try {
    const probeInfo = await rangeProbe(client, url, signal);
    if (probeInfo) {
      log.debug(`Sondeo de rango ${url}: ${probeInfo.totalBytes} bytes, ranges=${probeInfo.supportsRanges}`);
      return probeInfo;
    }
  } catch (error) {
    log.debug(`Sondeo de rango falló para ${url}:`, error instanceof Error ? error.message : String(error));
  }

  log.info(`Sin información de rangos para ${url}, se usará stream único`);
  return { ...NO_RANGE_SUPPORT };
}

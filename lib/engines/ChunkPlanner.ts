/**
 * Cálculo del plan de rangos de una descarga segmentada.
 *
 * calculateChunks reparte [0, totalBytes) en k rangos contiguos (k acotado a [1, maxSegments]
 * y a totalBytes); el resto de la división se reparte como un byte extra en los primeros rangos.
 * planChunks reutiliza tal cual un plan previo no vacío (reanudación).
 *
 * @module ChunkPlanner
 */

import config from '../config';
import { logger } from '../utils';
import { sanitizeFilename } from '../utils/validation';
import type { ChunkState, DownloadRequest } from './types';

const log = logger.child('ChunkPlanner');

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  if (bytes === Infinity) return '∞';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

export function chunkTempFileName(downloadId: string, chunkIndex: number): string {
  return `${sanitizeFilename(downloadId)}-chunk-${chunkIndex}`;
}

/** Longitud esperada del rango (límites inclusivos). */
export function chunkLength(chunk: Pick<ChunkState, 'startByte' | 'endByte'>): number {
  return chunk.endByte - chunk.startByte + 1;
}

export function isChunkComplete(chunk: ChunkState): boolean {
  return chunk.downloadedBytes >= chunkLength(chunk);
}

/** Acota el número de segmentos a [1, maxSegments] y a totalBytes. */
export function clampSegments(
  requested: number,
  totalBytes: number,
  maxSegments: number = config.downloads.segmented.maxSegments
): number {
  const wanted = Number.isFinite(requested) ? Math.floor(requested) : 1;
  return Math.max(1, Math.min(wanted, maxSegments, totalBytes));
}

export function calculateChunks(
  totalBytes: number,
  segments: number,
  downloadId: string,
  maxSegments?: number
): ChunkState[] {
  if (!Number.isSafeInteger(totalBytes) || totalBytes <= 0) {
    throw new Error(
      `calculateChunks: totalBytes debe ser un entero positivo (recibido: ${totalBytes})`
    );
  }

  const count = clampSegments(segments, totalBytes, maxSegments);
  const baseSize = Math.floor(totalBytes / count);
  const remainder = totalBytes % count;

  const chunks: ChunkState[] = [];
  let startByte = 0;
  for (let chunkIndex = 0; chunkIndex < count; chunkIndex++) {
    const size = baseSize + (chunkIndex < remainder ? 1 : 0);
    chunks.push({
      chunkIndex,
      startByte,
      endByte: startByte + size - 1,
      downloadedBytes: 0,
      tempFile: chunkTempFileName(downloadId, chunkIndex),
    });
    startByte += size;
  }

  log.debug(
    `[calculateChunks] ${formatBytes(totalBytes)} en ${count} rangos (~${formatBytes(baseSize)} cada uno)`
  );
  return chunks;
}

/**
 * Plan para un intento: el de la petición si trae uno, o uno nuevo para totalBytes.
 * Un plan reutilizado se copia para que el intento no mute el objeto del llamador.
 */
export function planChunks(
  request: DownloadRequest,
  totalBytes: number,
  defaultSegments: number = config.downloads.segmented.defaultSegments,
  maxSegments?: number
): ChunkState[] {
  if (request.chunks && request.chunks.length > 0) {
    log.info(`Reutilizando plan previo de ${request.chunks.length} rangos para ${request.id}`);
    return request.chunks.map(chunk => ({ ...chunk }));
  }
  return calculateChunks(totalBytes, request.segments ?? defaultSegments, request.id, maxSegments);
}

/** Total cubierto por un plan (endByte del último rango + 1). */
export function planTotalBytes(chunks: readonly ChunkState[]): number {
  return chunks.length > 0 ? chunks[chunks.length - 1].endByte + 1 : 0;
}

/**
 * Descarga por rangos HTTP (Range: bytes=start-end).
 *
 * downloadChunk: transmite un rango a su archivo temporal desde su offset actual, en modo
 * append, escribiendo por bloques y notificando el ChunkState tras cada vaciado.
 * downloadChunks: lanza todos los rangos en paralelo contra el mismo cliente HTTP; el primer
 * fallo aborta a los hermanos y se propaga una vez que todos han terminado.
 *
 * @module ChunkDownloader
 */

import type { Readable } from 'stream';
import { DOWNLOAD_ERRORS, NETWORK_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { fileSizeOrZero } from '../utils/fileHelpers';
import { readHeader, type HttpClient } from '../utils/httpClient';
import { BlockWriter } from './BlockWriter';
import { chunkLength, formatBytes } from './ChunkPlanner';
import type ChunkStore from './ChunkStore';
import {
  DownloadCancelledError,
  DownloadEngineError,
  isCancellation,
  throwIfCancelled,
} from './errors';
import type { ChunkProgressCallback, ChunkState } from './types';

const log = logger.child('ChunkDownloader');

const STATUS_HINTS: Record<number, string> = {
  403: 'acceso denegado',
  404: 'no encontrado',
  416: 'rango no satisfacible',
  429: 'demasiadas peticiones (throttling)',
  503: 'servidor no disponible',
};

export function describeStatus(status: number, statusText?: string): string {
  const hint = STATUS_HINTS[status] ? ` - ${STATUS_HINTS[status]}` : '';
  return `HTTP ${status} ${statusText ?? ''}`.trim() + hint;
}

/** Inicio del rango en `Content-Range: bytes 100-199/1000`, o null. */
function parseContentRangeStart(value: string | undefined): number | null {
  if (!value) return null;
  const match = /^\s*bytes\s+(\d+)-\d+/i.exec(value);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Ajusta downloadedBytes al tamaño real del archivo temporal del rango: el archivo es lo que
 * realmente se escribió, aunque el llamador guarde un valor anterior al último vaciado.
 */
export async function reconcileChunk(
  chunk: ChunkState,
  chunkStore: ChunkStore,
  downloadId: string
): Promise<ChunkState> {
  const expectedLength = chunkLength(chunk);
  const onDisk = await fileSizeOrZero(chunkStore.getChunkPath(downloadId, chunk.tempFile));
  if (onDisk > expectedLength) {
    throw new DownloadEngineError(
      'invalid_response',
      `${DOWNLOAD_ERRORS.CHUNK_FILE_TOO_LARGE} (rango ${chunk.chunkIndex}: ${onDisk} > ${expectedLength})`
    );
  }
  if (onDisk !== chunk.downloadedBytes) {
    log.debug(
      `[Chunk] ${downloadId}#${chunk.chunkIndex}: ${chunk.downloadedBytes} registrados, ${onDisk} en disco; se usa el disco`
    );
  }
  return { ...chunk, downloadedBytes: onDisk };
}

export interface ChunkDownloadContext {
  client: HttpClient;
  url: string;
  downloadId: string;
  totalBytes: number;
  chunkStore: ChunkStore;
  writeBlockSize: number;
  signal: AbortSignal;
  onProgress?: ChunkProgressCallback;
}

/**
 * Descarga un rango desde su offset en disco y devuelve su ChunkState actualizado.
 */
export async function downloadChunk(
  chunk: ChunkState,
  context: ChunkDownloadContext
): Promise<ChunkState> {
  const { client, url, downloadId, totalBytes, chunkStore, writeBlockSize, signal, onProgress } =
    context;
  const { chunkIndex } = chunk;
  const expectedLength = chunkLength(chunk);
  const chunkPath = chunkStore.getChunkPath(downloadId, chunk.tempFile);
  const state = await reconcileChunk(chunk, chunkStore, downloadId);

  if (state.downloadedBytes >= expectedLength) {
    log.debug(`[Chunk] ${downloadId}#${chunkIndex} ya completo`);
    onProgress?.({ ...state });
    return state;
  }

  throwIfCancelled(signal);

  const rangeStart = state.startByte + state.downloadedBytes;
  const rangeHeader = `bytes=${rangeStart}-${state.endByte}`;
  log.debug(`[Chunk] ${downloadId}#${chunkIndex} Range: ${rangeHeader}`);

  const response = await client.get<Readable>(url, {
    headers: { Range: rangeHeader },
    responseType: 'stream',
    signal,
  });
  const body = response.data;
  if (!body) {
    throw new DownloadEngineError('invalid_response', NETWORK_ERRORS.NO_BODY, {
      statusCode: response.status,
    });
  }

  const abortBody = (): void => {
    body.destroy(new DownloadCancelledError(downloadId));
  };
  signal.addEventListener('abort', abortBody, { once: true });

  let writer: BlockWriter | null = null;
  try {
    const isWholeEntity = rangeStart === 0 && state.endByte === totalBytes - 1;
    if (response.status === 200 && !isWholeEntity) {
      throw new DownloadEngineError(
        'range_not_supported',
        `rango ${chunkIndex} respondió 200 a ${rangeHeader}`,
        { statusCode: 200 }
      );
    }
    if (response.status !== 206 && response.status !== 200) {
      throw new DownloadEngineError(
        'invalid_response',
        describeStatus(response.status, response.statusText),
        { statusCode: response.status }
      );
    }
    if (response.status === 206) {
      const servedStart = parseContentRangeStart(readHeader(response.headers, 'content-range'));
      if (servedStart !== null && servedStart !== rangeStart) {
        throw new DownloadEngineError(
          'invalid_response',
          `Content-Range empieza en ${servedStart}, se pidió ${rangeStart}`,
          { statusCode: 206 }
        );
      }
    }
    const baseBytes = state.downloadedBytes;
    await chunkStore.createChunkDir(downloadId);
    writer = await BlockWriter.open(chunkPath, {
      mode: 'append',
      blockSize: writeBlockSize,
      onFlush: written => {
        state.downloadedBytes = baseBytes + written;
        onProgress?.({ ...state });
      },
    });

    let received = baseBytes;
    for await (const data of body) {
      throwIfCancelled(signal);
      const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      if (received + buffer.length > expectedLength) {
        throw new DownloadEngineError(
          'invalid_response',
          `${DOWNLOAD_ERRORS.CHUNK_OVERFLOW} (rango ${chunkIndex})`
        );
      }
      received += buffer.length;
      await writer.write(buffer);
    }
    throwIfCancelled(signal);

    await writer.close();
    writer = null;

    if (state.downloadedBytes !== expectedLength) {
      throw new DownloadEngineError(
        'invalid_response',
        `${DOWNLOAD_ERRORS.CHUNK_INCOMPLETE} (rango ${chunkIndex}: ${state.downloadedBytes}/${expectedLength})`
      );
    }

    log.debug(`[Chunk] ${downloadId}#${chunkIndex} completado (${formatBytes(expectedLength)})`);
    return state;
  } catch (error) {
    if (isCancellation(error, signal)) {
      throw signal.reason instanceof Error ? signal.reason : new DownloadCancelledError(downloadId);
    }
    throw error;
  } finally {
    signal.removeEventListener('abort', abortBody);
    if (!body.destroyed) body.destroy();
    if (writer) {
      // Los bytes ya recibidos se conservan para la reanudación.
      await writer.close().catch((closeError: unknown) => {
        log.warn(
          `[Chunk] ${downloadId}#${chunkIndex}: error cerrando archivo temporal:`,
          closeError instanceof Error ? closeError.message : String(closeError)
        );
      });
    }
  }
}

/**
 * Descarga todos los rangos en paralelo y devuelve el plan actualizado ordenado por índice.
 *
 * Un AbortController hijo enlaza la señal del intento con la de los rangos: abortar el
 * intento aborta a todos, y el primer fallo aborta solo a los hermanos.
 */
export async function downloadChunks(
  chunks: readonly ChunkState[],
  context: ChunkDownloadContext
): Promise<ChunkState[]> {
  const parentSignal = context.signal;
  throwIfCancelled(parentSignal);

  const group = new AbortController();
  const forwardAbort = (): void => group.abort(parentSignal.reason);
  parentSignal.addEventListener('abort', forwardAbort, { once: true });

  let firstError: unknown = null;
  const tasks = chunks.map(chunk =>
    downloadChunk(chunk, { ...context, signal: group.signal }).catch((error: unknown) => {
      if (firstError === null && !parentSignal.aborted) {
        firstError = error;
        log.warn(
          `[Chunk failure] ${context.downloadId}#${chunk.chunkIndex}: ${error instanceof Error ? error.message : String(error)}; abortando rangos hermanos`
        );
        group.abort(new DownloadCancelledError(context.downloadId));
      }
      throw error;
    })
  );

  try {
    const results = await Promise.allSettled(tasks);
    if (firstError !== null) throw firstError;
    throwIfCancelled(parentSignal);

    const completed: ChunkState[] = [];
    for (const result of results) {
      if (result.status === 'rejected') throw result.reason;
      completed.push(result.value);
    }
    return completed.sort((a, b) => a.chunkIndex - b.chunkIndex);
  } finally {
    parentSignal.removeEventListener('abort', forwardAbort);
  }
}

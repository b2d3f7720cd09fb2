/**
 * Descarga en un solo stream (sin HTTP Range).
 *
 * Se usa cuando el servidor no soporta rangos, el tamaño es desconocido o el modo segmentado
 * falló. Escribe a `<tempDir>/<id>-single` (truncando) y al terminar lo mueve al destino.
 *
 * @module SimpleDownloader
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { DOWNLOAD_ERRORS, NETWORK_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { replaceFile, safeUnlink } from '../utils/fileHelpers';
import { readIntegerHeader, type HttpClient } from '../utils/httpClient';
import { BlockWriter } from './BlockWriter';
import { describeStatus } from './ChunkDownloader';
import { formatBytes } from './ChunkPlanner';
import type ChunkStore from './ChunkStore';
import {
  DownloadCancelledError,
  DownloadEngineError,
  isCancellation,
  throwIfCancelled,
} from './errors';
import type { StreamProgressCallback } from './types';

const log = logger.child('SimpleDownloader');

export interface SimpleDownloadInput {
  client: HttpClient;
  url: string;
  downloadId: string;
  savePath: string;
  chunkStore: ChunkStore;
  writeBlockSize: number;
  signal: AbortSignal;
  onProgress?: StreamProgressCallback;
}

export interface SimpleDownloadResult {
  savePath: string;
  bytesWritten: number;
}

export async function startSimpleDownload(input: SimpleDownloadInput): Promise<SimpleDownloadResult> {
  const { client, url, downloadId, savePath, chunkStore, writeBlockSize, signal, onProgress } =
    input;
  throwIfCancelled(signal);

  await chunkStore.createChunkDir(downloadId);
  const tempPath = chunkStore.getSinglePath(downloadId);

  const response = await client.get<Readable>(url, { responseType: 'stream', signal });
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
    if (response.status < 200 || response.status >= 300) {
      throw new DownloadEngineError(
        'invalid_response',
        describeStatus(response.status, response.statusText),
        { statusCode: response.status }
      );
    }
    const declaredLength = readIntegerHeader(response.headers, 'content-length');

    writer = await BlockWriter.open(tempPath, {
      mode: 'truncate',
      blockSize: writeBlockSize,
      onFlush: written => onProgress?.(written),
    });

    let received = 0;
    for await (const data of body) {
      throwIfCancelled(signal);
      const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      received += buffer.length;
      await writer.write(buffer);
    }
    throwIfCancelled(signal);

    await writer.close();
    writer = null;

    if (declaredLength !== null && received !== declaredLength) {
      throw new DownloadEngineError(
        'invalid_response',
        `${DOWNLOAD_ERRORS.SINGLE_STREAM_FAILED}: ${received}/${declaredLength} bytes`,
        { statusCode: response.status }
      );
    }

    await fs.mkdir(path.dirname(savePath), { recursive: true });
    await replaceFile(tempPath, savePath);
    log.info(`Descarga simple completada: ${savePath} (${formatBytes(received)})`);
    return { savePath, bytesWritten: received };
  } catch (error) {
    if (writer) {
      await writer.close(false).catch((closeError: unknown) => {
        log.warn(`[Simple] ${downloadId}: error cerrando archivo temporal:`, closeError);
      });
      writer = null;
    }
    await safeUnlink(tempPath).catch((unlinkError: unknown) => {
      log.warn(`[Simple] ${downloadId}: no se pudo eliminar ${tempPath}:`, unlinkError);
    });
    if (isCancellation(error, signal)) {
      throw signal.reason instanceof Error ? signal.reason : new DownloadCancelledError(downloadId);
    }
    throw error;
  } finally {
    signal.removeEventListener('abort', abortBody);
    if (!body.destroyed) body.destroy();
  }
}

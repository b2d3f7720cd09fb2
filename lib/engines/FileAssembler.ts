/**
 * Fusión de los rangos en el archivo final de forma atómica (staging + rename).
 *
 * assemble: escribe en `<savePath>.partial`, concatena los archivos temporales por orden de
 * chunkIndex en bloques de mergeBlockSize y, solo si todo fue bien, reemplaza el destino con un
 * rename. Cualquier fallo deja el destino intacto y se informa como merge_failed.
 *
 * @module FileAssembler
 */

import { promises as fs } from 'fs';
import path from 'path';
import { DOWNLOAD_ERRORS, FILE_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { describeFsError, replaceFile, safeUnlink } from '../utils/fileHelpers';
import { chunkLength, formatBytes } from './ChunkPlanner';
import type ChunkStore from './ChunkStore';
import { DownloadEngineError, errorMessageOf, isDownloadEngineError } from './errors';
import type { ChunkState } from './types';

const log = logger.child('FileAssembler');

export interface AssembleOptions {
  blockSize: number;
}

export interface AssembleResult {
  finalPath: string;
  bytesProcessed: number;
}

export function getStagingPath(finalPath: string): string {
  return `${finalPath}.partial`;
}

export default class FileAssembler {
  private readonly chunkStore: ChunkStore;

  constructor(chunkStore: ChunkStore) {
    this.chunkStore = chunkStore;
  }

  /**
   * Concatena los rangos en orden ascendente de índice, independientemente del orden de `chunks`.
   */
  async assemble(
    downloadId: string,
    chunks: readonly ChunkState[],
    finalPath: string,
    options: AssembleOptions
  ): Promise<AssembleResult> {
    const stagingPath = getStagingPath(finalPath);
    const sortedChunks = [...chunks].sort((a, b) => a.chunkIndex - b.chunkIndex);
    let stagingHandle: fs.FileHandle | null = null;
    let bytesProcessed = 0;
    const startTime = Date.now();

    try {
      await fs.mkdir(path.dirname(finalPath), { recursive: true });
      stagingHandle = await fs.open(stagingPath, 'w');
      const buffer = Buffer.allocUnsafe(options.blockSize);

      for (const chunk of sortedChunks) {
        const chunkPath = this.chunkStore.getChunkPath(downloadId, chunk.tempFile);
        const expected = chunkLength(chunk);

        let chunkHandle: fs.FileHandle;
        try {
          chunkHandle = await fs.open(chunkPath, 'r');
        } catch (openError) {
          throw new DownloadEngineError(
            'merge_failed',
            `${DOWNLOAD_ERRORS.CHUNK_NOT_READABLE} (rango ${chunk.chunkIndex}: ${chunkPath})`,
            { cause: openError }
          );
        }

        try {
          let offset = 0;
          while (offset < expected) {
            const toRead = Math.min(buffer.length, expected - offset);
            const { bytesRead } = await chunkHandle.read(buffer, 0, toRead, offset);
            if (bytesRead === 0) break;
            await stagingHandle.write(buffer, 0, bytesRead);
            offset += bytesRead;
            bytesProcessed += bytesRead;
          }
          if (offset < expected) {
            throw new DownloadEngineError(
              'merge_failed',
              `${DOWNLOAD_ERRORS.CHUNK_INCOMPLETE} (rango ${chunk.chunkIndex}: ${offset}/${expected})`
            );
          }
        } finally {
          await chunkHandle.close();
        }
      }

      await stagingHandle.close();
      stagingHandle = null;

      await replaceFile(stagingPath, finalPath);

      log.info(
        `Archivo final creado: ${finalPath} (${formatBytes(bytesProcessed)}, ${sortedChunks.length} rangos, ${Date.now() - startTime}ms)`
      );
      return { finalPath, bytesProcessed };
    } catch (error) {
      if (stagingHandle) {
        await stagingHandle.close().catch((closeErr: unknown) => {
          log.debug('Error cerrando handle staging:', closeErr);
        });
      }
      await safeUnlink(stagingPath).catch((unlinkErr: unknown) => {
        log.warn(`No se pudo eliminar ${stagingPath}:`, unlinkErr);
      });

      if (isDownloadEngineError(error)) {
        log.error(`Error en ensamblaje de ${downloadId}: ${error.message}`);
        throw error;
      }
      const described = describeFsError(error, {
        diskFull: FILE_ERRORS.DISK_FULL,
        noPermission: `${FILE_ERRORS.NO_PERMISSION}: ${path.dirname(finalPath)}`,
      });
      const detail = errorMessageOf(described);
      log.error(`Error en ensamblaje de ${downloadId}:`, detail);
      throw new DownloadEngineError('merge_failed', detail, { cause: error });
    }
  }
}

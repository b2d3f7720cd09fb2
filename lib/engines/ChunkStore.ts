/**
 * Gestión del directorio temporal de cada descarga (<tempRoot>/<downloadId>/).
 *
 * Un archivo por rango (`<id>-chunk-<index>`) o uno solo en modo stream único
 * (`<id>-single`). No guarda estado: el plan de rangos lo persiste la capa externa.
 *
 * @module ChunkStore
 */

import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../utils';
import { errorCode } from '../utils/fileHelpers';
import { sanitizeFilename } from '../utils/validation';

const log = logger.child('ChunkStore');

export interface ChunkFileInfo {
  name: string;
  path: string;
  size: number;
}

export default class ChunkStore {
  constructor(private readonly baseTempDir: string) {}

  get root(): string {
    return this.baseTempDir;
  }

  /** El id se sanea para que no pueda escapar de la raíz temporal. */
  getChunkDir(downloadId: string): string {
    return path.join(this.baseTempDir, sanitizeFilename(downloadId));
  }

  getChunkPath(downloadId: string, tempFile: string): string {
    return path.join(this.getChunkDir(downloadId), path.basename(tempFile));
  }

  getSinglePath(downloadId: string): string {
    return path.join(this.getChunkDir(downloadId), `${sanitizeFilename(downloadId)}-single`);
  }

  async createChunkDir(downloadId: string): Promise<string> {
    const chunkDir = this.getChunkDir(downloadId);
    await fs.mkdir(chunkDir, { recursive: true });
    return chunkDir;
  }

  async hasChunkDir(downloadId: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.getChunkDir(downloadId));
      return stats.isDirectory();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return false;
      throw error;
    }
  }

  async listChunks(downloadId: string): Promise<ChunkFileInfo[]> {
    const chunkDir = this.getChunkDir(downloadId);
    let files: string[];
    try {
      files = await fs.readdir(chunkDir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return [];
      throw error;
    }
    const chunks: ChunkFileInfo[] = [];
    for (const name of files) {
      const filePath = path.join(chunkDir, name);
      const stats = await fs.stat(filePath);
      if (stats.isFile()) chunks.push({ name, path: filePath, size: stats.size });
    }
    return chunks.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Elimina el directorio de la descarga con todo su contenido. Devuelve true si existía. */
  async deleteAllChunks(downloadId: string): Promise<boolean> {
    const existed = await this.hasChunkDir(downloadId);
    await fs.rm(this.getChunkDir(downloadId), { recursive: true, force: true });
    if (existed) log.debug(`Directorio temporal eliminado para ${downloadId}`);
    return existed;
  }
}

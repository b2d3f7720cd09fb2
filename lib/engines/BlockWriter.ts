/**
 * Escritor por bloques sobre un FileHandle.
 *
 * Acumula los fragmentos recibidos de la red y los escribe al disco cuando se alcanza
 * blockSize (y en flush/close). onFlush recibe el total de bytes escritos por este writer.
 *
 * @module BlockWriter
 */

import { promises as fs } from 'fs';

export interface BlockWriterOptions {
  /** 'append' conserva el contenido previo (reanudación); 'truncate' empieza de cero. */
  mode: 'append' | 'truncate';
  blockSize: number;
  onFlush?: (_bytesWritten: number) => void;
}

export class BlockWriter {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private written = 0;
  private closed = false;

  private constructor(
    private readonly handle: fs.FileHandle,
    private readonly blockSize: number,
    private readonly onFlush?: (_bytesWritten: number) => void
  ) {}

  static async open(filePath: string, options: BlockWriterOptions): Promise<BlockWriter> {
    if (!Number.isInteger(options.blockSize) || options.blockSize <= 0) {
      throw new Error(`BlockWriter: blockSize inválido (${options.blockSize})`);
    }
    const handle = await fs.open(filePath, options.mode === 'append' ? 'a' : 'w');
    return new BlockWriter(handle, options.blockSize, options.onFlush);
  }

  /** Bytes ya escritos al disco (sin contar el buffer pendiente). */
  get bytesWritten(): number {
    return this.written;
  }

  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  /** Añade datos; vacía el buffer si alcanza el tamaño de bloque. Devuelve true si hubo escritura. */
  async write(data: Buffer): Promise<boolean> {
    if (this.closed) throw new Error('BlockWriter: escritura tras close');
    if (data.length === 0) return false;
    this.pending.push(data);
    this.pendingBytes += data.length;
    if (this.pendingBytes < this.blockSize) return false;
    await this.flush();
    return true;
  }

  async flush(): Promise<void> {
    if (this.pendingBytes === 0) return;
    const block = this.pending.length === 1 ? this.pending[0] : Buffer.concat(this.pending);
    this.pending = [];
    this.pendingBytes = 0;

    let offset = 0;
    while (offset < block.length) {
      const { bytesWritten } = await this.handle.write(block, offset, block.length - offset);
      offset += bytesWritten;
    }
    this.written += block.length;
    this.onFlush?.(this.written);
  }

  /**
   * Cierra el archivo. Con flush=true vacía antes el buffer pendiente; el handle se cierra
   * aunque el vaciado falle.
   */
  async close(flush = true): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      if (flush) await this.flush();
    } finally {
      this.pending = [];
      this.pendingBytes = 0;
      await this.handle.close();
    }
  }
}

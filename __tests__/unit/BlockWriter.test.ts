/**
 * Tests unitarios para lib/engines/BlockWriter.ts (escritura por bloques).
 */
import { promises as fs } from 'fs';
import path from 'path';
import { BlockWriter } from '../../lib/engines/BlockWriter';
import { makeTempDir } from '../helpers/RangeServer';

describe('BlockWriter', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = makeTempDir('block-writer');
    await fs.mkdir(dir, { recursive: true });
    filePath = path.join(dir, 'data.bin');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('debe acumular hasta el tamaño de bloque antes de escribir', async () => {
    const flushed: number[] = [];
    const writer = await BlockWriter.open(filePath, {
      mode: 'truncate',
      blockSize: 10,
      onFlush: bytes => flushed.push(bytes),
    });

    expect(await writer.write(Buffer.alloc(4, 1))).toBe(false);
    expect(writer.bufferedBytes).toBe(4);
    expect(writer.bytesWritten).toBe(0);
    expect(await writer.write(Buffer.alloc(7, 2))).toBe(true);
    expect(writer.bufferedBytes).toBe(0);
    expect(writer.bytesWritten).toBe(11);
    expect(await writer.write(Buffer.alloc(3, 3))).toBe(false);
    await writer.close();

    expect(flushed).toEqual([11, 14]);
    const data = await fs.readFile(filePath);
    expect(data).toEqual(
      Buffer.concat([Buffer.alloc(4, 1), Buffer.alloc(7, 2), Buffer.alloc(3, 3)])
    );
  });

  it('debe añadir al contenido previo en modo append', async () => {
    await fs.writeFile(filePath, 'abc');
    const writer = await BlockWriter.open(filePath, { mode: 'append', blockSize: 1024 });
    await writer.write(Buffer.from('def'));
    await writer.close();

    expect(await fs.readFile(filePath, 'utf8')).toBe('abcdef');
  });

  it('debe truncar el contenido previo en modo truncate', async () => {
    await fs.writeFile(filePath, 'contenido viejo');
    const writer = await BlockWriter.open(filePath, { mode: 'truncate', blockSize: 1024 });
    await writer.write(Buffer.from('nuevo'));
    await writer.close();

    expect(await fs.readFile(filePath, 'utf8')).toBe('nuevo');
  });

  it('debe descartar el buffer al cerrar sin flush', async () => {
    const writer = await BlockWriter.open(filePath, { mode: 'truncate', blockSize: 1024 });
    await writer.write(Buffer.from('pendiente'));
    await writer.close(false);

    expect(await fs.readFile(filePath, 'utf8')).toBe('');
  });

  it('debe ignorar un segundo close y rechazar escrituras posteriores', async () => {
    const writer = await BlockWriter.open(filePath, { mode: 'truncate', blockSize: 8 });
    await writer.close();
    await expect(writer.close()).resolves.toBeUndefined();
    await expect(writer.write(Buffer.from('x'))).rejects.toThrow('BlockWriter: escritura tras close');
  });

  it('debe rechazar un tamaño de bloque inválido', async () => {
    await expect(BlockWriter.open(filePath, { mode: 'truncate', blockSize: 0 })).rejects.toThrow(
      'BlockWriter: blockSize inválido (0)'
    );
  });
});

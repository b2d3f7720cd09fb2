/**
 * Agregador de progreso por descarga.
 *
 * Único punto de mutación del mapa de ChunkState y del instante de inicio de cada descarga
 * activa: los rangos concurrentes solo informan su ChunkState y aquí se recalcula el snapshot
 * completo (fracción, bytes, velocidad y lista de rangos ordenada).
 *
 * Las actualizaciones que llegan después de clear() (un rango vaciando su buffer mientras se
 * pausa) se descartan: update devuelve null.
 *
 * @module ChunkProgressAggregator
 */

import { DownloadState, type ChunkState, type DownloadStateType, type ProgressSnapshot } from './types';

interface AggregatorEntry {
  chunks: Map<number, ChunkState>;
  totalBytes: number;
  startedAt: number;
  /** Bytes del modo stream único (sin rangos). */
  streamBytes: number;
}

export interface SnapshotInput {
  downloadId: string;
  chunks: readonly ChunkState[];
  totalBytes: number;
  /** Si se omite se suma downloadedBytes de los rangos. */
  downloadedBytes?: number;
  startedAt: number;
  now: number;
  state?: DownloadStateType;
}

/**
 * Calcula un snapshot. Fracción 0 si el total es 0 o desconocido; velocidad 0 si no ha
 * transcurrido tiempo.
 */
export function buildSnapshot(input: SnapshotInput): ProgressSnapshot {
  const ordered = [...input.chunks]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map(chunk => ({ ...chunk }));
  const downloadedBytes =
    input.downloadedBytes ?? ordered.reduce((sum, chunk) => sum + chunk.downloadedBytes, 0);
  const progress = input.totalBytes > 0 ? Math.min(downloadedBytes / input.totalBytes, 1) : 0;
  const elapsedSeconds = (input.now - input.startedAt) / 1000;
  const speedBytesPerSec = elapsedSeconds > 0 ? downloadedBytes / elapsedSeconds : 0;

  return {
    downloadId: input.downloadId,
    progress,
    state: input.state ?? (progress >= 1 ? DownloadState.COMPLETED : DownloadState.DOWNLOADING),
    downloadedBytes,
    totalBytes: input.totalBytes,
    speedBytesPerSec,
    chunks: ordered,
  };
}

class ChunkProgressAggregator {
  /** Map<downloadId, entrada> */
  private _cache = new Map<string, AggregatorEntry>();

  /**
   * Registra una descarga. chunks vacío = modo stream único; totalBytes 0 = desconocido.
   * Re-inicializar reemplaza la entrada previa.
   */
  init(
    downloadId: string,
    chunks: readonly ChunkState[],
    totalBytes: number,
    startedAt: number = Date.now()
  ): void {
    const map = new Map<number, ChunkState>();
    for (const chunk of chunks) {
      map.set(chunk.chunkIndex, { ...chunk });
    }
    this._cache.set(downloadId, { chunks: map, totalBytes, startedAt, streamBytes: 0 });
  }

  /** Aplica el ChunkState informado por un rango y devuelve el snapshot resultante. */
  update(downloadId: string, chunk: ChunkState, now: number = Date.now()): ProgressSnapshot | null {
    const entry = this._cache.get(downloadId);
    if (!entry) return null;
    entry.chunks.set(chunk.chunkIndex, { ...chunk });
    return this._build(downloadId, entry, now);
  }

  /** Progreso del modo stream único. */
  updateStream(
    downloadId: string,
    downloadedBytes: number,
    now: number = Date.now()
  ): ProgressSnapshot | null {
    const entry = this._cache.get(downloadId);
    if (!entry) return null;
    entry.streamBytes = downloadedBytes;
    return this._build(downloadId, entry, now);
  }

  /** Snapshot actual; `state` fuerza el estado publicado (p. ej. merging). */
  snapshot(
    downloadId: string,
    state?: DownloadStateType,
    now: number = Date.now()
  ): ProgressSnapshot | null {
    const entry = this._cache.get(downloadId);
    if (!entry) return null;
    return this._build(downloadId, entry, now, state);
  }

  /** Plan actual ordenado por índice (copia). */
  getChunks(downloadId: string): ChunkState[] {
    const entry = this._cache.get(downloadId);
    if (!entry) return [];
    return [...entry.chunks.values()]
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .map(chunk => ({ ...chunk }));
  }

  getTotalDownloaded(downloadId: string): number {
    const entry = this._cache.get(downloadId);
    if (!entry) return 0;
    if (entry.chunks.size === 0) return entry.streamBytes;
    let total = 0;
    for (const chunk of entry.chunks.values()) {
      total += chunk.downloadedBytes;
    }
    return total;
  }

  has(downloadId: string): boolean {
    return this._cache.has(downloadId);
  }

  /** Descarta el mapa de rangos y el instante de inicio de la descarga. */
  clear(downloadId: string): void {
    this._cache.delete(downloadId);
  }

  clearAll(): void {
    this._cache.clear();
  }

  get size(): number {
    return this._cache.size;
  }

  private _build(
    downloadId: string,
    entry: AggregatorEntry,
    now: number,
    state?: DownloadStateType
  ): ProgressSnapshot {
    const chunks = [...entry.chunks.values()];
    return buildSnapshot({
      downloadId,
      chunks,
      totalBytes: entry.totalBytes,
      downloadedBytes: chunks.length === 0 ? entry.streamBytes : undefined,
      startedAt: entry.startedAt,
      now,
      state,
    });
  }
}

export default ChunkProgressAggregator;
export { ChunkProgressAggregator };

/**
 * @fileoverview Tipos compartidos entre el motor de descargas y la capa externa (UI / almacenamiento).
 * @module shared/types
 *
 * La capa externa entrega DownloadRequest, recibe ProgressSnapshot en cada evento de progreso y
 * persiste la lista de ChunkState para poder reanudar más tarde. El motor nunca guarda estos datos.
 */

/** Estados visibles de una descarga, en el mismo formato en minúsculas que usa la capa externa. */
export const DownloadState = Object.freeze({
  QUEUED: 'queued',
  DOWNLOADING: 'downloading',
  PAUSED: 'paused',
  MERGING: 'merging',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const);

export type DownloadStateType = (typeof DownloadState)[keyof typeof DownloadState];

/** Un rango de bytes del plan: límites inclusivos y bytes ya recibidos en su archivo temporal. */
export interface ChunkState {
  /** Posición en el plan (0..k-1); define el orden de fusión. */
  chunkIndex: number;
  startByte: number;
  endByte: number;
  downloadedBytes: number;
  /** Nombre (no ruta) del archivo temporal del rango: `<id>-chunk-<index>`. */
  tempFile: string;
}

export interface DownloadRequest {
  id: string;
  url: string;
  savePath: string;
  /** Segmentos solicitados; por defecto 4, acotado a [1, 8]. */
  segments?: number;
  /** Plan previo (reanudación). Si no está vacío se reutiliza tal cual. */
  chunks?: ChunkState[];
}

export interface ProgressSnapshot {
  downloadId: string;
  /** Fracción [0, 1]. */
  progress: number;
  state: DownloadStateType;
  downloadedBytes: number;
  totalBytes: number;
  speedBytesPerSec: number;
  /** Ordenado por chunkIndex; vacío en modo stream único. */
  chunks: ChunkState[];
}

export type DownloadMode = 'segmented' | 'single';

export type DownloadErrorKind =
  | 'invalid_response'
  | 'missing_content_length'
  | 'merge_failed'
  | 'range_not_supported';

export interface DownloadCompletedPayload {
  downloadId: string;
  savePath: string;
  mode: DownloadMode;
  timestamp: number;
}

export interface DownloadFailedPayload {
  downloadId: string;
  error: string;
  kind: DownloadErrorKind | 'unknown';
  timestamp: number;
}

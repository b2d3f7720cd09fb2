/**
 * Tipos del motor de descargas.
 *
 * Reexporta el contrato compartido con la capa externa (shared/types) y añade los tipos
 * internos que se pasan entre prober, planificador, descargadores y orquestador.
 *
 * @module engines/types
 */

export {
  DownloadState,
  type DownloadStateType,
  type ChunkState,
  type DownloadRequest,
  type ProgressSnapshot,
  type DownloadMode,
  type DownloadErrorKind,
  type DownloadCompletedPayload,
  type DownloadFailedPayload,
} from '../../shared/types';

import type { ChunkState } from '../../shared/types';

/** Resultado del sondeo de capacidades; se produce una vez por intento. */
export interface RangeSupportInfo {
  /** Tamaño total de la entidad, o null si el servidor no lo informa de forma utilizable. */
  totalBytes: number | null;
  supportsRanges: boolean;
}

/** Callback con el estado actualizado de un rango tras cada vaciado del buffer. */
export type ChunkProgressCallback = (_chunk: ChunkState) => void;

/** Callback de progreso del modo stream único: bytes recibidos hasta ahora. */
export type StreamProgressCallback = (_downloadedBytes: number) => void;

/** Ajustes efectivos del motor (config por defecto + overrides validados). */
export interface EngineSettings {
  defaultSegments: number;
  maxSegments: number;
  writeBlockSize: number;
  mergeBlockSize: number;
  fallbackOnAnyError: boolean;
  tempRoot: string;
}

/**
 * Punto de entrada del motor de descargas: reexporta DownloadEngine, EventBus, los
 * descargadores, el planificador, el prober, el ensamblador, el registro y los tipos compartidos.
 *
 * @module engines
 */

export { default as eventBus, EventBus } from './EventBus';
export type { EngineEvents, MergeStartedPayload, FallbackStartedPayload } from './EventBus';
export { DownloadState } from './types';
export type {
  DownloadStateType,
  ChunkState,
  DownloadRequest,
  ProgressSnapshot,
  DownloadMode,
  DownloadErrorKind,
  DownloadCompletedPayload,
  DownloadFailedPayload,
  RangeSupportInfo,
  EngineSettings,
} from './types';
export {
  DownloadEngineError,
  DownloadCancelledError,
  isCancellation,
  isDownloadEngineError,
} from './errors';
export { STATE, canTransition, isActiveState } from './DownloadStateMachine';
export {
  calculateChunks,
  planChunks,
  chunkLength,
  isChunkComplete,
  clampSegments,
} from './ChunkPlanner';
export { probeRangeSupport, parseContentRangeTotal } from './RangeProber';
export { default as ChunkStore } from './ChunkStore';
export { default as FileAssembler } from './FileAssembler';
export type { AssembleResult, AssembleOptions } from './FileAssembler';
export { default as ChunkProgressAggregator, buildSnapshot } from './ChunkProgressAggregator';
export { default as DownloadManager } from './DownloadManager';
export type { ActiveDownloadEntry } from './DownloadManager';
export * as simpleDownloader from './SimpleDownloader';
export type { SimpleDownloadInput } from './SimpleDownloader';
export * as chunkDownloader from './ChunkDownloader';
export type { ChunkDownloadContext } from './ChunkDownloader';
export { default as downloadEngine, DownloadEngine } from './DownloadEngine';
export type { DownloadEngineDeps, DownloadEngineOptions } from './DownloadEngine';

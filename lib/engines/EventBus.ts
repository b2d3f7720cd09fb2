/**
 * Bus de eventos entre el motor de descargas y la capa externa (UI / almacenamiento).
 *
 * Emite: downloadProgress, downloadCompleted, downloadFailed, mergeStarted, fallbackStarted.
 * completed/failed se emiten exactamente una vez por intento; pausar o cancelar no emite ninguno.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type {
  DownloadCompletedPayload,
  DownloadErrorKind,
  DownloadFailedPayload,
  DownloadMode,
  ProgressSnapshot,
} from './types';

export interface MergeStartedPayload {
  downloadId: string;
  chunkCount: number;
  timestamp: number;
}

export interface FallbackStartedPayload {
  downloadId: string;
  reason: string;
  timestamp: number;
}

export interface EngineEvents {
  downloadProgress: [ProgressSnapshot];
  downloadCompleted: [DownloadCompletedPayload];
  downloadFailed: [DownloadFailedPayload];
  mergeStarted: [MergeStartedPayload];
  fallbackStarted: [FallbackStartedPayload];
}

/**
 * EventEmitter tipado con los eventos del motor; setMaxListeners(100).
 */
class EventBus extends EventEmitter<EngineEvents> {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  emitDownloadProgress(snapshot: ProgressSnapshot): void {
    this.emit('downloadProgress', snapshot);
  }

  emitDownloadCompleted(downloadId: string, savePath: string, mode: DownloadMode): void {
    this.emit('downloadCompleted', { downloadId, savePath, mode, timestamp: Date.now() });
  }

  emitDownloadFailed(
    downloadId: string,
    error: Error | string,
    kind: DownloadErrorKind | 'unknown'
  ): void {
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.emit('downloadFailed', {
      downloadId,
      error: errorMessage,
      kind,
      timestamp: Date.now(),
    });
  }

  emitMergeStarted(downloadId: string, chunkCount: number): void {
    this.emit('mergeStarted', { downloadId, chunkCount, timestamp: Date.now() });
  }

  emitFallbackStarted(downloadId: string, reason: string): void {
    this.emit('fallbackStarted', { downloadId, reason, timestamp: Date.now() });
  }

  /** Quita todos los listeners (usado en cleanup del motor). */
  clear(): void {
    this.removeAllListeners();
  }
}

const eventBus = new EventBus();
export default eventBus;
export { EventBus };

/**
 * Orquestador principal del motor de descargas.
 *
 * Coordina: RangeProber (soporte de rangos y tamaño), ChunkPlanner (plan de rangos),
 * ChunkDownloader (rangos concurrentes), ChunkProgressAggregator (snapshots), FileAssembler
 * (merge atómico), SimpleDownloader (stream único) y EventBus (eventos a la capa externa).
 * DownloadManager guarda un intento vivo por id; pausar lo aborta y descarta su estado en
 * memoria, dejando los archivos temporales para reanudar.
 *
 * @module DownloadEngine
 */

import config from '../config';
import { DOWNLOAD_ERRORS, VALIDATION_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { createHttpClient, describeNetworkError, type HttpClient } from '../utils/httpClient';
import {
  validateDownloadRequest,
  validateEngineSettings,
  type EngineSettingsInput,
} from '../utils/schemas';
import { downloadChunks, reconcileChunk } from './ChunkDownloader';
import { planChunks, planTotalBytes } from './ChunkPlanner';
import ChunkProgressAggregator from './ChunkProgressAggregator';
import ChunkStore from './ChunkStore';
import DownloadManager, { type ActiveDownloadEntry } from './DownloadManager';
import {
  DownloadCancelledError,
  DownloadEngineError,
  errorKindOf,
  errorMessageOf,
  isCancellation,
  isDownloadEngineError,
  throwIfCancelled,
} from './errors';
import eventBus, { type EventBus } from './EventBus';
import FileAssembler from './FileAssembler';
import { probeRangeSupport } from './RangeProber';
import { startSimpleDownload } from './SimpleDownloader';
import {
  DownloadState,
  type ChunkState,
  type DownloadMode,
  type DownloadRequest,
  type DownloadStateType,
  type EngineSettings,
  type ProgressSnapshot,
} from './types';

const log = logger.child('DownloadEngine');

/**
 * Dependencias inyectables del motor (para tests e instancias independientes).
 * Todas opcionales: si no se proporcionan se crean a partir de config.
 */
export interface DownloadEngineDeps {
  httpClient?: HttpClient;
  eventBus?: EventBus;
  chunkStore?: ChunkStore;
  downloadManager?: DownloadManager;
  aggregator?: ChunkProgressAggregator;
}

export interface DownloadEngineOptions {
  /** Overrides de config.downloads.segmented y paths.tempRoot; se validan con zod. */
  settings?: EngineSettingsInput;
  deps?: DownloadEngineDeps;
}

interface AttemptResult {
  savePath: string;
  mode: DownloadMode;
}

function resolveSettings(input: EngineSettingsInput | undefined): EngineSettings {
  const validation = validateEngineSettings(input ?? {});
  if (!validation.success || !validation.data) {
    throw new Error(`${VALIDATION_ERRORS.VALIDATION_ERROR}: ${validation.error ?? ''}`);
  }
  const segmented = config.downloads.segmented;
  const overrides = validation.data;
  return {
    defaultSegments: overrides.defaultSegments ?? segmented.defaultSegments,
    maxSegments: segmented.maxSegments,
    writeBlockSize: overrides.writeBlockSize ?? segmented.writeBlockSize,
    mergeBlockSize: overrides.mergeBlockSize ?? segmented.mergeBlockSize,
    fallbackOnAnyError: overrides.fallbackOnAnyError ?? segmented.fallbackOnAnyError,
    tempRoot: overrides.tempRoot ?? config.paths.tempRoot,
  };
}

export class DownloadEngine {
  readonly settings: EngineSettings;
  readonly httpClient: HttpClient;
  /** Referencia al EventBus inyectado para desacoplar del singleton. */
  readonly eventBus: EventBus;
  readonly chunkStore: ChunkStore;
  readonly fileAssembler: FileAssembler;
  readonly downloadManager: DownloadManager;
  readonly aggregator: ChunkProgressAggregator;

  constructor(options: DownloadEngineOptions = {}) {
    const deps = options.deps ?? {};
    this.settings = resolveSettings(options.settings);
    this.httpClient = deps.httpClient ?? createHttpClient(config.network);
    this.eventBus = deps.eventBus ?? eventBus;
    this.chunkStore = deps.chunkStore ?? new ChunkStore(this.settings.tempRoot);
    this.fileAssembler = new FileAssembler(this.chunkStore);
    this.downloadManager = deps.downloadManager ?? new DownloadManager();
    this.aggregator = deps.aggregator ?? new ChunkProgressAggregator();
  }

  /** Cantidad de descargas con un intento registrado. */
  get activeCount(): number {
    return this.downloadManager.size;
  }

  isActive(downloadId: string): boolean {
    return this.downloadManager.has(downloadId);
  }

  /** Estado del intento vivo, o null si no hay ninguno. */
  getState(downloadId: string): DownloadStateType | null {
    return this.downloadManager.get(downloadId)?.state ?? null;
  }

  /** Último plan de rangos conocido del intento vivo (vacío en stream único o sin intento). */
  getChunkPlan(downloadId: string): ChunkState[] {
    return this.aggregator.getChunks(downloadId);
  }

  /** Resuelve cuando el intento actual de la descarga ha terminado de deshacerse. */
  whenSettled(downloadId: string): Promise<void> {
    return this.downloadManager.whenSettled(downloadId);
  }

  /**
   * Inicia un intento para la petición. No-op (devuelve false) si ya hay uno activo con ese id.
   * Una petición inválida lanza antes de registrar nada.
   */
  enqueue(request: DownloadRequest): boolean {
    const validation = validateDownloadRequest(request);
    if (!validation.success) {
      throw new Error(validation.error ?? VALIDATION_ERRORS.VALIDATION_ERROR);
    }

    const previous = this.downloadManager.whenSettled(request.id);
    const entry = this.downloadManager.register(request.id);
    if (!entry) {
      log.debug(`[enqueue] ${request.id}: ${DOWNLOAD_ERRORS.ALREADY_ACTIVE}, se ignora`);
      return false;
    }

    log.info(
      `[enqueue] ${request.id}: ${request.url} → ${request.savePath}` +
        (request.chunks && request.chunks.length > 0
          ? ` (reanudando ${request.chunks.length} rangos)`
          : '')
    );
    const task = this._runAttempt(entry, request, previous);
    this.downloadManager.trackSettling(request.id, task);
    return true;
  }

  /** Igual que enqueue: la petición trae el plan previo para reutilizarlo. */
  resume(request: DownloadRequest): boolean {
    return this.enqueue(request);
  }

  /**
   * Aborta el intento en curso y descarta su estado en memoria. Los archivos temporales
   * quedan en disco. Devuelve false si no había intento activo.
   */
  pause(downloadId: string): boolean {
    const entry = this.downloadManager.cleanup(downloadId, new DownloadCancelledError(downloadId));
    this.aggregator.clear(downloadId);
    if (!entry) return false;
    log.info(`[pause] Descarga ${downloadId} pausada`);
    return true;
  }

  /**
   * Pausa, espera a que el intento se deshaga y elimina el directorio temporal.
   * Devuelve true si había algo activo o en disco.
   */
  async cancel(downloadId: string): Promise<boolean> {
    const wasActive = this.pause(downloadId);
    await this.downloadManager.whenSettled(downloadId);
    const hadFiles = await this.chunkStore.deleteAllChunks(downloadId);
    if (wasActive || hadFiles) log.info(`[cancel] Descarga ${downloadId} cancelada`);
    return wasActive || hadFiles;
  }

  /** Pausa todas las descargas activas y espera a que terminen de deshacerse. */
  async close(): Promise<void> {
    const ids = this.downloadManager.ids();
    for (const downloadId of ids) {
      this.pause(downloadId);
    }
    await this.downloadManager.whenAllSettled();
    this.aggregator.clearAll();
    log.info(`DownloadEngine cerrado (${ids.length} descargas pausadas)`);
  }

  // -----------------------------------------------------------------------
  // Intento
  // -----------------------------------------------------------------------

  /** Ejecuta un intento completo. Nunca rechaza: el resultado sale por el EventBus. */
  private async _runAttempt(
    entry: ActiveDownloadEntry,
    request: DownloadRequest,
    previous: Promise<void>
  ): Promise<void> {
    const downloadId = request.id;
    const { signal } = entry.controller;
    const endOperation = log.startOperation(`descarga ${downloadId}`);

    try {
      await previous;
      throwIfCancelled(signal);

      const result = await this._performDownload(entry, request);

      this.downloadManager.transition(entry, DownloadState.COMPLETED);
      const finalSnapshot = this.aggregator.snapshot(downloadId, DownloadState.COMPLETED);
      this.downloadManager.remove(entry);
      this.aggregator.clear(downloadId);
      if (finalSnapshot) this._publish(finalSnapshot);

      await this.chunkStore.deleteAllChunks(downloadId).catch((cleanupError: unknown) => {
        log.warn(`No se pudo eliminar el directorio temporal de ${downloadId}:`, cleanupError);
      });

      this.eventBus.emitDownloadCompleted(downloadId, result.savePath, result.mode);
      endOperation(`completada (${result.mode})`);
    } catch (error) {
      if (isCancellation(error, signal)) {
        this.downloadManager.remove(entry);
        endOperation('pausada');
        return;
      }

      this.downloadManager.transition(entry, DownloadState.FAILED);
      this.downloadManager.remove(entry);
      this.aggregator.clear(downloadId);
      const message = describeNetworkError(error) ?? errorMessageOf(error);
      log.error(`[Download failure] ${downloadId}: ${message}`);
      this.eventBus.emitDownloadFailed(downloadId, message, errorKindOf(error));
      endOperation('fallida');
    }
  }

  private async _performDownload(
    entry: ActiveDownloadEntry,
    request: DownloadRequest
  ): Promise<AttemptResult> {
    const { signal } = entry.controller;
    this.downloadManager.transition(entry, DownloadState.DOWNLOADING);

    const info = await probeRangeSupport(this.httpClient, request.url, signal);
    throwIfCancelled(signal);

    if (!info.supportsRanges || info.totalBytes === null || info.totalBytes <= 0) {
      log.info(
        `[DownloadEngine] ${request.id}: ranges=${info.supportsRanges}, tamaño=${info.totalBytes ?? 'desconocido'}; usando stream único`
      );
      return this._runSingle(entry, request, info.totalBytes);
    }

    try {
      return await this._runSegmented(entry, request, info.totalBytes);
    } catch (error) {
      if (isCancellation(error, signal) || !this._shouldFallback(error)) throw error;
      const reason = errorMessageOf(error);
      log.warn(`[DownloadEngine] ${request.id}: modo segmentado falló (${reason}), reintentando con stream único`);
      this.eventBus.emitFallbackStarted(request.id, reason);
      return this._runSingle(entry, request, info.totalBytes);
    }
  }

  /** merge_failed es terminal; el resto depende de fallbackOnAnyError. */
  private _shouldFallback(error: unknown): boolean {
    if (isDownloadEngineError(error) && error.kind === 'merge_failed') return false;
    if (this.settings.fallbackOnAnyError) return true;
    return isDownloadEngineError(error) && error.kind === 'range_not_supported';
  }

  private async _runSegmented(
    entry: ActiveDownloadEntry,
    request: DownloadRequest,
    totalBytes: number
  ): Promise<AttemptResult> {
    const downloadId = request.id;
    const { signal } = entry.controller;
    entry.mode = 'segmented';

    const plan = planChunks(
      request,
      totalBytes,
      this.settings.defaultSegments,
      this.settings.maxSegments
    );
    const planned = planTotalBytes(plan);
    if (planned !== totalBytes) {
      throw new DownloadEngineError(
        'invalid_response',
        `el plan cubre ${planned} bytes y el servidor informa ${totalBytes}`
      );
    }

    await this.chunkStore.createChunkDir(downloadId);
    const chunks = await Promise.all(
      plan.map(chunk => reconcileChunk(chunk, this.chunkStore, downloadId))
    );
    throwIfCancelled(signal);

    this.aggregator.init(downloadId, chunks, totalBytes, entry.startedAt);
    this._publish(this.aggregator.snapshot(downloadId));
    log.info(`[DownloadEngine] ${downloadId}: ${chunks.length} rangos, ${totalBytes} bytes`);

    const completed = await downloadChunks(chunks, {
      client: this.httpClient,
      url: request.url,
      downloadId,
      totalBytes,
      chunkStore: this.chunkStore,
      writeBlockSize: this.settings.writeBlockSize,
      signal,
      onProgress: chunk => this._publish(this.aggregator.update(downloadId, chunk)),
    });
    throwIfCancelled(signal);

    this.downloadManager.transition(entry, DownloadState.MERGING);
    this._publish(this.aggregator.snapshot(downloadId, DownloadState.MERGING));
    this.eventBus.emitMergeStarted(downloadId, completed.length);

    await this.fileAssembler.assemble(downloadId, completed, request.savePath, {
      blockSize: this.settings.mergeBlockSize,
    });
    return { savePath: request.savePath, mode: 'segmented' };
  }

  private async _runSingle(
    entry: ActiveDownloadEntry,
    request: DownloadRequest,
    totalBytes: number | null
  ): Promise<AttemptResult> {
    const downloadId = request.id;
    entry.mode = 'single';
    this.aggregator.init(downloadId, [], totalBytes ?? 0);
    this._publish(this.aggregator.snapshot(downloadId));

    const result = await startSimpleDownload({
      client: this.httpClient,
      url: request.url,
      downloadId,
      savePath: request.savePath,
      chunkStore: this.chunkStore,
      writeBlockSize: this.settings.writeBlockSize,
      signal: entry.controller.signal,
      onProgress: bytes => this._publish(this.aggregator.updateStream(downloadId, bytes)),
    });
    return { savePath: result.savePath, mode: 'single' };
  }

  /** Publica un snapshot; los errores de un listener no afectan a la descarga. */
  private _publish(snapshot: ProgressSnapshot | null): void {
    if (!snapshot) return;
    try {
      this.eventBus.emitDownloadProgress(snapshot);
    } catch (listenerError) {
      log.warn(`Listener de progreso falló para ${snapshot.downloadId}:`, listenerError);
    }
  }
}

const downloadEngine = new DownloadEngine();
export default downloadEngine;

/**
 * Registro en memoria de los intentos de descarga en curso.
 *
 * Una entrada por downloadId con su AbortController, estado de ciclo de vida, modo e instante de
 * inicio. La existencia de la entrada es la única fuente de verdad de "descarga activa".
 * Aparte se guarda la promesa de cada intento hasta que termina de deshacerse, para que un
 * nuevo intento del mismo id espere a que el anterior suelte sus archivos temporales.
 *
 * @module engines/DownloadManager
 */

import { logger } from '../utils';
import { canTransition } from './DownloadStateMachine';
import { DownloadState, type DownloadMode, type DownloadStateType } from './types';

const log = logger.child('DownloadManager');

export interface ActiveDownloadEntry {
  downloadId: string;
  controller: AbortController;
  state: DownloadStateType;
  mode: DownloadMode | null;
  startedAt: number;
}

export class DownloadManager {
  private _store = new Map<string, ActiveDownloadEntry>();
  private _settling = new Map<string, Promise<void>>();

  get size(): number {
    return this._store.size;
  }

  has(downloadId: string): boolean {
    return this._store.has(downloadId);
  }

  get(downloadId: string): ActiveDownloadEntry | undefined {
    return this._store.get(downloadId);
  }

  ids(): string[] {
    return [...this._store.keys()];
  }

  /** Registra un intento nuevo en estado queued. Devuelve null si ya hay uno activo. */
  register(downloadId: string, now: number = Date.now()): ActiveDownloadEntry | null {
    if (this._store.has(downloadId)) return null;
    const entry: ActiveDownloadEntry = {
      downloadId,
      controller: new AbortController(),
      state: DownloadState.QUEUED,
      mode: null,
      startedAt: now,
    };
    this._store.set(downloadId, entry);
    return entry;
  }

  /**
   * Cambia el estado de la entrada si la transición es válida. Una entrada ya retirada del
   * registro (intento pausado) no cambia.
   */
  transition(entry: ActiveDownloadEntry, toState: DownloadStateType): boolean {
    if (this._store.get(entry.downloadId) !== entry) return false;
    if (!canTransition(entry.state, toState)) {
      log.warn(`Transición inválida para ${entry.downloadId}: ${entry.state} → ${toState}`);
      return false;
    }
    entry.state = toState;
    return true;
  }

  /** Retira la entrada solo si sigue siendo la misma (un intento nuevo no se borra). */
  remove(entry: ActiveDownloadEntry): boolean {
    if (this._store.get(entry.downloadId) !== entry) return false;
    this._store.delete(entry.downloadId);
    return true;
  }

  /** Aborta el intento activo y lo retira del registro. */
  cleanup(downloadId: string, reason: unknown): ActiveDownloadEntry | undefined {
    const active = this._store.get(downloadId);
    if (!active) return undefined;
    this._store.delete(downloadId);
    if (canTransition(active.state, DownloadState.PAUSED)) {
      active.state = DownloadState.PAUSED;
    }
    active.controller.abort(reason);
    return active;
  }

  /** Guarda la promesa del intento hasta que se resuelva. */
  trackSettling(downloadId: string, task: Promise<void>): void {
    const tracked = task.finally(() => {
      if (this._settling.get(downloadId) === tracked) this._settling.delete(downloadId);
    });
    this._settling.set(downloadId, tracked);
  }

  /** Resuelve cuando el intento actual (o el último pausado) ha terminado de deshacerse. */
  async whenSettled(downloadId: string): Promise<void> {
    await this._settling.get(downloadId);
  }

  async whenAllSettled(): Promise<void> {
    await Promise.all([...this._settling.values()]);
  }
}

export default DownloadManager;

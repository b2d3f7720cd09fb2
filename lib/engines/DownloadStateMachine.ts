/**
 * Máquina de estados explícita del ciclo de vida de una descarga.
 *
 * Las transiciones no listadas son inválidas; el orquestador consulta canTransition antes
 * de publicar cada cambio de estado de un intento vivo.
 *
 * @module DownloadStateMachine
 */

import { DownloadState, type DownloadStateType } from '../../shared/types';

/** Estados de descarga (mismos valores en minúsculas que ve la capa externa). */
export const STATE = DownloadState;

export type StateValue = DownloadStateType;

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * paused solo se alcanza por cancelación explícita; reanudar vuelve a queued.
 */
const TRANSITIONS: Record<StateValue, readonly StateValue[]> = {
  [STATE.QUEUED]: [STATE.DOWNLOADING, STATE.PAUSED, STATE.FAILED],
  [STATE.DOWNLOADING]: [STATE.PAUSED, STATE.MERGING, STATE.COMPLETED, STATE.FAILED],
  [STATE.PAUSED]: [STATE.QUEUED],
  [STATE.MERGING]: [STATE.COMPLETED, STATE.FAILED],
  [STATE.COMPLETED]: [STATE.QUEUED],
  [STATE.FAILED]: [STATE.QUEUED],
};

function isStateValue(value: string): value is StateValue {
  return Object.prototype.hasOwnProperty.call(TRANSITIONS, value);
}

/**
 * Indica si una transición de fromState a toState está permitida.
 * Los estados se comparan en minúsculas.
 */
export function canTransition(fromState: string, toState: string): boolean {
  const from = fromState.toLowerCase();
  const to = toState.toLowerCase();
  if (!isStateValue(from) || !isStateValue(to)) return false;
  return TRANSITIONS[from].includes(to);
}

/** Estados con trabajo en curso (red o disco). */
export const ACTIVE_STATES: readonly StateValue[] = [
  STATE.QUEUED,
  STATE.DOWNLOADING,
  STATE.MERGING,
];

export function isActiveState(state: string): boolean {
  const normalized = state.toLowerCase();
  return isStateValue(normalized) && ACTIVE_STATES.includes(normalized);
}

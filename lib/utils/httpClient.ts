/**
 * @fileoverview Cliente HTTP (axios) compartido por el prober y los descargadores.
 * @module utils/httpClient
 *
 * Todas las peticiones llevan User-Agent y `Accept-Encoding: identity`: los offsets de Range
 * se refieren a la entidad sin comprimir, así que no se negocia ni descomprime contenido.
 * validateStatus acepta cualquier código; cada llamador clasifica el status él mismo.
 */

import axios, { type AxiosInstance } from 'axios';
import type { NetworkConfig } from '../config.d';
import { NETWORK_ERRORS } from '../constants/errors';
import { errorCode } from './fileHelpers';

export type HttpClient = AxiosInstance;

export function createHttpClient(network: NetworkConfig): HttpClient {
  return axios.create({
    timeout: network.requestTimeout,
    maxRedirects: network.maxRedirects,
    maxContentLength: Infinity,
    maxBodyLength: Infinity,
    decompress: false,
    validateStatus: () => true,
    headers: {
      'User-Agent': network.userAgent,
      'Accept-Encoding': 'identity',
      Accept: '*/*',
    },
  });
}

/** Lee una cabecera de respuesta (axios las normaliza a minúsculas). */
export function readHeader(headers: Record<string, unknown>, name: string): string | undefined {
  const raw = headers[name.toLowerCase()];
  if (Array.isArray(raw)) return raw.length > 0 ? String(raw[0]) : undefined;
  if (raw === undefined || raw === null) return undefined;
  return String(raw);
}

/** Entero no negativo de una cabecera, o null si falta o no es numérico. */
export function readIntegerHeader(headers: Record<string, unknown>, name: string): number | null {
  const value = readHeader(headers, name);
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

const NETWORK_ERROR_CODES: Record<string, string> = {
  ECONNREFUSED: NETWORK_ERRORS.CONNECTION_REFUSED,
  ECONNRESET: NETWORK_ERRORS.CONNECTION_RESET,
  EPIPE: NETWORK_ERRORS.CONNECTION_CLOSED,
  ERR_STREAM_PREMATURE_CLOSE: NETWORK_ERRORS.CONNECTION_CLOSED,
  ETIMEDOUT: NETWORK_ERRORS.TIMEOUT,
  ECONNABORTED: NETWORK_ERRORS.TIMEOUT,
  ENOTFOUND: NETWORK_ERRORS.HOST_UNREACHABLE,
  EHOSTUNREACH: NETWORK_ERRORS.HOST_UNREACHABLE,
  EAI_AGAIN: NETWORK_ERRORS.HOST_UNREACHABLE,
  ERR_NETWORK: NETWORK_ERRORS.CONNECTION_FAILED,
};

/**
 * Mensaje legible para errores de red (axios o socket), o null si el error no tiene un
 * código de red conocido.
 */
export function describeNetworkError(error: unknown): string | null {
  const code = errorCode(error);
  if (!code) return null;
  const message = NETWORK_ERROR_CODES[code];
  return message ? `${message} (${code})` : null;
}

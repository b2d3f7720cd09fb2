/**
 * @fileoverview Operaciones de archivo compartidas por los descargadores y el ensamblador.
 * @module utils/fileHelpers
 */

import { promises as fs } from 'fs';
import { createScopedLogger } from './logger';

const log = createScopedLogger('FileHelpers');

/**
 * Código errno/axios del error. No usa instanceof: los errores de fs pueden venir de otro realm
 * (vm, Jest) y no heredan del Error local.
 */
function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

/** Tamaño del archivo o 0 si no existe. */
export async function fileSizeOrZero(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return 0;
    throw error;
  }
}

/** Elimina el archivo; ENOENT no es error. Devuelve true si existía. */
export async function safeUnlink(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Mueve `source` a `target` reemplazando cualquier archivo previo en el destino.
 * Entre dispositivos distintos (EXDEV) cae a copia + borrado del origen.
 */
export async function replaceFile(source: string, target: string): Promise<void> {
  await safeUnlink(target);
  try {
    await fs.rename(source, target);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') throw error;
    log.debug(`rename entre dispositivos, copiando ${source} → ${target}`);
    await fs.copyFile(source, target);
    await safeUnlink(source);
  }
}

/** Traduce errores de disco frecuentes a mensajes legibles; el resto se devuelve tal cual. */
export function describeFsError(
  error: unknown,
  messages: { diskFull: string; noPermission: string }
): unknown {
  const code = errorCode(error);
  if (code === 'ENOSPC') return new Error(messages.diskFull, { cause: error });
  if (code === 'EACCES' || code === 'EPERM') {
    return new Error(messages.noPermission, { cause: error });
  }
  return error;
}

export { errorCode };

/**
 * @fileoverview Constantes de mensajes de error compartidas entre el motor y sus consumidores.
 * @module shared/constants/errors
 *
 * Fuente única de verdad para textos de error. El motor (lib) reexporta este módulo desde
 * lib/constants/errors para poder importar desde su propia ruta manteniendo coherencia.
 */

// =====================
// ERRORES DE DESCARGA
// =====================

export const DOWNLOAD_ERRORS: Record<string, string> = {
  INVALID_RESPONSE: 'Respuesta HTTP inválida',
  MISSING_CONTENT_LENGTH: 'El servidor no informó un tamaño de archivo utilizable',
  RANGE_NOT_SUPPORTED: 'El servidor no soporta descargas por rangos',
  MERGE_FAILED: 'Error al fusionar los fragmentos descargados',
  CHUNK_NOT_READABLE: 'No se pudo abrir el fragmento para la fusión',
  CHUNK_INCOMPLETE: 'Fragmento incompleto: la conexión terminó antes de tiempo',
  CHUNK_OVERFLOW: 'El servidor envió más bytes de los solicitados para el fragmento',
  CHUNK_FILE_TOO_LARGE: 'El archivo temporal del fragmento excede el tamaño del rango',
  SINGLE_STREAM_FAILED: 'Error en la descarga por stream único',
  CANCELLED: 'Descarga cancelada',
  ALREADY_ACTIVE: 'La descarga ya está en curso',
};

// =====================
// ERRORES DE RED
// =====================

export const NETWORK_ERRORS: Record<string, string> = {
  CONNECTION_FAILED: 'No se pudo conectar al servidor',
  TIMEOUT: 'Tiempo de espera agotado',
  CONNECTION_REFUSED: 'Conexión rechazada por el servidor',
  CONNECTION_RESET: 'Conexión reiniciada por el servidor',
  CONNECTION_CLOSED: 'Conexión cerrada inesperadamente',
  HOST_UNREACHABLE: 'Servidor no alcanzable',
  NO_BODY: 'La respuesta no contiene cuerpo',
};

// =====================
// ERRORES DE VALIDACIÓN
// =====================

export const VALIDATION_ERRORS: Record<string, string> = {
  ID_REQUIRED: 'El identificador de descarga es obligatorio',
  URL_INVALID: 'URL no válida: solo se admiten http y https',
  SAVE_PATH_REQUIRED: 'La ruta de guardado es obligatoria',
  SEGMENTS_MUST_BE_INTEGER: 'El número de segmentos debe ser un entero',
  CHUNK_INDEX_INVALID: 'El índice de fragmento debe ser un entero no negativo',
  CHUNK_RANGE_INVALID: 'El byte final del fragmento no puede ser menor que el inicial',
  CHUNK_BYTES_EXCEEDED: 'Los bytes descargados exceden el tamaño del fragmento',
  CHUNK_PLAN_NOT_CONTIGUOUS: 'El plan de fragmentos debe ser contiguo, ordenado y empezar en 0',
  TEMP_FILE_REQUIRED: 'El fragmento debe tener un archivo temporal',
  TEMP_FILE_INVALID: 'El nombre del archivo temporal del fragmento no es válido',
  TEMP_FILE_DUPLICATE: 'Dos fragmentos del plan no pueden compartir archivo temporal',
  VALIDATION_ERROR: 'Error de validación',
};

// =====================
// ERRORES DE ARCHIVOS
// =====================

export const FILE_ERRORS: Record<string, string> = {
  DISK_FULL: 'Disco lleno: no hay espacio suficiente para el archivo final',
  NO_PERMISSION: 'Sin permisos de escritura en el destino',
};

// =====================
// OBJETO UNIFICADO
// =====================

/** Objeto unificado de errores por categoría (DOWNLOAD, NETWORK, VALIDATION, FILE). */
export interface ErrorsMap {
  DOWNLOAD: Record<string, string>;
  NETWORK: Record<string, string>;
  VALIDATION: Record<string, string>;
  FILE: Record<string, string>;
}

export const ERRORS: ErrorsMap = {
  DOWNLOAD: DOWNLOAD_ERRORS,
  NETWORK: NETWORK_ERRORS,
  VALIDATION: VALIDATION_ERRORS,
  FILE: FILE_ERRORS,
};

export default ERRORS;

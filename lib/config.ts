/**
 * Configuración por defecto del motor (valores de runtime).
 *
 * Aquí se definen cabeceras HTTP, tamaños de bloque, límites de segmentos y rutas temporales.
 * Algunas claves pueden sobrescribirse con variables de entorno (SEGDL_*); los ajustes por
 * instancia se pasan a DownloadEngine como `settings` y se validan con zod allí.
 *
 * @module config
 */

import os from 'os';
import path from 'path';
import type { AppConfig } from './config.d';

const env = process.env;

const config: AppConfig = {
  network: {
    userAgent:
      env.SEGDL_USER_AGENT ??
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) segdl/0.1',
    requestTimeout: 0,
    maxRedirects: 5,
  },

  downloads: {
    segmented: {
      defaultSegments: 4,
      maxSegments: 8,
      writeBlockSize: 32 * 1024,
      mergeBlockSize: 256 * 1024,
      fallbackOnAnyError: true,
    },
  },

  logging: {
    consoleLevel: env.SEGDL_LOG_LEVEL ?? 'info',
    fileLevel: env.SEGDL_FILE_LOG_LEVEL ?? 'off',
  },

  paths: {
    tempRoot: env.SEGDL_TEMP_DIR ?? path.join(os.tmpdir(), 'segdl'),
  },
};

export default config;

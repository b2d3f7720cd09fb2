/**
 * Tipos para la configuración centralizada del motor.
 *
 * La implementación concreta y valores por defecto están en config.ts.
 */
export interface NetworkConfig {
  /** Cabecera User-Agent enviada en todas las peticiones. */
  userAgent: string;
  /** Timeout de socket en ms; 0 = sin timeout (depende del transporte). */
  requestTimeout: number;
  maxRedirects: number;
}

export interface SegmentedConfig {
  defaultSegments: number;
  maxSegments: number;
  /** Tamaño del bloque de escritura de cada rango (bytes). */
  writeBlockSize: number;
  /** Tamaño del bloque de lectura/escritura durante la fusión (bytes). */
  mergeBlockSize: number;
  /** true: cualquier fallo del modo segmentado reintenta con stream único. */
  fallbackOnAnyError: boolean;
}

export interface LoggingConfig {
  consoleLevel: string;
  fileLevel: string;
}

export interface AppConfig {
  /** Cabeceras y límites del cliente HTTP. */
  network: NetworkConfig;
  /** Parámetros del motor de descargas por rangos. */
  downloads: {
    segmented: SegmentedConfig;
  };
  /** Niveles de log por transporte ('off' deshabilita). */
  logging: LoggingConfig;
  /** Raíz de directorios temporales (uno por descarga). */
  paths: {
    tempRoot: string;
  };
}

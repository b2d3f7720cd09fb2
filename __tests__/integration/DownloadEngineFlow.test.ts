/**
 * Tests de integración del motor de descargas.
 *
 * Prueba la coordinación entre componentes reales del motor contra un servidor HTTP en proceso:
 * - RangeProber + ChunkPlanner + ChunkDownloader + FileAssembler en modo segmentado
 * - SimpleDownloader cuando no hay rangos y como fallback
 * - pausa y reanudación con el plan publicado en los snapshots
 * - cancelación y cierre del motor
 *
 * Cada test usa un EventBus propio y un directorio temporal bajo os.tmpdir().
 */
import { promises as fs } from 'fs';
import path from 'path';
import { DownloadEngine } from '../../lib/engines/DownloadEngine';
import {
  EventBus,
  type FallbackStartedPayload,
  type MergeStartedPayload,
} from '../../lib/engines/EventBus';
import type {
  DownloadCompletedPayload,
  DownloadFailedPayload,
  ProgressSnapshot,
} from '../../lib/engines/types';
import type { EngineSettingsInput } from '../../lib/utils/schemas';
import { NETWORK_ERRORS, VALIDATION_ERRORS } from '../../lib/constants/errors';
import { RangeServer, makeContent, makeTempDir } from '../helpers/RangeServer';

type Outcome =
  | { type: 'completed'; payload: DownloadCompletedPayload }
  | { type: 'failed'; payload: DownloadFailedPayload };

interface EventRecord {
  progress: ProgressSnapshot[];
  completed: DownloadCompletedPayload[];
  failed: DownloadFailedPayload[];
  merges: MergeStartedPayload[];
  fallbacks: FallbackStartedPayload[];
}

function recordEvents(bus: EventBus): EventRecord {
  const record: EventRecord = { progress: [], completed: [], failed: [], merges: [], fallbacks: [] };
  bus.on('downloadProgress', snapshot => record.progress.push(snapshot));
  bus.on('downloadCompleted', payload => record.completed.push(payload));
  bus.on('downloadFailed', payload => record.failed.push(payload));
  bus.on('mergeStarted', payload => record.merges.push(payload));
  bus.on('fallbackStarted', payload => record.fallbacks.push(payload));
  return record;
}

function waitForOutcome(bus: EventBus, downloadId: string): Promise<Outcome> {
  return new Promise(resolve => {
    const onCompleted = (payload: DownloadCompletedPayload): void => {
      if (payload.downloadId !== downloadId) return;
      detach();
      resolve({ type: 'completed', payload });
    };
    const onFailed = (payload: DownloadFailedPayload): void => {
      if (payload.downloadId !== downloadId) return;
      detach();
      resolve({ type: 'failed', payload });
    };
    const detach = (): void => {
      bus.off('downloadCompleted', onCompleted);
      bus.off('downloadFailed', onFailed);
    };
    bus.on('downloadCompleted', onCompleted);
    bus.on('downloadFailed', onFailed);
  });
}

function waitForProgress(
  bus: EventBus,
  predicate: (_snapshot: ProgressSnapshot) => boolean
): Promise<ProgressSnapshot> {
  return new Promise(resolve => {
    const onProgress = (snapshot: ProgressSnapshot): void => {
      if (!predicate(snapshot)) return;
      bus.off('downloadProgress', onProgress);
      resolve(snapshot);
    };
    bus.on('downloadProgress', onProgress);
  });
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('DownloadEngine Integration', () => {
  const total = 100_000;
  const content = makeContent(total);
  const downloadId = 'dl-integration';
  let server: RangeServer;
  let tempRoot: string;
  let savePath: string;
  let bus: EventBus;
  let events: EventRecord;
  let engine: DownloadEngine;

  function createEngine(settings: EngineSettingsInput = {}): DownloadEngine {
    return new DownloadEngine({
      settings: {
        tempRoot: path.join(tempRoot, 'chunks'),
        writeBlockSize: 4096,
        mergeBlockSize: 8192,
        defaultSegments: 4,
        ...settings,
      },
      deps: { eventBus: bus },
    });
  }

  function request() {
    return { id: downloadId, url: server.url, savePath };
  }

  beforeEach(async () => {
    server = new RangeServer(content);
    await server.start();
    tempRoot = makeTempDir('engine');
    savePath = path.join(tempRoot, 'out', 'test.bin');
    bus = new EventBus();
    events = recordEvents(bus);
    engine = createEngine();
  });

  afterEach(async () => {
    await engine.close();
    bus.clear();
    await server.stop();
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  // -----------------------------------------------------------------------
  // Modo segmentado
  // -----------------------------------------------------------------------
  describe('descarga segmentada', () => {
    it('debe descargar por rangos, fusionar y limpiar los temporales', async () => {
      const outcome = waitForOutcome(bus, downloadId);

      expect(engine.enqueue(request())).toBe(true);
      expect(engine.isActive(downloadId)).toBe(true);
      const result = await outcome;

      expect(result.type).toBe('completed');
      expect(result.payload).toMatchObject({ downloadId, savePath, mode: 'segmented' });
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
      expect(server.rangeRequests().sort()).toEqual(
        ['bytes=0-24999', 'bytes=25000-49999', 'bytes=50000-74999', 'bytes=75000-99999'].sort()
      );
      expect(events.merges).toEqual([
        expect.objectContaining({ downloadId, chunkCount: 4 }),
      ]);
      expect(engine.activeCount).toBe(0);
      expect(engine.getState(downloadId)).toBeNull();

      await engine.whenSettled(downloadId);
      expect(await engine.chunkStore.hasChunkDir(downloadId)).toBe(false);
      expect(await exists(`${savePath}.partial`)).toBe(false);
    });

    it('debe publicar progreso monótono que termina en completed', async () => {
      const outcome = waitForOutcome(bus, downloadId);
      engine.enqueue(request());
      await outcome;

      const bytes = events.progress.map(s => s.downloadedBytes);
      for (let i = 1; i < bytes.length; i++) {
        expect(bytes[i]).toBeGreaterThanOrEqual(bytes[i - 1]);
      }
      expect(events.progress.some(s => s.state === 'merging')).toBe(true);
      const last = events.progress[events.progress.length - 1];
      expect(last).toMatchObject({ state: 'completed', progress: 1, downloadedBytes: total });
      expect(last.chunks).toHaveLength(4);
    });

    it('debe ignorar un segundo enqueue del mismo id mientras está activo', async () => {
      const outcome = waitForOutcome(bus, downloadId);

      expect(engine.enqueue(request())).toBe(true);
      expect(engine.enqueue(request())).toBe(false);
      await outcome;

      expect(events.completed).toHaveLength(1);
    });
  });

  // -----------------------------------------------------------------------
  // Stream único y fallback
  // -----------------------------------------------------------------------
  describe('stream único', () => {
    it('debe usar un solo GET si el servidor no soporta rangos', async () => {
      server.configure({ supportsRanges: false, advertiseRanges: false });
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.payload).toMatchObject({ mode: 'single' });
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
      expect(server.requests).toEqual([
        { method: 'HEAD', range: null },
        { method: 'GET', range: null },
      ]);
      expect(events.progress.every(s => s.chunks.length === 0)).toBe(true);
      expect(events.merges).toHaveLength(0);
    });

    it('debe completar con tamaño desconocido', async () => {
      server.configure({
        supportsRanges: false,
        advertiseRanges: false,
        sendContentLength: false,
      });
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.payload).toMatchObject({ mode: 'single' });
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
      expect(events.progress.every(s => s.totalBytes === 0 && s.progress === 0)).toBe(true);
    });

    it('debe caer a stream único cuando falla un rango', async () => {
      server.configure({ failRangeStarts: [25000] });
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.payload).toMatchObject({ mode: 'single' });
      expect(events.fallbacks).toHaveLength(1);
      expect(events.fallbacks[0].reason).toContain('HTTP 500');
      expect(events.failed).toHaveLength(0);
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
      expect(server.requests[server.requests.length - 1]).toEqual({ method: 'GET', range: null });
    });

    it('debe caer a stream único si el servidor anuncia rangos pero responde 200', async () => {
      await engine.close();
      engine = createEngine({ fallbackOnAnyError: false });
      server.configure({ supportsRanges: false, advertiseRanges: true });
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.payload).toMatchObject({ mode: 'single' });
      expect(events.fallbacks).toHaveLength(1);
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
    });

    it('sin fallbackOnAnyError un error HTTP de rango debe fallar la descarga', async () => {
      await engine.close();
      engine = createEngine({ fallbackOnAnyError: false });
      server.configure({ failRangeStarts: [25000] });
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.type).toBe('failed');
      expect(result.payload).toMatchObject({ downloadId, kind: 'invalid_response' });
      expect(events.fallbacks).toHaveLength(0);
      expect(await exists(savePath)).toBe(false);
      expect(engine.activeCount).toBe(0);
    });

    it('debe describir los errores de conexión en downloadFailed', async () => {
      await server.stop();
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.type).toBe('failed');
      expect(result.payload).toMatchObject({
        kind: 'unknown',
        error: `${NETWORK_ERRORS.CONNECTION_REFUSED} (ECONNREFUSED)`,
      });
    });

    it('debe publicar downloadFailed si el recurso no existe', async () => {
      server.configure({ headStatus: 404, getStatus: 404 });
      const outcome = waitForOutcome(bus, downloadId);

      engine.enqueue(request());
      const result = await outcome;

      expect(result.type).toBe('failed');
      expect(result.payload).toMatchObject({ kind: 'invalid_response' });
      expect(events.completed).toHaveLength(0);
    });
  });

  // -----------------------------------------------------------------------
  // Pausa, reanudación, cancelación
  // -----------------------------------------------------------------------
  describe('ciclo de vida', () => {
    beforeEach(() => {
      server.configure({ writeDelayMs: 20, writePieceSize: 1000 });
    });

    it('debe pausar sin eventos y reanudar desde los bytes en disco', async () => {
      const firstProgress = waitForProgress(bus, s => s.downloadedBytes > 0);
      engine.enqueue(request());
      await firstProgress;

      expect(engine.pause(downloadId)).toBe(true);
      expect(engine.activeCount).toBe(0);
      expect(engine.pause(downloadId)).toBe(false);
      await engine.whenSettled(downloadId);

      const pausedSnapshot = events.progress[events.progress.length - 1];
      expect(events.completed).toHaveLength(0);
      expect(events.failed).toHaveLength(0);
      expect(pausedSnapshot.chunks).toHaveLength(4);

      server.configure({ writeDelayMs: 0 });
      const progressBeforeResume = events.progress.length;
      const outcome = waitForOutcome(bus, downloadId);
      expect(engine.resume({ ...request(), chunks: pausedSnapshot.chunks })).toBe(true);
      const result = await outcome;

      expect(result.payload).toMatchObject({ mode: 'segmented' });
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
      const resumedStart = events.progress[progressBeforeResume];
      expect(resumedStart.downloadedBytes).toBeGreaterThanOrEqual(pausedSnapshot.downloadedBytes);
      expect(resumedStart.downloadedBytes).toBeGreaterThan(0);
    });

    it('debe completar tras varias pausas seguidas de reanudación inmediata', async () => {
      server.configure({ writeDelayMs: 10 });
      const outcome = waitForOutcome(bus, downloadId);

      // Pausa y reanudación antes de que el primer intento haga nada.
      expect(engine.enqueue(request())).toBe(true);
      expect(engine.pause(downloadId)).toBe(true);
      expect(engine.activeCount).toBe(0);
      expect(engine.resume(request())).toBe(true);

      for (const threshold of [5000, 20000, 35000, 50000]) {
        await waitForProgress(
          bus,
          s => s.state === 'downloading' && s.downloadedBytes >= threshold
        );
        const last = events.progress[events.progress.length - 1];

        expect(engine.pause(downloadId)).toBe(true);
        expect(engine.activeCount).toBe(0);
        expect(engine.getState(downloadId)).toBeNull();
        expect(engine.resume({ ...request(), chunks: last.chunks })).toBe(true);
      }

      const result = await outcome;
      expect(result.type).toBe('completed');
      expect(result.payload).toMatchObject({ mode: 'segmented' });
      expect(events.completed).toHaveLength(1);
      expect(events.failed).toHaveLength(0);
      expect((await fs.readFile(savePath)).equals(content)).toBe(true);
    });

    it('debe cancelar eliminando los temporales y sin publicar resultado', async () => {
      const firstProgress = waitForProgress(bus, s => s.downloadedBytes > 0);
      engine.enqueue(request());
      await firstProgress;

      expect(await engine.cancel(downloadId)).toBe(true);

      expect(engine.activeCount).toBe(0);
      expect(await engine.chunkStore.hasChunkDir(downloadId)).toBe(false);
      expect(await exists(savePath)).toBe(false);
      expect(events.completed).toHaveLength(0);
      expect(events.failed).toHaveLength(0);
      expect(await engine.cancel(downloadId)).toBe(false);
    });

    it('close debe detener todas las descargas activas', async () => {
      const firstProgress = waitForProgress(bus, s => s.downloadedBytes > 0);
      engine.enqueue(request());
      engine.enqueue({ id: 'dl-otra', url: server.url, savePath: path.join(tempRoot, 'out', 'otra.bin') });
      await firstProgress;

      await engine.close();

      expect(engine.activeCount).toBe(0);
      expect(events.completed).toHaveLength(0);
      expect(events.failed).toHaveLength(0);
    });
  });

  // -----------------------------------------------------------------------
  // Validación
  // -----------------------------------------------------------------------
  describe('validación', () => {
    it('debe lanzar ante una petición inválida sin registrar nada', () => {
      expect(() => engine.enqueue({ id: '', url: 'ftp://example.test/x', savePath })).toThrow(
        VALIDATION_ERRORS.ID_REQUIRED
      );
      expect(engine.activeCount).toBe(0);
    });

    it('debe rechazar un plan cuyos rangos comparten archivo temporal', () => {
      const chunks = [
        { chunkIndex: 0, startByte: 0, endByte: 49999, downloadedBytes: 0, tempFile: 'x' },
        { chunkIndex: 1, startByte: 50000, endByte: 99999, downloadedBytes: 0, tempFile: 'x' },
      ];

      expect(() => engine.resume({ ...request(), chunks })).toThrow(
        VALIDATION_ERRORS.TEMP_FILE_DUPLICATE
      );
      expect(engine.activeCount).toBe(0);
      expect(server.requests).toHaveLength(0);
    });

    it('debe rechazar ajustes fuera de rango', () => {
      expect(() => createEngine({ defaultSegments: 20 })).toThrow('Error de validación');
    });
  });
});

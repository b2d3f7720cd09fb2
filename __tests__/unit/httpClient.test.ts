/**
 * Tests unitarios para lib/utils/httpClient.ts
 */
import config from '../../lib/config';
import { NETWORK_ERRORS } from '../../lib/constants/errors';
import {
  createHttpClient,
  describeNetworkError,
  readHeader,
  readIntegerHeader,
} from '../../lib/utils/httpClient';

describe('httpClient', () => {
  describe('createHttpClient', () => {
    it('debe pedir la entidad sin comprimir y aceptar cualquier status', () => {
      const client = createHttpClient(config.network);

      expect(client.defaults.headers['User-Agent']).toBe(config.network.userAgent);
      expect(client.defaults.headers['Accept-Encoding']).toBe('identity');
      expect(client.defaults.decompress).toBe(false);
      expect(client.defaults.validateStatus?.(416)).toBe(true);
      expect(client.defaults.maxRedirects).toBe(config.network.maxRedirects);
    });
  });

  describe('readHeader', () => {
    it('debe leer cabeceras en minúsculas y el primer valor de una lista', () => {
      const headers = { 'content-range': 'bytes 0-0/10', 'set-cookie': ['a=1', 'b=2'] };

      expect(readHeader(headers, 'Content-Range')).toBe('bytes 0-0/10');
      expect(readHeader(headers, 'set-cookie')).toBe('a=1');
      expect(readHeader(headers, 'accept-ranges')).toBeUndefined();
    });
  });

  describe('readIntegerHeader', () => {
    it('debe aceptar solo enteros no negativos representables', () => {
      expect(readIntegerHeader({ 'content-length': '1234' }, 'content-length')).toBe(1234);
      expect(readIntegerHeader({ 'content-length': ' 42 ' }, 'content-length')).toBe(42);
      expect(readIntegerHeader({ 'content-length': 500 }, 'content-length')).toBe(500);
      expect(readIntegerHeader({ 'content-length': '-1' }, 'content-length')).toBeNull();
      expect(readIntegerHeader({ 'content-length': '1.5' }, 'content-length')).toBeNull();
      expect(readIntegerHeader({ 'content-length': '99999999999999999999' }, 'content-length')).toBeNull();
      expect(readIntegerHeader({}, 'content-length')).toBeNull();
    });
  });

  describe('describeNetworkError', () => {
    it('debe traducir códigos de red conocidos', () => {
      const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      expect(describeNetworkError(reset)).toBe(`${NETWORK_ERRORS.CONNECTION_RESET} (ECONNRESET)`);
      const dns = Object.assign(new Error('getaddrinfo'), { code: 'ENOTFOUND' });
      expect(describeNetworkError(dns)).toBe(`${NETWORK_ERRORS.HOST_UNREACHABLE} (ENOTFOUND)`);
    });

    it('debe devolver null para errores sin código de red', () => {
      expect(describeNetworkError(new Error('otro'))).toBeNull();
      expect(describeNetworkError(Object.assign(new Error('disco'), { code: 'EIO' }))).toBeNull();
      expect(describeNetworkError('ECONNRESET')).toBeNull();
    });
  });
});

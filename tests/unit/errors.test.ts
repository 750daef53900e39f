/**
 * Error Classes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  HarvestError,
  FetchError,
  ExtractionError,
  AdapterError,
  UnknownSourceError,
  UsageError,
  ConfigurationError,
  DuplicateSourceError,
  errorMessage,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('HarvestError', () => {
    it('should carry message, code and details', () => {
      const error = new HarvestError('Test error', 'TEST_CODE', { source: 'alx' });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('HarvestError');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toEqual({ source: 'alx' });
    });
  });

  describe('FetchError', () => {
    it('should record the url, failure kind and attempts', () => {
      const error = new FetchError('GET https://x.test -> 503', 'https://x.test', 'status', 3, 503);

      expect(error.code).toBe('FETCH_ERROR');
      expect(error.name).toBe('FetchError');
      expect(error.details).toEqual({ url: 'https://x.test', kind: 'status', attempts: 3, status: 503 });
    });

    it('should treat everything except cancellation as retryable', () => {
      expect(new FetchError('m', 'u', 'status', 1, 404).retryable).toBe(true);
      expect(new FetchError('m', 'u', 'network', 1).retryable).toBe(true);
      expect(new FetchError('m', 'u', 'timeout', 1).retryable).toBe(true);
      expect(new FetchError('m', 'u', 'aborted', 1).retryable).toBe(false);
    });
  });

  describe('AdapterError', () => {
    it('should keep the source and cause', () => {
      const cause = new Error('socket hang up');
      const error = new AdapterError('ALX Africa: failed', 'alx', cause);

      expect(error.code).toBe('ADAPTER_ERROR');
      expect(error.source).toBe('alx');
      expect(error.cause).toBe(cause);
    });

    it('should wrap foreign errors with the display name', () => {
      const wrapped = AdapterError.wrap('alx', new TypeError('bad markup'), 'ALX Africa');

      expect(wrapped.message).toBe('ALX Africa: bad markup');
      expect(wrapped.source).toBe('alx');
    });

    it('should pass adapter errors through unchanged', () => {
      const original = new AdapterError('already wrapped', 'alx');

      expect(AdapterError.wrap('alx', original)).toBe(original);
    });

    it('should wrap non-error values', () => {
      expect(AdapterError.wrap('alx', 'plain string').message).toBe('alx: plain string');
    });
  });

  describe('selection and configuration errors', () => {
    it('should point unknown keys to --list-sites', () => {
      const error = new UnknownSourceError('nonexistent');

      expect(error.message).toBe('Unknown site key: nonexistent. Use --list-sites to see options.');
      expect(error.code).toBe('UNKNOWN_SOURCE');
    });

    it('should use distinct codes', () => {
      expect(new UsageError('x').code).toBe('USAGE_ERROR');
      expect(new ExtractionError('x').code).toBe('EXTRACTION_ERROR');
      expect(new ConfigurationError('x').code).toBe('CONFIGURATION_ERROR');
    });

    it('should make duplicate keys a configuration error', () => {
      const error = new DuplicateSourceError('alx');

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.code).toBe('DUPLICATE_SOURCE');
      expect(error.message).toBe('Source key registered twice: alx');
    });
  });

  it('should read messages from any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

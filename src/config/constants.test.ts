/**
 * Tests for centralized configuration constants
 */
import { describe, it, expect } from 'vitest';
import { QUERY_DEFAULTS, EXPORT_DEFAULTS, AUTH_DEFAULTS, REMOTE_DEFAULTS } from './constants.js';

describe('Configuration Constants', () => {
  describe('QUERY_DEFAULTS', () => {
    it('has sensible default values', () => {
      expect(QUERY_DEFAULTS.TIMEOUT_SECONDS).toBe(30);
      expect(QUERY_DEFAULTS.RETRY_COUNT).toBe(0);
      expect(QUERY_DEFAULTS.BACKOFF_BASE_MS).toBe(1000);
      expect(QUERY_DEFAULTS.CONCURRENCY_LIMIT).toBe(15);
    });

    it('page cap is positive', () => {
      expect(QUERY_DEFAULTS.MAX_PAGES).toBeGreaterThan(0);
    });
  });

  describe('EXPORT_DEFAULTS', () => {
    it('exports CSV only with expansion on', () => {
      expect(EXPORT_DEFAULTS.OUTPUT_FOLDER).toBe('./output');
      expect(EXPORT_DEFAULTS.EXPORT_CSV).toBe(true);
      expect(EXPORT_DEFAULTS.EXPORT_JSON).toBe(false);
      expect(EXPORT_DEFAULTS.PARSE_DYNAMICS).toBe(true);
      expect(EXPORT_DEFAULTS.PAGE_BUFFER_SIZE).toBe(100);
    });
  });

  describe('AUTH_DEFAULTS', () => {
    it('refreshes five minutes ahead of expiry', () => {
      expect(AUTH_DEFAULTS.REFRESH_BUFFER_MS).toBe(300_000);
      expect(AUTH_DEFAULTS.VALIDATION_INTERVAL_MS).toBe(300_000);
    });
  });

  describe('REMOTE_DEFAULTS', () => {
    it('scopes match their base URLs', () => {
      expect(REMOTE_DEFAULTS.QUERY_SCOPE.startsWith(REMOTE_DEFAULTS.QUERY_BASE_URL)).toBe(true);
      expect(REMOTE_DEFAULTS.MANAGEMENT_SCOPE.startsWith(REMOTE_DEFAULTS.MANAGEMENT_BASE_URL)).toBe(true);
    });
  });
});

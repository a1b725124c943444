/**
 * Property-based tests for Kubernetes error handling utilities
 */

import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  formatKubernetesError,
  getErrorStatusCode,
  isNotFoundError,
} from '../../../src/core/kubernetes/errors.js';

describe('Kubernetes Error Handling Utilities', () => {
  describe('getErrorStatusCode', () => {
    it('should extract status code from direct statusCode property', () => {
      fc.assert(
        fc.property(fc.integer({ min: 100, max: 599 }), (statusCode) => {
          expect(getErrorStatusCode({ statusCode })).toBe(statusCode);
        }),
        { numRuns: 100 }
      );
    });

    it('should extract status code from ApiException code', () => {
      fc.assert(
        fc.property(fc.integer({ min: 100, max: 599 }), (code) => {
          expect(getErrorStatusCode({ code, body: '{"kind":"Status"}' })).toBe(code);
        }),
        { numRuns: 100 }
      );
    });

    it('should extract status code from response.statusCode', () => {
      fc.assert(
        fc.property(fc.integer({ min: 100, max: 599 }), (statusCode) => {
          expect(getErrorStatusCode({ response: { statusCode } })).toBe(statusCode);
        }),
        { numRuns: 100 }
      );
    });

    it('should extract status code from body.code', () => {
      fc.assert(
        fc.property(fc.integer({ min: 100, max: 599 }), (code) => {
          expect(getErrorStatusCode({ body: { code } })).toBe(code);
        }),
        { numRuns: 100 }
      );
    });

    it('should ignore string codes of system errors', () => {
      expect(getErrorStatusCode({ code: 'ECONNREFUSED' })).toBeUndefined();
    });

    it('should return undefined for values without a status', () => {
      expect(getErrorStatusCode(undefined)).toBeUndefined();
      expect(getErrorStatusCode('boom')).toBeUndefined();
      expect(getErrorStatusCode(new Error('boom'))).toBeUndefined();
    });
  });

  describe('isNotFoundError', () => {
    it('should be true only for 404', () => {
      fc.assert(
        fc.property(fc.integer({ min: 100, max: 599 }), (statusCode) => {
          expect(isNotFoundError({ statusCode })).toBe(statusCode === 404);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('formatKubernetesError', () => {
    it('should include status, reason and message', () => {
      expect(
        formatKubernetesError({ statusCode: 403, body: { reason: 'Forbidden', message: 'denied' } })
      ).toBe('Kubernetes API error (403): Forbidden: denied');
    });

    it('should fall back to the error message', () => {
      expect(formatKubernetesError(new Error('socket hang up'))).toBe('Kubernetes API error: socket hang up');
    });

    it('should stringify non-object values', () => {
      expect(formatKubernetesError('plain failure')).toBe('plain failure');
    });
  });
});

/**
 * Property-based tests for Kubernetes error handling utilities
 */

import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  formatKubernetesError,
  getErrorMessage,
  getErrorReason,
  getErrorStatusCode,
} from '../../../src/core/kubernetes/errors.js';
import { getStatusBody, hasStatusCode } from '../../../src/core/kubernetes/type-guards.js';

const statusCodes = fc.integer({ min: 100, max: 599 });

describe('Kubernetes Error Handling Utilities', () => {
  describe('getErrorStatusCode', () => {
    it('should extract status code from direct statusCode property (0.x style)', () => {
      fc.assert(
        fc.property(statusCodes, (statusCode) => {
          expect(getErrorStatusCode({ statusCode })).toBe(statusCode);
        }),
        { numRuns: 100 }
      );
    });

    it('should extract status code from code property (1.x ApiException)', () => {
      fc.assert(
        fc.property(statusCodes, (code) => {
          const error = Object.assign(new Error('HTTP request failed'), { code });
          expect(getErrorStatusCode(error)).toBe(code);
        }),
        { numRuns: 100 }
      );
    });

    it('should extract status code from response.statusCode', () => {
      fc.assert(
        fc.property(statusCodes, (statusCode) => {
          expect(getErrorStatusCode({ response: { statusCode } })).toBe(statusCode);
        }),
        { numRuns: 100 }
      );
    });

    it('should extract status code from body.code, parsed or raw', () => {
      fc.assert(
        fc.property(statusCodes, (code) => {
          expect(getErrorStatusCode({ body: { code } })).toBe(code);
          expect(getErrorStatusCode({ body: JSON.stringify({ code }) })).toBe(code);
        }),
        { numRuns: 100 }
      );
    });

    it('should prioritize direct statusCode over nested properties', () => {
      fc.assert(
        fc.property(statusCodes, statusCodes, statusCodes, (directCode, responseCode, bodyCode) => {
          const error = {
            statusCode: directCode,
            response: { statusCode: responseCode },
            body: { code: bodyCode },
          };
          expect(getErrorStatusCode(error)).toBe(directCode);
        }),
        { numRuns: 100 }
      );
    });

    it('should ignore string codes such as node system errors', () => {
      expect(getErrorStatusCode({ code: 'ECONNREFUSED' })).toBeUndefined();
    });

    it('should return undefined for non-object errors', () => {
      fc.assert(
        fc.property(fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.constant(null)), (error) => {
          expect(getErrorStatusCode(error)).toBeUndefined();
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('getErrorReason', () => {
    it('should extract reason from body', () => {
      expect(getErrorReason({ body: { reason: 'NotFound' } })).toBe('NotFound');
      expect(getErrorReason({ body: '{"reason":"AlreadyExists"}' })).toBe('AlreadyExists');
    });

    it('should return undefined when no reason', () => {
      expect(getErrorReason({ code: 404 })).toBeUndefined();
      expect(getErrorReason(new Error('boom'))).toBeUndefined();
    });
  });

  describe('getErrorMessage', () => {
    it('should prefer the Status message over the error message', () => {
      const error = Object.assign(new Error('HTTP-Code: 404'), {
        body: { message: 'endpoints "e1" not found' },
      });
      expect(getErrorMessage(error)).toBe('endpoints "e1" not found');
    });

    it('should keep a non-JSON body as the message', () => {
      expect(getErrorMessage({ body: 'upstream connect error' })).toBe('upstream connect error');
    });

    it('should stringify anything else', () => {
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('formatKubernetesError', () => {
    it('should format error with status code, reason and message', () => {
      expect(
        formatKubernetesError({ code: 404, body: { reason: 'NotFound', message: 'gone' } })
      ).toBe('Kubernetes API error (404): NotFound: gone');
    });

    it('should format errors without a status code', () => {
      expect(formatKubernetesError(new Error('boom'))).toBe('Kubernetes API error: boom');
    });

    it('should handle non-object errors', () => {
      expect(formatKubernetesError('plain failure')).toBe('plain failure');
    });
  });

  describe('type guards', () => {
    it('should recognize a numeric response status code only', () => {
      expect(hasStatusCode({ statusCode: 500 })).toBe(true);
      expect(hasStatusCode({ statusCode: '500' })).toBe(false);
      expect(hasStatusCode(undefined)).toBe(false);
    });

    it('should drop unknown fields from the Status body', () => {
      expect(getStatusBody({ body: { code: 404, kind: 'Status', reason: 'NotFound' } })).toEqual({
        code: 404,
        reason: 'NotFound',
      });
    });
  });
});

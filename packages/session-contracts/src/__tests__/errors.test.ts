/**
 * @module @asset-session/contracts/__tests__/errors
 *
 * Tests for session error types.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  InvalidInputError,
  ManagerError,
  SessionError,
  isSessionError,
} from '../errors.js';

describe('Errors', () => {
  describe('SessionError', () => {
    it('should create error with message, code and details', () => {
      const error = new SessionError('Test message', 'MANAGER_ERROR', { key: 'value' });

      expect(error.message).toBe('Test message');
      expect(error.code).toBe('MANAGER_ERROR');
      expect(error.details).toEqual({ key: 'value' });
      expect(error.name).toBe('SessionError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should serialize to JSON', () => {
      const error = new SessionError('Serialize', 'INVALID_INPUT', { foo: 'bar' });

      expect(error.toJSON()).toEqual({
        name: 'SessionError',
        message: 'Serialize',
        code: 'INVALID_INPUT',
        details: { foo: 'bar' },
        stack: expect.any(String),
      });
    });
  });

  describe('InvalidInputError', () => {
    it('should use the INVALID_INPUT code', () => {
      const error = new InvalidInputError('Host interface must be provided');

      expect(error.code).toBe('INVALID_INPUT');
      expect(error.name).toBe('InvalidInputError');
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toBeInstanceOf(SessionError);
    });
  });

  describe('ManagerError', () => {
    it('should keep the identifier as property and detail', () => {
      const error = new ManagerError('Manager identifier not known: com.manager', 'com.manager');

      expect(error.code).toBe('MANAGER_ERROR');
      expect(error.name).toBe('ManagerError');
      expect(error.identifier).toBe('com.manager');
      expect(error.details).toEqual({ identifier: 'com.manager' });
    });

    it('should omit details without an identifier', () => {
      expect(new ManagerError('No manager').details).toBeUndefined();
    });
  });

  describe('ConfigurationError', () => {
    it('should use the CONFIGURATION_ERROR code', () => {
      const error = new ConfigurationError('Missing capabilities', { identifier: 'com.manager' });

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.name).toBe('ConfigurationError');
      expect(error).toBeInstanceOf(ConfigurationError);
    });
  });

  describe('isSessionError', () => {
    it('should recognise session errors only', () => {
      expect(isSessionError(new ManagerError('x'))).toBe(true);
      expect(isSessionError(new ConfigurationError('x'))).toBe(true);
      expect(isSessionError(new Error('x'))).toBe(false);
      expect(isSessionError('x')).toBe(false);
    });
  });
});

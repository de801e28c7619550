import { describe, it, expect } from 'vitest';
import {
  PolicySyncError,
  SourceUnavailableError,
  MalformedDataError,
  ConfigurationError,
  UninitializedAccessError,
  errorMessage,
} from '../../../src/errors';

describe('Policy Sync Errors', () => {
  it('should carry the source and cause of an unavailable source', () => {
    const cause = new Error('connection refused');
    const error = new SourceUnavailableError('Database policy loading failed', 'database', cause);

    expect(error).toBeInstanceOf(PolicySyncError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SourceUnavailableError');
    expect(error.code).toBe('SOURCE_UNAVAILABLE');
    expect(error.source).toBe('database');
    expect(error.cause).toBe(cause);
  });

  it('should keep the malformed record', () => {
    const error = new MalformedDataError('Invalid role id', { roleId: 'x' });

    expect(error.code).toBe('MALFORMED_DATA');
    expect(error.record).toEqual({ roleId: 'x' });
    expect(error.cause).toBeUndefined();
  });

  it('should name the offending configuration field', () => {
    const error = new ConfigurationError('Source location is required', 'source.sourceLocation');

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.field).toBe('source.sourceLocation');
  });

  it('should describe the blocked operation', () => {
    const error = new UninitializedAccessError('check permissions');

    expect(error.message).toBe('Permission checker is not initialized - cannot check permissions');
    expect(error.code).toBe('UNINITIALIZED_ACCESS');
  });

  it('should extract messages from unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

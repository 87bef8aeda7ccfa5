import { describe, expect, it } from 'vitest';
import { ConfigError, NotecoreError, ReentrantDispatchError } from './errors';

describe('errors', () => {
  it('carry a code and a name', () => {
    const error = new ReentrantDispatchError('Select subject: none');

    expect(error).toBeInstanceOf(NotecoreError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('REENTRANT_DISPATCH');
    expect(error.name).toBe('ReentrantDispatchError');
    expect(error.message).toBe('Reentrant dispatch rejected: Select subject: none');
  });

  it('list the keys of a configuration error', () => {
    const error = new ConfigError(['NOTECORE_DEBUG'], 'Invalid enum value');

    expect(error.message).toBe('Invalid configuration (NOTECORE_DEBUG): Invalid enum value');
    expect(error.keys).toEqual(['NOTECORE_DEBUG']);
  });
});

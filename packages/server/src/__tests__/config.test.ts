import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      databasePath: 'data/cookbook.db',
      mediaRoot: 'data/media',
      mediaUrl: '/media',
      bcryptRounds: 10,
      maxImageBytes: 5242880,
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATABASE_PATH: ':memory:',
      MEDIA_ROOT: '/tmp/media',
      MEDIA_URL: '/files/',
      BCRYPT_ROUNDS: '4',
      MAX_IMAGE_BYTES: '1024',
    });

    expect(config).toEqual({
      port: 8080,
      databasePath: ':memory:',
      mediaRoot: '/tmp/media',
      mediaUrl: '/files',
      bcryptRounds: 4,
      maxImageBytes: 1024,
    });
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError);
    expect(() => loadConfig({ BCRYPT_ROUNDS: '3' })).toThrow(ZodError);
    expect(() => loadConfig({ MEDIA_URL: 'media' })).toThrow(ZodError);
  });
});

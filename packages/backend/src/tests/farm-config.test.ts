import { describe, it, expect, beforeEach } from 'vitest';
import { loadFarmConfig, resetFarmConfigCache } from '../lib/config/farm.js';
import { ValidationError } from '../lib/errors.js';

describe('loadFarmConfig', () => {
  beforeEach(() => {
    resetFarmConfigCache();
  });

  it('falls back to defaults', () => {
    expect(loadFarmConfig({})).toEqual({
      barnCapacity: 20,
      port: 3000,
      host: '0.0.0.0',
      logLevel: 'info',
      frontendUrl: 'http://localhost:5173',
    });
  });

  it('reads and coerces environment variables', () => {
    const config = loadFarmConfig({
      BARN_CAPACITY: '5',
      PORT: '8080',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'debug',
      FRONTEND_URL: 'https://farm.example.com',
    });

    expect(config.barnCapacity).toBe(5);
    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
    expect(config.logLevel).toBe('debug');
    expect(config.frontendUrl).toBe('https://farm.example.com');
  });

  it('treats empty values as unset', () => {
    expect(loadFarmConfig({ BARN_CAPACITY: '' }).barnCapacity).toBe(20);
  });

  it('caches the first result until reset', () => {
    loadFarmConfig({ BARN_CAPACITY: '7' });
    expect(loadFarmConfig({ BARN_CAPACITY: '9' }).barnCapacity).toBe(7);

    resetFarmConfigCache();
    expect(loadFarmConfig({ BARN_CAPACITY: '9' }).barnCapacity).toBe(9);
  });

  it('names every malformed variable', () => {
    let thrown: unknown;
    try {
      loadFarmConfig({ BARN_CAPACITY: '0', PORT: 'http', LOG_LEVEL: 'loud' });
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    expect((thrown as ValidationError).details).toEqual({ invalid: ['BARN_CAPACITY', 'PORT', 'LOG_LEVEL'] });
  });

  it('rejects a fractional capacity', () => {
    expect(() => loadFarmConfig({ BARN_CAPACITY: '2.5' })).toThrow(
      'Invalid farm configuration. Check environment variables: BARN_CAPACITY'
    );
  });
});

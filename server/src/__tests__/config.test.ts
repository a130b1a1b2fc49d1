import { describe, it, expect } from 'vitest';
import path from 'path';
import { initConfig } from '../config/index.js';

describe('initConfig', () => {
  it('falls back to defaults', () => {
    const config = initConfig({});

    expect(config.port).toBe(3000);
    expect(config.env.isDevelopment).toBe(true);
    expect(config.reactRoles).toEqual({
      bindingsFile: path.join('./data', 'react_roles', 'config.json'),
      maxProcessedPerSecond: 5,
      maxForbiddenAttempts: 3,
    });
    expect(config.discord.botToken).toBeUndefined();
    expect(config.admin.token).toBeUndefined();
  });

  it('reads settings from the environment', () => {
    const config = initConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      STORAGE_ROOT: '/srv/roles',
      REACT_ROLES_MAX_PER_SECOND: '0',
      DISCORD_BOT_TOKEN: 'test-token',
      ADMIN_TOKEN: 'test-secret',
    });

    expect(config.env.isProduction).toBe(true);
    expect(config.port).toBe(8080);
    expect(config.reactRoles.bindingsFile).toBe(path.join('/srv/roles', 'react_roles', 'config.json'));
    expect(config.reactRoles.maxProcessedPerSecond).toBe(0);
    expect(config.discord.botToken).toBe('test-token');
    expect(config.admin.token).toBe('test-secret');
  });

  it('prefers an explicit bindings file', () => {
    const config = initConfig({ REACT_ROLES_FILE: '/tmp/bindings.json' });

    expect(config.reactRoles.bindingsFile).toBe('/tmp/bindings.json');
  });

  it('accepts fractional rates', () => {
    expect(initConfig({ REACT_ROLES_MAX_PER_SECOND: '0.5' }).reactRoles.maxProcessedPerSecond).toBe(0.5);
  });

  it('rejects invalid numbers', () => {
    expect(() => initConfig({ REACT_ROLES_MAX_PER_SECOND: '-1' })).toThrow(
      'REACT_ROLES_MAX_PER_SECOND must be a non-negative number, got "-1"',
    );
    expect(() => initConfig({ REACT_ROLES_MAX_FORBIDDEN_ATTEMPTS: '1.5' })).toThrow(
      'REACT_ROLES_MAX_FORBIDDEN_ATTEMPTS must be a non-negative integer, got "1.5"',
    );
    expect(() => initConfig({ PORT: 'eighty' })).toThrow('PORT must be a non-negative integer');
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLevelEnabled } from './index.js';
import { resetConfig, updateConfig } from '../config/index.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetConfig();
  });

  it('should prefix lines with the level icon and scope', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    createLogger('connect').info('Connected', { port: 443 });

    expect(info).toHaveBeenCalledWith('ℹ️  [connect] Connected', { port: 443 });
  });

  it('should route each level to the matching console method', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const log = createLogger('session');
    log.warn('slow');
    log.error('gone');

    expect(warn).toHaveBeenCalledWith('⚠️  [session] slow');
    expect(error).toHaveBeenCalledWith('❌ [session] gone');
  });

  it('should drop debug lines at the default level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createLogger('tunnel').debug('hidden');

    expect(debug).not.toHaveBeenCalled();
  });

  it('should emit debug lines once enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    updateConfig({ logLevel: 'debug' });

    createLogger('tunnel').debug('shown');

    expect(debug).toHaveBeenCalledWith('🔍 [tunnel] shown');
  });

  it('should emit nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    updateConfig({ logLevel: 'silent' });

    createLogger('cm-list').error('ignored');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLevelEnabled', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should compare against the configured threshold', () => {
    updateConfig({ logLevel: 'warn' });

    expect(isLevelEnabled('info')).toBe(false);
    expect(isLevelEnabled('warn')).toBe(true);
    expect(isLevelEnabled('error')).toBe(true);
  });
});

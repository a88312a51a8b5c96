import { describe, it, expect } from 'vitest';
import { hostFamily, loadConfig } from '../config/index.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('merges environment values and CLI overrides', () => {
    const config = loadConfig(
      { target: 'posix', jobs: '8', skip: ['opencv'], srcDir: '/cli/src' },
      { PROVISION_SRC_DIR: '/env/src', PROVISION_PREFIX: '/opt/tools', PROVISION_SUDO: '0', PROVISION_UPGRADE: 'yes', LOG_LEVEL: 'debug' },
    );
    expect(config).toEqual({
      target: 'posix',
      srcDir: '/cli/src',
      prefix: '/opt/tools',
      jobs: 8,
      sudo: false,
      upgrade: true,
      forceClean: false,
      skip: ['opencv'],
      logLevel: 'debug',
    });
  });

  it('picks per-family defaults', () => {
    const config = loadConfig({ target: 'windows' }, {});
    expect(config.prefix).toBe('C:\\local');
    expect(config.sudo).toBe(false);
    expect(config.logLevel).toBe('warn');
    expect(config.jobs).toBeGreaterThanOrEqual(1);
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      loadConfig({ target: 'beos', jobs: '0' }, { PROVISION_SUDO: 'maybe' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues[0]).toBe('PROVISION_SUDO: expected a boolean, got "maybe"');
    expect(caught.issues.some(i => i.startsWith('target: '))).toBe(true);
    expect(caught.issues.some(i => i.startsWith('jobs: '))).toBe(true);
  });

  it('maps win32 to the windows family', () => {
    expect(hostFamily('win32')).toBe('windows');
    expect(hostFamily('linux')).toBe('posix');
    expect(hostFamily('darwin')).toBe('posix');
  });
});

import { describe, it, expect } from 'vitest';
import { isSatisfied } from '../orchestrator/checks.js';
import type { SatisfiedCheck, Step } from '../types/contracts.js';
import type { StateQuery } from '../system/host.js';
import { pkgStep } from './fakes.js';

function state(files: string[], dirs: string[] = [], okCommands: string[] = [], packages: string[] = []): StateQuery {
  return {
    pathExists: async p => files.includes(p) || dirs.includes(p),
    isFile: async p => files.includes(p),
    isDirectory: async p => dirs.includes(p),
    commandSucceeds: async (cmd, args) => okCommands.includes([cmd, ...args].join(' ')),
    packageInstalled: async name => packages.includes(name),
  };
}

const withCheck = (check: SatisfiedCheck): Step => ({ ...pkgStep('s'), check });

describe('isSatisfied', () => {
  const host = state(['/usr/local/bin/tesseract'], ['/usr/local/include/leptonica'], ['pkg-config --exists opencv4'], ['s-pkg']);

  it('checks paths, optionally by kind', async () => {
    expect(await isSatisfied(withCheck({ type: 'path', path: '/usr/local/bin/tesseract' }), host)).toBe(true);
    expect(await isSatisfied(withCheck({ type: 'path', path: '/usr/local/bin/tesseract', kind: 'directory' }), host)).toBe(false);
    expect(await isSatisfied(withCheck({ type: 'path', path: '/usr/local/include/leptonica', kind: 'directory' }), host)).toBe(true);
    expect(await isSatisfied(withCheck({ type: 'path', path: '/usr/local/bin/alpr' }), host)).toBe(false);
  });

  it('checks command exit status', async () => {
    expect(await isSatisfied(withCheck({ type: 'command', command: 'pkg-config', args: ['--exists', 'opencv4'] }), host)).toBe(true);
    expect(await isSatisfied(withCheck({ type: 'command', command: 'alpr', args: ['--version'] }), host)).toBe(false);
  });

  it('checks the packages of a package step', async () => {
    expect(await isSatisfied(pkgStep('s'), host)).toBe(true);
    expect(await isSatisfied(pkgStep('t'), host)).toBe(false);
  });

  it('combines checks', async () => {
    const present: SatisfiedCheck = { type: 'path', path: '/usr/local/bin/tesseract' };
    const missing: SatisfiedCheck = { type: 'path', path: '/nope' };
    expect(await isSatisfied(withCheck({ type: 'all', checks: [present, missing] }), host)).toBe(false);
    expect(await isSatisfied(withCheck({ type: 'any', checks: [missing, present] }), host)).toBe(true);
    expect(await isSatisfied(withCheck({ type: 'never' }), host)).toBe(false);
  });

  it('has no side effects and is re-evaluated each call', async () => {
    const files: string[] = [];
    const live = state(files);
    const step = withCheck({ type: 'path', path: '/opt/done' });
    expect(await isSatisfied(step, live)).toBe(false);
    files.push('/opt/done');
    expect(await isSatisfied(step, live)).toBe(true);
  });
});

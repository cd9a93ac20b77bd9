import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { restrictToOwner, withScopedTempFile } from '../../src/services/tempWorkspace.js';
import { __enableTestLogCollector, __resetLoggerForTests } from '../../src/utils/logging.js';
import { tempDir } from '../utils/fakes.js';

describe('scoped temp files', () => {
  afterEach(() => {
    __resetLoggerForTests();
    vi.restoreAllMocks();
  });

  it('exposes the content during the callback and removes it afterwards', async () => {
    let seen = '';
    const file = await withScopedTempFile('masked prompt', async (f) => {
      seen = fs.readFileSync(f, 'utf8');
      return f;
    });
    expect(seen).toBe('masked prompt');
    expect(fs.existsSync(file)).toBe(false);
    expect(fs.existsSync(path.dirname(file))).toBe(false);
  });

  it.skipIf(process.platform === 'win32')('creates an owner-only file in an owner-only directory', async () => {
    await withScopedTempFile('x', async (f) => {
      expect(fs.statSync(f).mode & 0o777).toBe(0o600);
      expect(fs.statSync(path.dirname(f)).mode & 0o777).toBe(0o700);
    });
  });

  it('cleans up when the callback throws', async () => {
    let used = '';
    await expect(
      withScopedTempFile('x', async (f) => {
        used = f;
        throw new Error('assistant crashed');
      }),
    ).rejects.toThrow('assistant crashed');
    expect(fs.existsSync(path.dirname(used))).toBe(false);
  });

  it('warns and proceeds when access cannot be restricted', async () => {
    const logs = __enableTestLogCollector('warn');
    const result = await withScopedTempFile('x', async () => 'ran', {
      restrict: async () => {
        throw new Error('acl tool missing');
      },
    });
    expect(result).toBe('ran');
    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0])).toMatchObject({
      level: 40,
      error: 'Error',
      detail: 'acl tool missing',
      msg: 'TEMP FILE ACCESS NOT RESTRICTED: prompt file may be readable by other local users',
    });
  });

  it.skipIf(process.platform === 'win32')('tightens a loose file mode', async () => {
    const file = path.join(tempDir(), 'loose.txt');
    fs.writeFileSync(file, 'x', { mode: 0o644 });
    await restrictToOwner(file);
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it('removes the directory and re-raises the signal when interrupted', async () => {
    const kill = vi.spyOn(process, 'kill').mockImplementation(() => true);
    const before = process.listeners('SIGINT');
    let dir = '';
    await withScopedTempFile('x', async (f) => {
      dir = path.dirname(f);
      const handler = process.listeners('SIGINT').find((l) => !before.includes(l));
      expect(handler).toBeDefined();
      handler?.('SIGINT');
      expect(fs.existsSync(dir)).toBe(false);
      expect(process.listeners('SIGINT')).toEqual(before);
    });
    expect(kill).toHaveBeenCalledWith(process.pid, 'SIGINT');
  });

  it('stops listening for signals once no temp file is live', async () => {
    const before = process.listeners('SIGTERM').length;
    await withScopedTempFile('x', async () => {
      expect(process.listeners('SIGTERM')).toHaveLength(before + 1);
    });
    expect(process.listeners('SIGTERM')).toHaveLength(before);
  });
});

import { execa } from 'execa';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { errorName } from '../core/errors.js';
import { tempRestrictionFailuresTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';

export interface ScopedTempOptions {
  /** Replaces the platform restriction step; tests use it to simulate failures. */
  restrict?: (file: string) => Promise<void>;
  fileName?: string;
  prefix?: string;
}

const activeDirs = new Set<string>();
let exitHookInstalled = false;
let signalHandlersAttached = false;
const CLEANUP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

// Runs from 'exit' and signal handlers, so it must be synchronous
function removeActiveDirsSync() {
  for (const dir of activeDirs) {
    try {
      fs.rmSync(dir, { recursive: true, force: true });
    } catch (err) {
      process.stderr.write(`failed to remove temp dir ${dir}: ${errorName(err)}\n`);
    }
  }
}

function installExitHook() {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.on('exit', removeActiveDirsSync);
}

// Node does not emit 'exit' when a signal terminates the process
function onSignal(signal: NodeJS.Signals) {
  removeActiveDirsSync();
  detachSignalHandlers();
  process.kill(process.pid, signal);
}

function attachSignalHandlers() {
  if (signalHandlersAttached) return;
  signalHandlersAttached = true;
  for (const signal of CLEANUP_SIGNALS) process.on(signal, onSignal);
}

function detachSignalHandlers() {
  if (!signalHandlersAttached) return;
  signalHandlersAttached = false;
  for (const signal of CLEANUP_SIGNALS) process.off(signal, onSignal);
}

/** Owner-only access: mode bits on POSIX, an explicit ACL on Windows. */
export async function restrictToOwner(file: string): Promise<void> {
  if (process.platform === 'win32') {
    const user = process.env.USERNAME ?? os.userInfo().username;
    await execa('icacls', [file, '/inheritance:r', '/grant:r', `${user}:F`]);
    return;
  }
  await fs.promises.chmod(file, 0o600);
  const { mode } = await fs.promises.stat(file);
  if ((mode & 0o077) !== 0) {
    throw new Error(`mode ${(mode & 0o777).toString(8)} still grants group/other access`);
  }
}

/**
 * Writes `content` to a private temp file, hands its path to `fn` and removes
 * the directory afterwards whatever `fn` does, including on SIGINT/SIGTERM. A failed restriction is logged
 * loudly and counted; the file is still used.
 */
export async function withScopedTempFile<T>(
  content: string,
  fn: (file: string) => Promise<T>,
  opts: ScopedTempOptions = {},
): Promise<T> {
  installExitHook();
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), opts.prefix ?? 'ai-audit-'));
  activeDirs.add(dir);
  attachSignalHandlers();
  try {
    await fs.promises.chmod(dir, 0o700);
    const file = path.join(dir, opts.fileName ?? 'prompt.txt');
    await fs.promises.writeFile(file, content, { mode: 0o600 });
    try {
      await (opts.restrict ?? restrictToOwner)(file);
    } catch (err) {
      tempRestrictionFailuresTotal.inc();
      getLogger().warn(
        { file, error: errorName(err), detail: err instanceof Error ? err.message : String(err) },
        'TEMP FILE ACCESS NOT RESTRICTED: prompt file may be readable by other local users',
      );
    }
    return await fn(file);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
    activeDirs.delete(dir);
    if (activeDirs.size === 0) detachSignalHandlers();
  }
}

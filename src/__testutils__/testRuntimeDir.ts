/**
 * Point the session layout at a fresh temp directory for the duration of a test.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { RUNTIME_DIR_ENV, SESSION_ID_ENV } from '@/constants.js';

export interface RuntimeDirHelper {
  /** Temp directory standing in for the runtime directory */
  dir: string;
  /** Remove the directory and restore the environment */
  restore: () => void;
}

/**
 * @example
 * let runtime: RuntimeDirHelper;
 * beforeEach(() => { runtime = useTempRuntimeDir(); });
 * afterEach(() => runtime.restore());
 */
export function useTempRuntimeDir(sessionId?: string): RuntimeDirHelper {
  // Keep socket paths short: sun_path is limited to ~104 bytes on some platforms
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portal-'));
  const previousDir = process.env[RUNTIME_DIR_ENV];
  const previousSession = process.env[SESSION_ID_ENV];

  process.env[RUNTIME_DIR_ENV] = dir;
  if (sessionId === undefined) {
    delete process.env[SESSION_ID_ENV];
  } else {
    process.env[SESSION_ID_ENV] = sessionId;
  }

  return {
    dir,
    restore: () => {
      restoreEnv(RUNTIME_DIR_ENV, previousDir);
      restoreEnv(SESSION_ID_ENV, previousSession);
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

function restoreEnv(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

/**
 * Session layout and PID file tests
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { useTempRuntimeDir } from '@/__testutils__/index.js';
import type { RuntimeDirHelper } from '@/__testutils__/index.js';
import {
  cleanupServicePid,
  ensurePortalDir,
  getPortalDir,
  getServicePidPath,
  getServiceSocketPath,
  getSessionId,
  isProcessAlive,
  readPidFromFile,
  readServicePid,
  writeServicePid,
} from '@/session/index.js';

void describe('session paths', () => {
  let runtime: RuntimeDirHelper;

  afterEach(() => runtime.restore());

  void it('places service sockets under the default session', () => {
    runtime = useTempRuntimeDir();

    assert.equal(
      getServiceSocketPath('request'),
      path.join(runtime.dir, 'session', 'default', 'portal', 'request')
    );
    assert.equal(
      getServicePidPath('request'),
      path.join(runtime.dir, 'session', 'default', 'portal', 'request.pid')
    );
  });

  void it('separates sessions by id', () => {
    runtime = useTempRuntimeDir('work');

    assert.equal(getSessionId(), 'work');
    assert.equal(getPortalDir(), path.join(runtime.dir, 'session', 'work', 'portal'));
  });

  void it('rejects a session id that leaves the session directory', () => {
    runtime = useTempRuntimeDir('../elsewhere');

    assert.throws(() => getPortalDir(), { message: 'Invalid session id: ../elsewhere' });
  });

  void it('rejects service names that are not a single path segment', () => {
    runtime = useTempRuntimeDir();

    assert.throws(() => getServiceSocketPath('a/b'), { message: 'Invalid service name: a/b' });
    assert.throws(() => getServicePidPath('.hidden'), { message: 'Invalid service name: .hidden' });
    assert.throws(() => getServiceSocketPath(''), { message: 'Invalid service name: ' });
  });

  void it('creates the portal directory on demand', () => {
    runtime = useTempRuntimeDir();

    ensurePortalDir();
    ensurePortalDir();

    assert.equal(fs.statSync(getPortalDir()).isDirectory(), true);
  });
});

void describe('service PID files', () => {
  let runtime: RuntimeDirHelper;

  beforeEach(() => {
    runtime = useTempRuntimeDir();
  });

  afterEach(() => runtime.restore());

  void it('writes, reads and removes a PID', () => {
    writeServicePid('request', 4242);

    assert.equal(fs.readFileSync(getServicePidPath('request'), 'utf-8'), '4242');
    assert.equal(readServicePid('request'), 4242);

    cleanupServicePid('request');
    cleanupServicePid('request');

    assert.equal(readServicePid('request'), null);
  });

  void it('treats unparsable or non-positive contents as no PID', () => {
    const file = path.join(runtime.dir, 'pid');

    fs.writeFileSync(file, 'not a pid');
    assert.equal(readPidFromFile(file), null);

    fs.writeFileSync(file, '0');
    assert.equal(readPidFromFile(file), null);

    fs.writeFileSync(file, ' 17\n');
    assert.equal(readPidFromFile(file), 17);
  });

  void it('leaves no temporary files behind', () => {
    writeServicePid('request', 1);

    assert.deepEqual(fs.readdirSync(getPortalDir()), ['request.pid']);
  });
});

void describe('isProcessAlive', () => {
  void it('reports the current process as alive', () => {
    assert.equal(isProcessAlive(process.pid), true);
  });

  void it('reports a PID with no process as dead', () => {
    assert.equal(isProcessAlive(2 ** 22 + 1), false);
  });
});

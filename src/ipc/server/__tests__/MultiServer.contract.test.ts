/**
 * MultiServer Contract Tests
 *
 * Real Unix domain sockets in a temp directory, real clients from
 * connectToServer().
 *
 * What we test:
 * ✅ Behavior: request/response end to end, notifications back to one client or all
 * ✅ Invariants: client ids start at 1 and grow, dead clients leave the table
 * ✅ Edge cases: stale socket files, failing handler factories, missing sockets
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { assertEventually, nextEvent } from '@/__testutils__/index.js';
import { connectToServer } from '@/ipc/client.js';
import type { Connection } from '@/ipc/connection/index.js';
import type { IPCError } from '@/ipc/errors/index.js';
import { IpcFile } from '@/ipc/file/IpcFile.js';
import type { Handlers } from '@/ipc/protocol/index.js';
import { MultiServer } from '@/ipc/server/index.js';
import type { MultiServerOptions } from '@/ipc/server/index.js';
import {
  RequestClientEndpoint,
  RequestServerEndpoint,
  readBody,
  type RequestClientMessages,
  type RequestServerMessages,
  type SelectedFile,
} from '@/services/request/index.js';

type Server = MultiServer<RequestServerMessages, RequestClientMessages>;

interface ClientEvents {
  started: SelectedFile[];
  finished: Array<{ requestId: number; totalSize: bigint }>;
  certificates: number[];
}

function serverHandlers(clientId: number, server: Server): Handlers<RequestServerMessages> {
  return {
    getHeaders: ({ id }) => ({
      id,
      status: 200,
      headers: [{ name: 'Content-Type', value: 'text/html' }],
    }),
    startRequest: ({ requestId, body }) => {
      setImmediate(() => {
        server.client(clientId)?.post('requestFinished', {
          requestId,
          totalSize: BigInt(body.byteLength),
          networkError: undefined,
        });
      });
      return { started: true };
    },
    stopRequest: () => ({ stopped: false }),
    setCertificate: () => ({ accepted: false }),
    ensureConnection: () => undefined,
  };
}

function clientHandlers(events: ClientEvents): Handlers<RequestClientMessages> {
  return {
    requestStarted: ({ body }) => {
      events.started.push(body);
    },
    headersBecameAvailable: () => undefined,
    requestFinished: ({ requestId, totalSize }) => {
      events.finished.push({ requestId, totalSize });
    },
    certificateRequested: ({ requestId }) => {
      events.certificates.push(requestId);
    },
  };
}

function emptyEvents(): ClientEvents {
  return { started: [], finished: [], certificates: [] };
}

void describe('MultiServer Contract Tests', () => {
  let tmpDir: string;
  let socketPath: string;
  let server: Server;
  let clients: Connection<RequestServerMessages>[];

  const createServer = (
    createHandlers: MultiServerOptions<
      RequestServerMessages,
      RequestClientMessages
    >['createHandlers'] = serverHandlers
  ): Server =>
    new MultiServer({ local: RequestServerEndpoint, peer: RequestClientEndpoint, createHandlers });

  const connect = async (events: ClientEvents = emptyEvents()): Promise<Connection<RequestServerMessages>> => {
    const connection = await connectToServer({
      socketPath,
      local: RequestClientEndpoint,
      handlers: clientHandlers(events),
      peer: RequestServerEndpoint,
    });
    clients.push(connection);
    return connection;
  };

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'portal-'));
    socketPath = path.join(tmpDir, 's', 'portal', 'request');
    clients = [];
    server = createServer();
    await server.listen(socketPath);
  });

  afterEach(async () => {
    for (const client of clients) {
      client.shutdown();
    }
    await server.stop();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  void describe('listen()', () => {
    void it('creates parent directories and binds the socket', () => {
      assert.equal(server.address, socketPath);
      assert.equal(fs.statSync(socketPath).isSocket(), true);
    });

    void it('replaces a stale socket file', async () => {
      await server.stop();
      fs.writeFileSync(socketPath, 'stale');

      server = createServer();
      await server.listen(socketPath);

      assert.equal(fs.statSync(socketPath).isSocket(), true);
    });
  });

  void describe('request/response', () => {
    void it('answers getHeaders end to end', async () => {
      const client = await connect();

      const response = await client.sendSync('getHeaders', {
        id: 1,
        url: new URL('file:///index.html'),
      });

      assert.deepEqual(response, {
        id: 1,
        status: 200,
        headers: [{ name: 'Content-Type', value: 'text/html' }],
      });
    });

    void it('routes handler notifications back to the calling client only', async () => {
      const first = emptyEvents();
      const second = emptyEvents();
      const caller = await connect(first);
      await connect(second);

      const { started } = await caller.sendSync('startRequest', {
        requestId: 7,
        method: 'POST',
        url: new URL('file:///upload'),
        requestHeaders: [],
        body: Uint8Array.from([1, 2, 3]),
      });

      assert.equal(started, true);
      await assertEventually(() => first.finished.length === 1, 1000);
      assert.deepEqual(first.finished, [{ requestId: 7, totalSize: 3n }]);
      assert.deepEqual(second.finished, []);
    });

    void it('passes a descriptor between peers that share a descriptor table', async () => {
      const events = emptyEvents();
      await connect(events);
      await assertEventually(() => server.size === 1, 1000);
      const filePath = path.join(tmpDir, 'body.txt');
      fs.writeFileSync(filePath, 'shared body');

      server.client(1)?.post('requestStarted', {
        requestId: 1,
        body: { name: 'body.txt', fileOrContents: { kind: 'file', value: IpcFile.open(filePath) } },
      });

      await assertEventually(() => events.started.length === 1, 1000);
      const body = events.started[0];
      assert.ok(body);
      assert.equal(body.name, 'body.txt');
      assert.equal(Buffer.from(readBody(body)).toString('utf-8'), 'shared body');
    });
  });

  void describe('client table', () => {
    void it('assigns increasing ids starting at 1', async () => {
      const accepted: number[] = [];
      server.on('client', (connection) => accepted.push(connection.clientId));

      await connect();
      await connect();
      await connect();
      await assertEventually(() => accepted.length === 3, 1000);

      assert.deepEqual(accepted, [1, 2, 3]);
      assert.equal(server.size, 3);
      assert.deepEqual(
        [...server.clients()].map((connection) => connection.clientId),
        [1, 2, 3]
      );
    });

    void it('removes a client when its connection dies', async () => {
      const first = await connect();
      await connect();
      await assertEventually(() => server.size === 2, 1000);
      const died = nextEvent<[number, IPCError | undefined]>((listener) =>
        server.once('clientDied', listener)
      );

      first.shutdown();

      const [clientId, error] = await died;
      assert.equal(clientId, 1);
      assert.equal(error, undefined);
      assert.equal(server.client(1), undefined);
      assert.equal(server.size, 1);
    });

    void it('never reuses the id of a departed client', async () => {
      const first = await connect();
      await assertEventually(() => server.size === 1, 1000);
      first.shutdown();
      await assertEventually(() => server.size === 0, 1000);

      const accepted: number[] = [];
      server.on('client', (connection) => accepted.push(connection.clientId));
      await connect();
      await assertEventually(() => accepted.length === 1, 1000);

      assert.deepEqual(accepted, [2]);
    });

    void it('broadcasts a message to every live client', async () => {
      const first = emptyEvents();
      const second = emptyEvents();
      await connect(first);
      await connect(second);
      await assertEventually(() => server.size === 2, 1000);

      const delivered = server.broadcast('certificateRequested', { requestId: 9 });

      assert.equal(delivered, 2);
      await assertEventually(
        () => first.certificates.length === 1 && second.certificates.length === 1,
        1000
      );
      assert.deepEqual(first.certificates, [9]);
      assert.deepEqual(second.certificates, [9]);
    });
  });

  void describe('failures', () => {
    void it('drops a client whose handlers cannot be built and keeps accepting', async () => {
      await server.stop();
      server = createServer((clientId, owner) => {
        if (clientId === 1) {
          throw new Error('no handlers for client 1');
        }
        return serverHandlers(clientId, owner);
      });
      await server.listen(socketPath);

      const rejected = await connect();
      await assertEventually(() => !rejected.isOpen, 1000);

      const accepted = await connect();
      const response = await accepted.sendSync('getHeaders', { id: 2, url: new URL('file:///a') });

      assert.equal(response.id, 2);
      assert.equal(server.size, 1);
      assert.equal(server.client(2)?.clientId, 2);
    });

    void it('rejects connecting to a socket that does not exist', async () => {
      await assert.rejects(
        connectToServer({
          socketPath: path.join(tmpDir, 'missing'),
          local: RequestClientEndpoint,
          handlers: clientHandlers(emptyEvents()),
          peer: RequestServerEndpoint,
        }),
        { name: 'IPCConnectionError', code: 'ENOENT' }
      );
    });
  });

  void describe('stop()', () => {
    void it('closes every client and removes the socket file', async () => {
      const client = await connect();
      await assertEventually(() => server.size === 1, 1000);
      const died = nextEvent<[IPCError | undefined]>((listener) => client.once('die', listener));

      await server.stop();

      await died;
      assert.equal(client.isOpen, false);
      assert.equal(server.size, 0);
      assert.equal(fs.existsSync(socketPath), false);
    });
  });
});

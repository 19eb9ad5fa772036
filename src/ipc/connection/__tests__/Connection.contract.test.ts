/**
 * Connection Contract Tests
 *
 * Two Connections joined by an in-process transport pair.
 *
 * What we test:
 * ✅ Behavior: posts arrive in order, sync calls resolve with their own reply
 * ✅ Invariants: peer death fails every pending call, fatal errors close the connection
 * ✅ Edge cases: reentrant calls, timeouts with late replies, unknown opcodes and ids
 * ✅ Edge cases: a peer that leaves too many timed-out calls unanswered
 *
 * What we DON'T test:
 * ❌ Correlation id allocation order
 * ❌ Log output
 */

import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import { assertEventually, createTransportPair, flushTurns, nextEvent } from '@/__testutils__/index.js';
import type { FakeTransport } from '@/__testutils__/index.js';
import { string, u32 } from '@/ipc/codec/index.js';
import { Connection } from '@/ipc/connection/index.js';
import { TransportError } from '@/ipc/errors/index.js';
import type { IPCError } from '@/ipc/errors/index.js';
import { buildMessage, createStub, defineEndpoint, message, request } from '@/ipc/protocol/index.js';
import type { Handlers, MessagesOf } from '@/ipc/protocol/index.js';

const CalcEndpoint = defineEndpoint({
  name: 'Calc',
  magic: 0x43414c43,
  messages: {
    echo: request(string, string),
    slow: request(u32, u32),
    note: message(string),
    nested: request(u32, u32),
  },
});

const CalcClientEndpoint = defineEndpoint({
  name: 'CalcClient',
  magic: 0x434c4e54,
  messages: {
    double: request(u32, u32),
    progress: message(u32),
  },
});

type CalcMessages = MessagesOf<typeof CalcEndpoint>;
type CalcClientMessages = MessagesOf<typeof CalcClientEndpoint>;

function getName(reason: unknown): string {
  return reason instanceof Error ? reason.name : String(reason);
}

interface Deferred {
  value: number;
  release: () => void;
}

void describe('Connection Contract Tests', () => {
  let clientTransport: FakeTransport;
  let client: Connection<CalcMessages>;
  let server: Connection<CalcClientMessages>;
  let notes: string[];
  let progress: number[];
  let slowCalls: Deferred[];

  beforeEach(() => {
    notes = [];
    progress = [];
    slowCalls = [];

    const serverHandlers: Handlers<CalcMessages> = {
      echo: (text) => {
        if (text === 'boom') {
          throw new Error('boom');
        }
        return `echo:${text}`;
      },
      slow: (value) =>
        new Promise<number>((resolve) => {
          slowCalls.push({ value, release: () => resolve(value * 10) });
        }),
      note: (text) => {
        notes.push(text);
      },
      nested: async (value) => {
        const doubled = await server.sendSync('double', value);
        return doubled + 1;
      },
    };

    const clientHandlers: Handlers<CalcClientMessages> = {
      double: async (value) => {
        const echoed = await client.sendSync('echo', String(value));
        return Number(echoed.slice('echo:'.length)) * 2;
      },
      progress: (value) => {
        progress.push(value);
      },
    };

    const [a, b] = createTransportPair();
    clientTransport = a;
    client = new Connection({
      transport: a,
      stub: createStub(CalcClientEndpoint, clientHandlers),
      peer: CalcEndpoint,
    });
    server = new Connection({
      transport: b,
      stub: createStub(CalcEndpoint, serverHandlers),
      peer: CalcClientEndpoint,
      clientId: 1,
    });
  });

  void describe('post()', () => {
    void it('delivers messages in the order they were posted', async () => {
      client.post('note', 'a');
      client.post('note', 'b');
      client.post('note', 'c');
      server.post('progress', 1);
      server.post('progress', 2);

      await assertEventually(() => notes.length === 3 && progress.length === 2, 1000);
      assert.deepEqual(notes, ['a', 'b', 'c']);
      assert.deepEqual(progress, [1, 2]);
    });

    void it('throws once the connection is closed', () => {
      client.shutdown();

      assert.throws(() => client.post('note', 'late'), {
        name: 'ConnectionClosedError',
        message: 'Connection to Calc is closed',
      });
    });
  });

  void describe('sendSync()', () => {
    void it('resolves with the decoded response', async () => {
      assert.equal(await client.sendSync('echo', 'hi'), 'echo:hi');
      assert.equal(client.pendingCallCount, 0);
    });

    void it('matches out-of-order replies to their own callers', async () => {
      const calls = Promise.all([
        client.sendSync('slow', 1),
        client.sendSync('slow', 2),
        client.sendSync('slow', 3),
      ]);

      await assertEventually(() => slowCalls.length === 3, 1000);
      for (const call of [...slowCalls].reverse()) {
        call.release();
      }

      assert.deepEqual(await calls, [10, 20, 30]);
    });

    void it('fails every pending call when the peer goes away', async () => {
      const calls = [1, 2, 3].map((value) => client.sendSync('slow', value));
      await assertEventually(() => slowCalls.length === 3, 1000);
      const died = nextEvent<[IPCError | undefined]>((listener) => client.once('die', listener));

      server.shutdown();

      for (const call of calls) {
        await assert.rejects(call, {
          name: 'ConnectionClosedError',
          message: 'Connection to Calc died before slow response received',
        });
      }
      const [error] = await died;
      assert.equal(error, undefined);
      assert.equal(client.state, 'closed');
      assert.equal(client.pendingCallCount, 0);
    });

    void it('rejects immediately on a closed connection', async () => {
      client.shutdown();

      await assert.rejects(client.sendSync('echo', 'x'), {
        name: 'ConnectionClosedError',
        message: 'Connection to Calc is closed',
      });
    });

    void it('lets handlers make nested synchronous calls in both directions', async () => {
      // client -> nested -> server calls double -> client calls echo -> server
      assert.equal(await client.sendSync('nested', 5), 11);
      assert.equal(client.isOpen, true);
      assert.equal(server.isOpen, true);
    });

    void it('abandons only the timed-out call and drops its late reply', async () => {
      await assert.rejects(client.sendSync('slow', 1, { timeoutMs: 20 }), {
        name: 'IPCTimeoutError',
        message: 'slow request timeout after 0.02s',
      });
      assert.equal(client.pendingCallCount, 0);

      await assertEventually(() => slowCalls.length === 1, 1000);
      slowCalls[0]?.release();

      assert.equal(await client.sendSync('echo', 'still open'), 'echo:still open');
      assert.equal(client.isOpen, true);
    });

    void it('dies once more timed-out calls stay unanswered than it will track', async () => {
      // The other end never attaches, so nothing is ever answered
      const [silent] = createTransportPair();
      const stuck = new Connection({
        transport: silent,
        stub: createStub(CalcClientEndpoint, { double: (value) => value, progress: () => undefined }),
        peer: CalcEndpoint,
        maxAbandonedCalls: 2,
      });

      const results = await Promise.allSettled(
        [1, 2, 3].map((value) => stuck.sendSync('slow', value, { timeoutMs: 20 }))
      );

      assert.deepEqual(
        results.map((result) => (result.status === 'rejected' ? getName(result.reason) : 'fulfilled')),
        ['IPCTimeoutError', 'IPCTimeoutError', 'IPCTimeoutError']
      );
      assert.equal(stuck.state, 'closed');
      assert.equal(stuck.error?.message, 'Calc left more than 2 timed-out calls unanswered');
    });
  });

  void describe('fatal errors', () => {
    void it('closes on an opcode the local endpoint does not define', async () => {
      const died = nextEvent<[IPCError | undefined]>((listener) => client.once('die', listener));

      clientTransport.receive(buildMessage(CalcClientEndpoint.magic, 0xffff, undefined, u32, 0));

      const [error] = await died;
      assert.equal(error?.name, 'UnknownMessageError');
      assert.equal(
        error?.message,
        'Unknown message (magic 0x434c4e54, opcode 65535): not a CalcClient message or request'
      );
      assert.equal(client.state, 'closed');
      assert.equal(client.error, error);
    });

    void it('dispatches nothing that follows a fatal frame in the same turn', async () => {
      const progressOpcode = CalcClientEndpoint.opcodeOf('progress');
      const valid = buildMessage(CalcClientEndpoint.magic, progressOpcode, undefined, u32, 7);

      clientTransport.receive(buildMessage(CalcClientEndpoint.magic, 0xffff, undefined, u32, 0));
      clientTransport.receive(valid);

      assert.equal(client.state, 'closed');
      assert.equal(client.error?.name, 'UnknownMessageError');
      await flushTurns();
      assert.deepEqual(progress, []);
    });

    void it('dies before dispatching anything after an undecodable payload', async () => {
      const progressOpcode = CalcClientEndpoint.opcodeOf('progress');

      const malformed = buildMessage(CalcClientEndpoint.magic, progressOpcode, undefined, string, 'x');
      const valid = buildMessage(CalcClientEndpoint.magic, progressOpcode, undefined, u32, 7);

      clientTransport.receive(malformed);
      clientTransport.receive(valid);

      assert.equal(client.state, 'closed');
      assert.equal(client.error?.message, '1 trailing bytes after decode');
      await flushTurns();
      assert.deepEqual(progress, []);
    });

    void it('closes on a magic that belongs to neither endpoint', () => {
      clientTransport.receive(buildMessage(0xbad, 1, undefined, u32, 0));

      assert.equal(client.state, 'closed');
      assert.equal(
        client.error?.message,
        'Unknown message (magic 0xbad, opcode 1): magic matches neither CalcClient nor Calc'
      );
    });

    void it('closes on a response for a correlation id never issued', () => {
      clientTransport.receive(buildMessage(CalcEndpoint.magic, 2, 999, string, 'x'));

      assert.equal(client.state, 'closed');
      assert.equal(client.error?.name, 'UnknownMessageError');
      assert.equal(
        client.error?.message,
        'Unknown message (magic 0x43414c43, opcode 2): response for unknown correlation id 999'
      );
    });

    void it('closes on a payload that does not decode', async () => {
      const died = nextEvent<[IPCError | undefined]>((listener) => server.once('die', listener));

      clientTransport.send(buildMessage(CalcEndpoint.magic, 5, undefined, u32, 7));

      const [error] = await died;
      assert.equal(error?.name, 'DecodeError');
      assert.equal(server.state, 'closed');
    });

    void it('dies when a handler throws and fails the caller', async () => {
      const died = nextEvent<[IPCError | undefined]>((listener) => server.once('die', listener));

      await assert.rejects(client.sendSync('echo', 'boom'), {
        name: 'ConnectionClosedError',
        message: 'Connection to Calc died before echo response received',
      });
      const [error] = await died;
      assert.equal(error?.message, 'boom');
    });

    void it('dies with the transport error the channel reports', async () => {
      const died = nextEvent<[IPCError | undefined]>((listener) => client.once('die', listener));

      clientTransport.fail(new TransportError('Socket failure: read ECONNRESET', 'ECONNRESET'));

      const [error] = await died;
      assert.equal(error?.name, 'TransportError');
      assert.equal(client.isOpen, false);
    });
  });

  void describe('die()', () => {
    void it('runs once and notifies the owner once', () => {
      let deaths = 0;
      client.on('die', () => {
        deaths += 1;
      });

      client.die();
      client.die();
      client.shutdown();

      assert.equal(deaths, 1);
      assert.equal(client.state, 'closed');
    });
  });
});

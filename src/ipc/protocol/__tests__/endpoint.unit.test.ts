/**
 * Endpoint, Message and Stub unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { string, struct, u32 } from '@/ipc/codec/index.js';
import {
  Message,
  buildMessage,
  createStub,
  defineEndpoint,
  message,
  request,
} from '@/ipc/protocol/index.js';
import type { Handlers, MessagesOf } from '@/ipc/protocol/index.js';

const EchoEndpoint = defineEndpoint({
  name: 'Echo',
  magic: 0x4543484f,
  messages: {
    echo: request(string, string),
    log: message(string),
    add: request(struct({ a: u32, b: u32 }), u32),
  },
});

type EchoMessages = MessagesOf<typeof EchoEndpoint>;

function echoHandlers(logged: string[] = []): Handlers<EchoMessages> {
  return {
    echo: (text) => `pong:${text}`,
    log: (text) => {
      logged.push(text);
    },
    add: async ({ a, b }) => {
      await Promise.resolve();
      return a + b;
    },
  };
}

void describe('Endpoint', () => {
  void it('assigns opcodes in declaration order, two per request', () => {
    assert.equal(EchoEndpoint.opcodeOf('echo'), 1);
    assert.equal(EchoEndpoint.responseOpcodeOf('echo'), 2);
    assert.equal(EchoEndpoint.opcodeOf('log'), 3);
    assert.equal(EchoEndpoint.opcodeOf('add'), 4);
    assert.equal(EchoEndpoint.responseOpcodeOf('add'), 5);
    assert.equal(EchoEndpoint.maxOpcode, 5);
  });

  void it('looks opcodes up with their role', () => {
    assert.deepEqual(
      [1, 2, 3].map((opcode) => {
        const entry = EchoEndpoint.lookup(opcode);
        return entry ? [entry.name, entry.role] : undefined;
      }),
      [
        ['echo', 'request'],
        ['echo', 'response'],
        ['log', 'message'],
      ]
    );
    assert.equal(EchoEndpoint.lookup(0), undefined);
    assert.equal(EchoEndpoint.lookup(0xffff), undefined);
  });

  void it('is immutable once defined', () => {
    assert.ok(Object.isFrozen(EchoEndpoint));
    assert.ok(Object.isFrozen(EchoEndpoint.messages));
  });

  void it('rejects a magic that is not a u32', () => {
    assert.throws(() => defineEndpoint({ name: 'Bad', magic: -1, messages: {} }), {
      name: 'RangeError',
      message: 'Endpoint Bad: magic must be a u32',
    });
  });
});

void describe('Message', () => {
  void it('lays out magic, opcode, then fields', () => {
    const frame = buildMessage(0x1234, 3, undefined, string, 'hi');

    assert.deepEqual([...frame.bytes], [0x34, 0x12, 0, 0, 3, 0, 0, 0, 2, 0, 0, 0, 0x68, 0x69]);
  });

  void it('places the correlation id between header and fields', () => {
    const frame = buildMessage(0x1234, 1, 42, string, 'hi');
    const received = Message.fromFrame(frame);

    assert.equal(received.readCorrelationId(), 42);
    assert.equal(received.readCorrelationId(), 42);
    assert.equal(received.decodePayload(string), 'hi');
  });

  void it('decodes a payload only once', () => {
    const received = Message.fromFrame(buildMessage(0x1234, 3, undefined, string, 'hi'));
    received.decodePayload(string);

    assert.equal(received.isConsumed, true);
    assert.throws(() => received.decodePayload(string), {
      name: 'DecodeError',
      message: 'Message 3 payload already decoded',
    });
  });

  void it('rejects a frame shorter than the header', () => {
    assert.throws(() => Message.fromFrame({ bytes: Uint8Array.from([1, 0, 0, 0, 2]), files: [] }), {
      name: 'DecodeError',
      message: 'Need 4 bytes for u32 at offset 4, 1 remaining',
    });
  });
});

void describe('Stub', () => {
  void it('answers a request with the next opcode and the same correlation id', async () => {
    const stub = createStub(EchoEndpoint, echoHandlers());
    const frame = buildMessage(EchoEndpoint.magic, 1, 42, string, 'ping');

    const call = stub.decode(Message.fromFrame(frame));
    assert.equal(call.name, 'echo');
    assert.equal(call.correlationId, 42);

    const reply = await call.invoke();

    assert.ok(reply);
    const response = Message.fromFrame(reply);
    assert.equal(response.magic, EchoEndpoint.magic);
    assert.equal(response.opcode, 2);
    assert.equal(response.readCorrelationId(), 42);
    assert.equal(response.decodePayload(string), 'pong:ping');
  });

  void it('awaits asynchronous handlers', async () => {
    const stub = createStub(EchoEndpoint, echoHandlers());
    const frame = buildMessage(EchoEndpoint.magic, 4, 7, struct({ a: u32, b: u32 }), { a: 2, b: 3 });

    const reply = await stub.decode(Message.fromFrame(frame)).invoke();

    assert.ok(reply);
    const response = Message.fromFrame(reply);
    assert.equal(response.readCorrelationId(), 7);
    assert.equal(response.decodePayload(u32), 5);
  });

  void it('decodes without running the handler', () => {
    const logged: string[] = [];
    const stub = createStub(EchoEndpoint, echoHandlers(logged));

    const call = stub.decode(
      Message.fromFrame(buildMessage(EchoEndpoint.magic, 3, undefined, string, 'first'))
    );

    assert.equal(call.name, 'log');
    assert.equal(call.correlationId, undefined);
    assert.deepEqual(logged, []);
  });

  void it('invokes the handler before invoke() first yields', async () => {
    const logged: string[] = [];
    const stub = createStub(EchoEndpoint, echoHandlers(logged));
    const call = stub.decode(
      Message.fromFrame(buildMessage(EchoEndpoint.magic, 3, undefined, string, 'first'))
    );

    const pending = call.invoke();
    assert.deepEqual(logged, ['first']);

    assert.equal(await pending, null);
  });

  void it('throws on a foreign magic', () => {
    const stub = createStub(EchoEndpoint, echoHandlers());

    assert.throws(() => stub.decode(Message.fromFrame(buildMessage(0xdead, 1, 1, string, 'x'))), {
      name: 'UnknownMessageError',
      message: 'Unknown message (magic 0xdead, opcode 1): Echo expects magic 0x4543484f',
    });
  });

  void it('throws on response opcodes and undefined opcodes', () => {
    const stub = createStub(EchoEndpoint, echoHandlers());

    assert.throws(
      () => stub.decode(Message.fromFrame(buildMessage(EchoEndpoint.magic, 2, 1, string, 'x'))),
      {
        name: 'UnknownMessageError',
        message: 'Unknown message (magic 0x4543484f, opcode 2): not a Echo message or request',
      }
    );
    assert.throws(
      () =>
        stub.decode(
          Message.fromFrame(buildMessage(EchoEndpoint.magic, 0xffff, undefined, string, 'x'))
        ),
      {
        name: 'UnknownMessageError',
        message: 'Unknown message (magic 0x4543484f, opcode 65535): not a Echo message or request',
      }
    );
  });

  void it('throws on a payload with trailing bytes', () => {
    const stub = createStub(EchoEndpoint, echoHandlers());
    const frame = buildMessage(EchoEndpoint.magic, 3, undefined, struct({ s: string, n: u32 }), {
      s: 'x',
      n: 1,
    });

    assert.throws(() => stub.decode(Message.fromFrame(frame)), {
      name: 'DecodeError',
      message: '4 trailing bytes after decode',
    });
  });

  void it('requires a handler for every declared message', () => {
    const handlers = echoHandlers();
    Reflect.deleteProperty(handlers, 'log');

    assert.throws(() => createStub(EchoEndpoint, handlers), {
      name: 'TypeError',
      message: "Echo stub is missing a handler for 'log'",
    });
  });
});

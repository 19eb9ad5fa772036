/**
 * Stubs: the dispatch target behind a Connection.
 *
 * A stub owns one endpoint's handlers. Dispatch happens in two steps:
 * `decode` validates the opcode and decodes the payload synchronously, then
 * `invoke` runs the typed handler and, for requests, encodes the result as a
 * response frame carrying the request's correlation id.
 */

import { UnknownMessageError } from '@/ipc/errors/index.js';
import type { Frame } from '@/ipc/transport/types.js';
import { createLogger } from '@/ui/logging/index.js';

import type { Endpoint, Handlers, MessageMap } from './endpoint.js';
import { buildMessage } from './message.js';
import type { Message } from './message.js';

const log = createLogger('stub');

/**
 * A fully decoded inbound message or request, ready to run.
 */
export interface InboundCall {
  readonly name: string;
  /** Correlation id for requests, undefined for plain messages */
  readonly correlationId: number | undefined;

  /**
   * Run the handler. It is invoked before the first await, so invoking calls
   * in arrival order starts their handlers in arrival order.
   *
   * @returns The response frame for requests, null for plain messages
   */
  invoke(): Promise<Frame | null>;
}

export interface Stub {
  readonly magic: number;
  readonly name: string;

  /**
   * Validate and decode one inbound message without running anything.
   *
   * @throws UnknownMessageError when the magic or opcode is not this endpoint's
   * @throws DecodeError when the payload does not match the declared shape
   */
  decode(message: Message): InboundCall;
}

type ErasedHandler = (payload: unknown) => unknown;

class EndpointStub<M extends MessageMap> implements Stub {
  private readonly handlers = new Map<string, ErasedHandler>();

  constructor(
    private readonly endpoint: Endpoint<M>,
    handlers: Handlers<M>
  ) {
    for (const name of Object.keys(endpoint.messages)) {
      const handler: unknown = Reflect.get(handlers, name);
      if (typeof handler !== 'function') {
        throw new TypeError(`${endpoint.name} stub is missing a handler for '${name}'`);
      }
      this.handlers.set(name, (payload) => Reflect.apply(handler, handlers, [payload]));
    }
  }

  get magic(): number {
    return this.endpoint.magic;
  }

  get name(): string {
    return this.endpoint.name;
  }

  decode(message: Message): InboundCall {
    if (message.magic !== this.endpoint.magic) {
      throw new UnknownMessageError(
        message.magic,
        message.opcode,
        `${this.endpoint.name} expects magic 0x${this.endpoint.magic.toString(16)}`
      );
    }

    const entry = this.endpoint.lookup(message.opcode);
    const handler = entry ? this.handlers.get(entry.name) : undefined;
    if (!entry || !handler || entry.role === 'response') {
      throw new UnknownMessageError(
        message.magic,
        message.opcode,
        `not a ${this.endpoint.name} message or request`
      );
    }

    const { name, spec } = entry;
    if (spec.kind === 'message') {
      const payload = message.decodePayload(spec.payload);
      return {
        name,
        correlationId: undefined,
        invoke: async () => {
          log.debug(`${this.endpoint.name}.${name}`);
          await handler(payload);
          return null;
        },
      };
    }

    const correlationId = message.readCorrelationId();
    const payload = message.decodePayload(spec.payload);
    const responseOpcode = message.opcode + 1;
    return {
      name,
      correlationId,
      invoke: async () => {
        log.debug(`${this.endpoint.name}.${name} #${correlationId}`);
        const result = await handler(payload);
        return buildMessage(this.endpoint.magic, responseOpcode, correlationId, spec.response, result);
      },
    };
  }
}

/**
 * Bind handlers to an endpoint.
 *
 * @example
 * ```typescript
 * const stub = createStub(EchoEndpoint, {
 *   echo: (text) => text,
 *   log: (text) => console.error(text),
 * });
 * ```
 */
export function createStub<M extends MessageMap>(endpoint: Endpoint<M>, handlers: Handlers<M>): Stub {
  return new EndpointStub(endpoint, handlers);
}

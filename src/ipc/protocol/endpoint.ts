/**
 * Endpoint schemas.
 *
 * An endpoint names one side of a service channel: its magic number and the
 * messages it accepts. Opcodes are assigned from declaration order starting
 * at 1; a request takes two consecutive opcodes, the second one carrying its
 * response. Endpoints are plain immutable values passed to every Connection
 * and Stub that needs them; there is no process-wide registry.
 */

import type { Codec } from '@/ipc/codec/index.js';

// ============================================================================
// Message Specs
// ============================================================================

/**
 * Fire-and-forget message.
 */
export interface AsyncMessageSpec<P> {
  readonly kind: 'message';
  readonly payload: Codec<P>;
}

/**
 * Synchronous request with a correlated response.
 */
export interface SyncMessageSpec<P, R> {
  readonly kind: 'request';
  readonly payload: Codec<P>;
  readonly response: Codec<R>;
}

export type MessageSpec = AsyncMessageSpec<unknown> | SyncMessageSpec<unknown, unknown>;

export type MessageMap = Record<string, MessageSpec>;

export function message<P>(payload: Codec<P>): AsyncMessageSpec<P> {
  return { kind: 'message', payload };
}

export function request<P, R>(payload: Codec<P>, response: Codec<R>): SyncMessageSpec<P, R> {
  return { kind: 'request', payload, response };
}

// ============================================================================
// Type Helpers
// ============================================================================

export type PayloadOf<S> = S extends { payload: Codec<infer P> } ? P : never;

export type ResponseOf<S> = S extends { response: Codec<infer R> } ? R : never;

/**
 * Names of the messages of one kind ('message' or 'request') in a map.
 */
export type MessageNames<M extends MessageMap, K extends MessageSpec['kind']> = {
  [N in keyof M]: M[N] extends { kind: K } ? N : never;
}[keyof M] &
  string;

/**
 * One handler per declared message. Requests return their response;
 * messages return nothing. Omitting a message is a compile error.
 */
export type Handlers<M extends MessageMap> = {
  [N in keyof M]: M[N] extends { kind: 'request' }
    ? (payload: PayloadOf<M[N]>) => ResponseOf<M[N]> | Promise<ResponseOf<M[N]>>
    : (payload: PayloadOf<M[N]>) => void | Promise<void>;
};

// ============================================================================
// Endpoint
// ============================================================================

export type OpcodeRole = 'message' | 'request' | 'response';

export interface OpcodeEntry {
  readonly name: string;
  readonly role: OpcodeRole;
  readonly spec: MessageSpec;
}

export interface EndpointDefinition<M extends MessageMap> {
  name: string;
  magic: number;
  messages: M;
}

export class Endpoint<M extends MessageMap> {
  readonly name: string;
  readonly magic: number;
  readonly messages: Readonly<M>;

  private readonly byOpcode = new Map<number, OpcodeEntry>();
  private readonly byName = new Map<string, { opcode: number; responseOpcode?: number }>();

  constructor(definition: EndpointDefinition<M>) {
    if (!Number.isInteger(definition.magic) || definition.magic < 0 || definition.magic > 0xffffffff) {
      throw new RangeError(`Endpoint ${definition.name}: magic must be a u32`);
    }

    this.name = definition.name;
    this.magic = definition.magic;
    this.messages = Object.freeze({ ...definition.messages });

    let opcode = 1;
    for (const [name, spec] of Object.entries(definition.messages)) {
      if (spec.kind === 'request') {
        this.byOpcode.set(opcode, { name, role: 'request', spec });
        this.byOpcode.set(opcode + 1, { name, role: 'response', spec });
        this.byName.set(name, { opcode, responseOpcode: opcode + 1 });
        opcode += 2;
      } else {
        this.byOpcode.set(opcode, { name, role: 'message', spec });
        this.byName.set(name, { opcode });
        opcode += 1;
      }
    }

    Object.freeze(this);
  }

  /**
   * Opcode of a message, or of the request half of a request.
   */
  opcodeOf(name: keyof M & string): number {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new RangeError(`Endpoint ${this.name} has no message '${name}'`);
    }
    return entry.opcode;
  }

  /**
   * Opcode carrying the response of a request.
   */
  responseOpcodeOf(name: MessageNames<M, 'request'>): number {
    const entry = this.byName.get(name);
    if (entry?.responseOpcode === undefined) {
      throw new RangeError(`Endpoint ${this.name} has no request '${name}'`);
    }
    return entry.responseOpcode;
  }

  lookup(opcode: number): OpcodeEntry | undefined {
    return this.byOpcode.get(opcode);
  }

  /**
   * Highest opcode in use.
   */
  get maxOpcode(): number {
    return this.byOpcode.size;
  }
}

/**
 * Message map of an endpoint value.
 */
export type MessagesOf<E> = E extends Endpoint<infer M> ? M : never;

/**
 * Define an endpoint schema.
 *
 * @example
 * ```typescript
 * const EchoEndpoint = defineEndpoint({
 *   name: 'Echo',
 *   magic: 0x4543484f,
 *   messages: {
 *     echo: request(string, string),
 *     log: message(string),
 *   },
 * });
 * // echo -> opcodes 1 (request) and 2 (response), log -> opcode 3
 * ```
 */
export function defineEndpoint<M extends MessageMap>(definition: EndpointDefinition<M>): Endpoint<M> {
  return new Endpoint(definition);
}

/**
 * Connection: one transport turned into a typed, bidirectional message channel.
 *
 * Outbound traffic is addressed to the peer endpoint (`post` for messages,
 * `sendSync` for requests); inbound messages and requests go to the local
 * stub; inbound responses resolve pending calls.
 *
 * Concurrency model: everything runs on the event loop. Frames are
 * dispatched in arrival order and the dispatch loop never waits for a
 * handler to finish before reading the next frame. A synchronous call is a
 * promise resolved only by the dispatch loop, so a handler may await its own
 * `sendSync` (or be re-entered by a nested call from the peer) without
 * blocking the frames that will resolve it. Handlers may also call into other
 * connections freely.
 */

import { EventEmitter } from 'events';

import { getSyncCallTimeout, MAX_ABANDONED_CALLS, MAX_CORRELATION_ID } from '@/constants.js';
import type { Codec } from '@/ipc/codec/index.js';
import {
  ConnectionClosedError,
  IPCError,
  IPCTimeoutError,
  UnknownMessageError,
  formatTransportError,
  toIPCError,
} from '@/ipc/errors/index.js';
import { releaseDescriptors } from '@/ipc/file/IpcFile.js';
import { Message, buildMessage } from '@/ipc/protocol/index.js';
import type {
  Endpoint,
  InboundCall,
  MessageMap,
  MessageNames,
  MessageSpec,
  PayloadOf,
  ResponseOf,
  Stub,
} from '@/ipc/protocol/index.js';
import type { Frame, Transport } from '@/ipc/transport/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import { PendingCallManager } from './PendingCallManager.js';

/**
 * open: dispatching. closing: die() in progress, pending calls being failed.
 * closed: terminal, nothing is sent or received.
 */
export type ConnectionState = 'open' | 'closing' | 'closed';

type ConnectionEvents = {
  /** Emitted once. `error` is set when the connection died of a fatal failure. */
  die: (error: IPCError | undefined) => void;
};

export interface ConnectionOptions<P extends MessageMap> {
  transport: Transport;
  /** Dispatch target for inbound messages and requests */
  stub: Stub;
  /** Endpoint the peer implements; outbound traffic is addressed to it */
  peer: Endpoint<P>;
  /** Identifier assigned by the owner (0 for client-side connections) */
  clientId?: number;
  /** Default timeout for sendSync (0 = wait until the connection dies) */
  syncTimeoutMs?: number;
  /** Timed-out calls still awaiting a late reply before the connection dies */
  maxAbandonedCalls?: number;
}

export interface SyncCallOptions {
  /** Override the connection's default timeout for this call */
  timeoutMs?: number;
}

export class Connection<P extends MessageMap> extends EventEmitter {
  readonly clientId: number;
  readonly peer: Endpoint<P>;

  private readonly transport: Transport;
  private readonly stub: Stub;
  private readonly pending = new PendingCallManager();
  /** Correlation ids whose caller gave up; a late response for them is dropped */
  private readonly abandoned = new Set<number>();
  private readonly defaultTimeoutMs: number;
  private readonly maxAbandonedCalls: number;
  private readonly log: Logger;

  private nextCorrelationId = 1;
  private currentState: ConnectionState = 'open';
  private fatalError: IPCError | undefined;

  constructor(options: ConnectionOptions<P>) {
    super();
    this.transport = options.transport;
    this.stub = options.stub;
    this.peer = options.peer;
    this.clientId = options.clientId ?? 0;
    this.log = createLogger('connection', this.clientId);
    this.defaultTimeoutMs = options.syncTimeoutMs ?? getSyncCallTimeout();
    this.maxAbandonedCalls = options.maxAbandonedCalls ?? MAX_ABANDONED_CALLS;

    this.transport.attach({
      onFrame: (frame) => this.handleFrame(frame),
      onClose: () => this.die(),
      onError: (error) => this.die(error),
    });
  }

  override on<Event extends keyof ConnectionEvents>(
    event: Event,
    listener: ConnectionEvents[Event]
  ): this {
    return super.on(event, listener);
  }

  override once<Event extends keyof ConnectionEvents>(
    event: Event,
    listener: ConnectionEvents[Event]
  ): this {
    return super.once(event, listener);
  }

  override off<Event extends keyof ConnectionEvents>(
    event: Event,
    listener: ConnectionEvents[Event]
  ): this {
    return super.off(event, listener);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isOpen(): boolean {
    return this.currentState === 'open';
  }

  /**
   * The failure the connection died of, if it died of one.
   */
  get error(): IPCError | undefined {
    return this.fatalError;
  }

  get pendingCallCount(): number {
    return this.pending.size;
  }

  /**
   * Send a fire-and-forget message. Returns once the frame is handed to the transport.
   *
   * @throws ConnectionClosedError if the connection is not open
   */
  post<N extends MessageNames<P, 'message'>>(name: N, payload: PayloadOf<P[N]>): void {
    if (!this.isOpen) {
      throw new ConnectionClosedError(this.peer.name);
    }

    const codec: Codec<unknown> = this.peer.messages[name].payload;
    const frame = buildMessage(this.peer.magic, this.peer.opcodeOf(name), undefined, codec, payload);
    if (!this.sendFrame(frame)) {
      throw new ConnectionClosedError(this.peer.name);
    }
  }

  /**
   * Send a request and wait for its correlated response.
   *
   * Rejects with ConnectionClosedError when the connection dies first, and
   * with IPCTimeoutError when a timeout is set and expires. A timeout only
   * abandons this call; the connection stays open.
   */
  async sendSync<N extends MessageNames<P, 'request'>>(
    name: N,
    payload: PayloadOf<P[N]>,
    options: SyncCallOptions = {}
  ): Promise<ResponseOf<P[N]>> {
    if (!this.isOpen) {
      throw new ConnectionClosedError(this.peer.name);
    }

    const spec: MessageSpec = this.peer.messages[name];
    if (spec.kind !== 'request') {
      throw new TypeError(`${this.peer.name}.${name} is not a request`);
    }

    const correlationId = this.allocateCorrelationId();
    const frame = buildMessage(
      this.peer.magic,
      this.peer.opcodeOf(name),
      correlationId,
      spec.payload,
      payload
    );
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    const response = new Promise<unknown>((resolve, reject) => {
      const timeout =
        timeoutMs > 0
          ? setTimeout(() => {
              this.pending.remove(correlationId);
              reject(new IPCTimeoutError(name, timeoutMs));
              this.abandon(correlationId, name);
            }, timeoutMs)
          : null;

      this.pending.add(correlationId, {
        messageName: name,
        responseOpcode: this.peer.responseOpcodeOf(name),
        responseCodec: spec.response,
        resolve,
        reject,
        timeout,
      });
    });

    this.log.debug(`${this.describe()} -> ${name} #${correlationId}`);
    this.sendFrame(frame);

    const value = await response;
    return value as ResponseOf<P[N]>;
  }

  /**
   * Close the connection from this side.
   */
  shutdown(): void {
    this.die();
  }

  /**
   * Tear the connection down. Runs once; later calls are no-ops.
   *
   * Fails every pending call with ConnectionClosedError, closes the transport
   * and emits 'die' so the owner can release its bookkeeping.
   */
  die(error?: IPCError): void {
    if (this.currentState !== 'open') {
      return;
    }
    this.currentState = 'closing';
    this.fatalError = error;

    if (error) {
      this.log.info(`${this.describe()} died: ${error.message}`);
    } else {
      this.log.debug(`${this.describe()} closed`);
    }

    this.pending.rejectAll((call) => new ConnectionClosedError(this.peer.name, call.messageName));
    this.abandoned.clear();
    this.transport.close();

    this.currentState = 'closed';
    this.emit('die', error);
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private handleFrame(frame: Frame): void {
    if (!this.isOpen) {
      releaseDescriptors(frame.files);
      return;
    }

    let message: Message;
    try {
      message = Message.fromFrame(frame);
    } catch (error) {
      releaseDescriptors(frame.files);
      this.die(toIPCError(error));
      return;
    }

    const peerEntry = message.magic === this.peer.magic ? this.peer.lookup(message.opcode) : undefined;
    if (peerEntry?.role === 'response') {
      this.handleResponse(message);
      return;
    }

    if (message.magic === this.stub.magic) {
      this.dispatchToStub(message);
      return;
    }

    message.discard();
    this.die(
      new UnknownMessageError(
        message.magic,
        message.opcode,
        `magic matches neither ${this.stub.name} nor ${this.peer.name}`
      )
    );
  }

  private handleResponse(message: Message): void {
    let correlationId: number;
    try {
      correlationId = message.readCorrelationId();
    } catch (error) {
      message.discard();
      this.die(toIPCError(error));
      return;
    }

    const call = this.pending.remove(correlationId);
    if (!call) {
      message.discard();
      if (this.abandoned.delete(correlationId)) {
        this.log.debug(`${this.describe()} dropped late response #${correlationId}`);
        return;
      }
      this.die(
        new UnknownMessageError(
          message.magic,
          message.opcode,
          `response for unknown correlation id ${correlationId}`
        )
      );
      return;
    }

    if (call.responseOpcode !== message.opcode) {
      message.discard();
      const failure = new UnknownMessageError(
        message.magic,
        message.opcode,
        `response #${correlationId} does not answer ${call.messageName}`
      );
      call.reject(failure);
      this.die(failure);
      return;
    }

    let value: unknown;
    try {
      value = message.decodePayload(call.responseCodec);
    } catch (error) {
      const failure = toIPCError(error);
      call.reject(failure);
      this.die(failure);
      return;
    }

    this.log.debug(`${this.describe()} <- ${call.messageName} #${correlationId}`);
    call.resolve(value);
  }

  /**
   * Decode synchronously so a protocol violation kills the connection before
   * the transport hands over the next frame; only the handler runs detached.
   */
  private dispatchToStub(message: Message): void {
    let call: InboundCall;
    try {
      call = this.stub.decode(message);
    } catch (error) {
      message.discard();
      this.die(toIPCError(error));
      return;
    }

    void call.invoke().then(
      (reply) => {
        if (!reply) return;
        if (!this.isOpen) {
          releaseDescriptors(reply.files);
          return;
        }
        this.sendFrame(reply);
      },
      (error: unknown) => {
        this.die(toIPCError(error));
      }
    );
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Hand a frame to the transport. A send failure kills the connection.
   *
   * @returns false when the frame could not be sent
   */
  private sendFrame(frame: Frame): boolean {
    try {
      this.transport.send(frame);
      return true;
    } catch (error) {
      releaseDescriptors(frame.files);
      this.die(formatTransportError(error));
      return false;
    }
  }

  /**
   * Reserve a timed-out call's id until its late reply shows up. A peer that
   * leaves too many calls unanswered is treated as stuck and the connection dies.
   */
  private abandon(correlationId: number, name: string): void {
    if (this.abandoned.size >= this.maxAbandonedCalls) {
      this.die(
        new IPCError(
          `${this.peer.name} left more than ${this.maxAbandonedCalls} timed-out calls unanswered`,
          EXIT_CODES.IPC_TIMEOUT
        )
      );
      return;
    }
    this.abandoned.add(correlationId);
    this.log.debug(`${this.describe()} abandoned ${name} #${correlationId}`);
  }

  private allocateCorrelationId(): number {
    for (;;) {
      const id = this.nextCorrelationId;
      this.nextCorrelationId = id >= MAX_CORRELATION_ID ? 1 : id + 1;
      if (!this.pending.has(id) && !this.abandoned.has(id)) {
        return id;
      }
    }
  }

  private describe(): string {
    return `${this.stub.name} -> ${this.peer.name}`;
  }
}

/**
 * FakeTransport - in-process Transport pair for Connection tests
 *
 * Frames sent on one end arrive at the other end on a later tick, in send
 * order, the way they would over a stream socket. Closing one end reports
 * closure to the other.
 *
 * @example
 * const [clientSide, serverSide] = createTransportPair();
 * const client = new Connection({ transport: clientSide, stub, peer });
 */

import { TransportError } from '@/ipc/errors/index.js';
import type { Frame, Transport, TransportHandlers } from '@/ipc/transport/index.js';

export class FakeTransport implements Transport {
  peer: FakeTransport | null = null;
  /** Every frame handed to send(), in order */
  readonly sent: Frame[] = [];

  private handlers: TransportHandlers | null = null;
  private readonly backlog: Frame[] = [];
  private closed = false;
  private closeDelivered = false;

  get isOpen(): boolean {
    return !this.closed;
  }

  attach(handlers: TransportHandlers): void {
    if (this.handlers) {
      throw new TransportError('Transport handlers already attached');
    }
    this.handlers = handlers;
    for (const frame of this.backlog.splice(0)) {
      if (this.closed) return;
      handlers.onFrame(frame);
    }
  }

  send(frame: Frame): void {
    if (this.closed) {
      throw new TransportError('Cannot send on a closed transport');
    }
    this.sent.push(frame);
    const peer = this.peer;
    const copy: Frame = { bytes: Uint8Array.from(frame.bytes), files: [...frame.files] };
    setImmediate(() => peer?.receive(copy));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const peer = this.peer;
    setImmediate(() => peer?.remoteClosed());
  }

  /**
   * Deliver a frame as if the peer had written it.
   */
  receive(frame: Frame): void {
    if (this.closed) return;
    if (!this.handlers) {
      this.backlog.push(frame);
      return;
    }
    this.handlers.onFrame(frame);
  }

  /**
   * Report a channel failure to the attached handlers.
   */
  fail(error: TransportError): void {
    this.handlers?.onError(error);
  }

  private remoteClosed(): void {
    this.closed = true;
    if (this.closeDelivered) return;
    this.closeDelivered = true;
    this.handlers?.onClose();
  }
}

/**
 * Create two connected fake transports.
 */
export function createTransportPair(): [FakeTransport, FakeTransport] {
  const a = new FakeTransport();
  const b = new FakeTransport();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

/**
 * Framed transport over a connected Unix domain stream socket.
 *
 * Node.js exposes no SCM_RIGHTS ancillary data on net.Socket, so descriptor
 * numbers travel in the frame's descriptor block. They name the same open
 * file on both ends only when the peers share a descriptor table (both ends
 * in one process, or descriptors inherited by a child at spawn). Unless the
 * owner declares that with `sharedDescriptorTable`, a frame carrying
 * descriptors is a transport failure in either direction and no number a
 * peer wrote is ever adopted or closed.
 */

import type { Socket } from 'net';

import { TransportError, formatTransportError } from '@/ipc/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';

import { FrameReader, toWireFrame } from './framing.js';
import type { Frame, Transport, TransportHandlers } from './types.js';

const log = createLogger('transport');

export interface SocketTransportOptions {
  /** Both ends resolve descriptor numbers in the same table (default false) */
  sharedDescriptorTable?: boolean;
}

export class SocketTransport implements Transport {
  private readonly reader = new FrameReader();
  private readonly sharedDescriptorTable: boolean;
  private closed = false;
  private closeReported = false;
  private attached = false;
  private draining = false;

  constructor(
    private readonly socket: Socket,
    options: SocketTransportOptions = {}
  ) {
    this.sharedDescriptorTable = options.sharedDescriptorTable ?? false;
    socket.setNoDelay(true);
  }

  get isOpen(): boolean {
    return !this.closed && !this.socket.destroyed;
  }

  attach(handlers: TransportHandlers): void {
    if (this.attached) {
      throw new TransportError('Transport handlers already attached');
    }
    this.attached = true;

    const reportClose = (): void => {
      if (this.closeReported) return;
      this.closeReported = true;
      if (this.reader.pendingBytes > 0) {
        log.debug(`Peer closed with ${this.reader.pendingBytes} bytes of an incomplete frame`);
      }
      this.close();
      handlers.onClose();
    };

    this.socket.on('data', (chunk: Buffer) => {
      let frames: Frame[];
      try {
        frames = this.reader.push(chunk);
      } catch (error) {
        handlers.onError(formatTransportError(error));
        reportClose();
        return;
      }

      for (const frame of frames) {
        if (this.closed) return;
        if (frame.files.length > 0 && !this.sharedDescriptorTable) {
          handlers.onError(
            new TransportError(
              `Peer attached ${frame.files.length} descriptors without a shared descriptor table`
            )
          );
          reportClose();
          return;
        }
        handlers.onFrame(frame);
      }
    });

    // A zero-length read: the peer shut its side down cleanly.
    this.socket.once('end', reportClose);
    this.socket.once('close', reportClose);

    this.socket.on('error', (error: Error) => {
      if (this.closeReported) return;
      handlers.onError(formatTransportError(error));
    });
  }

  send(frame: Frame): void {
    if (!this.isOpen) {
      throw new TransportError('Cannot send on a closed transport');
    }
    if (frame.files.length > 0 && !this.sharedDescriptorTable) {
      throw new TransportError(
        `Cannot send ${frame.files.length} descriptors without a shared descriptor table`
      );
    }

    const flushed = this.socket.write(toWireFrame(frame));
    if (!flushed && !this.draining) {
      this.draining = true;
      log.debug(`Write buffer above high-water mark (${this.socket.writableLength} bytes queued)`);
      this.socket.once('drain', () => {
        this.draining = false;
        log.debug('Write buffer drained');
      });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.reader.clear();
    this.socket.destroy();
  }
}

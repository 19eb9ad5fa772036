/**
 * Transport contract shared by every channel implementation.
 */

import type { TransportError } from '@/ipc/errors/index.js';

/**
 * One unit moved by a transport: payload bytes plus the descriptors attached
 * to exactly this payload.
 */
export interface Frame {
  bytes: Uint8Array;
  files: number[];
}

export interface TransportHandlers {
  /** A complete frame arrived. Called in arrival order. */
  onFrame: (frame: Frame) => void;
  /** The peer shut down or the channel was closed. Called at most once. */
  onClose: () => void;
  /** The channel failed for a reason other than a clean shutdown. */
  onError: (error: TransportError) => void;
}

/**
 * Bidirectional framed channel to exactly one peer.
 */
export interface Transport {
  readonly isOpen: boolean;

  /**
   * Start delivering inbound frames. Bytes that arrived before attaching are
   * held and delivered once handlers are in place.
   */
  attach(handlers: TransportHandlers): void;

  /**
   * Queue a frame for the peer. Throws TransportError when the channel is closed.
   */
  send(frame: Frame): void;

  /**
   * Close the channel. Idempotent.
   */
  close(): void;
}

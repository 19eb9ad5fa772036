/**
 * Pending Call Manager
 *
 * Tracks synchronous calls waiting for their correlated response.
 * The dispatch loop is the only code that resolves an entry; die() rejects
 * whatever is left.
 */

import type { Codec } from '@/ipc/codec/index.js';

/**
 * Synchronous call waiting for its response frame.
 */
export interface PendingCall {
  messageName: string;
  /** Opcode the response must arrive under */
  responseOpcode: number;
  responseCodec: Codec<unknown>;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout | null;
}

/**
 * Manages pending calls keyed by correlation id, with timeout cleanup.
 */
export class PendingCallManager {
  private readonly pending = new Map<number, PendingCall>();

  add(correlationId: number, call: PendingCall): void {
    this.pending.set(correlationId, call);
  }

  get(correlationId: number): PendingCall | undefined {
    return this.pending.get(correlationId);
  }

  has(correlationId: number): boolean {
    return this.pending.has(correlationId);
  }

  /**
   * Remove a pending call and clear its timeout.
   */
  remove(correlationId: number): PendingCall | undefined {
    const call = this.pending.get(correlationId);
    if (call) {
      if (call.timeout) {
        clearTimeout(call.timeout);
      }
      this.pending.delete(correlationId);
    }
    return call;
  }

  getAll(): IterableIterator<[number, PendingCall]> {
    return this.pending.entries();
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Reject every pending call and empty the table.
   *
   * @param toError - Builds the rejection for one call
   */
  rejectAll(toError: (call: PendingCall) => Error): void {
    const calls = [...this.pending.values()];
    this.clear();
    for (const call of calls) {
      call.reject(toError(call));
    }
  }

  /**
   * Clear all pending calls and their timeouts without settling them.
   */
  clear(): void {
    for (const [, call] of this.pending) {
      if (call.timeout) {
        clearTimeout(call.timeout);
      }
    }
    this.pending.clear();
  }
}

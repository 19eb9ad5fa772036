/**
 * Structured IPC error classes.
 *
 * Every failure the substrate reports is one of these, so owners can tell a
 * clean peer shutdown (ConnectionClosedError) apart from the fatal protocol
 * failures (DecodeError, TransportError, UnknownMessageError).
 */

import { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';

/**
 * Base class for all IPC-related errors.
 *
 * Extends Error to include exit codes for consistent CLI behavior.
 */
export class IPCError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'IPCError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IPCError);
    }
  }
}

/**
 * Payload bytes or descriptors do not match what the decoder expects.
 *
 * Always fatal to the connection: byte alignment with the peer is lost.
 *
 * @example
 * ```typescript
 * throw new DecodeError('Need 4 bytes for u32, 2 remaining');
 * ```
 */
export class DecodeError extends IPCError {
  public override readonly name = 'DecodeError';

  constructor(message: string) {
    super(message, EXIT_CODES.PROTOCOL_DECODE_ERROR);
  }
}

/**
 * A value cannot be represented in its wire type (out-of-range integer,
 * descriptor already moved out of its IpcFile).
 */
export class EncodeError extends IPCError {
  public override readonly name = 'EncodeError';

  constructor(message: string) {
    super(message, EXIT_CODES.SOFTWARE_ERROR);
  }
}

/**
 * I/O failure on the underlying channel, distinct from a clean shutdown.
 */
export class TransportError extends IPCError {
  public override readonly name = 'TransportError';
  public readonly code?: string;

  constructor(message: string, code?: string) {
    super(message, EXIT_CODES.TRANSPORT_FAILURE);
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * The connection shut down (peer closed or local close) before a call completed.
 *
 * @example
 * ```typescript
 * throw new ConnectionClosedError('RequestServer', 'getHeaders');
 * ```
 */
export class ConnectionClosedError extends IPCError {
  public override readonly name = 'ConnectionClosedError';
  public readonly endpointName: string;
  public readonly messageName?: string;

  constructor(endpointName: string, messageName?: string) {
    super(
      messageName
        ? `Connection to ${endpointName} died before ${messageName} response received`
        : `Connection to ${endpointName} is closed`,
      EXIT_CODES.CONNECTION_CLOSED
    );
    this.endpointName = endpointName;
    if (messageName !== undefined) {
      this.messageName = messageName;
    }
  }
}

/**
 * A message arrived whose magic or opcode the receiving endpoint does not define.
 *
 * Indicates schema skew between peers; fatal to the connection.
 *
 * @example
 * ```typescript
 * throw new UnknownMessageError(0x52455153, 0xffff);
 * ```
 */
export class UnknownMessageError extends IPCError {
  public override readonly name = 'UnknownMessageError';
  public readonly magic: number;
  public readonly opcode: number;

  constructor(magic: number, opcode: number, detail?: string) {
    super(
      `Unknown message (magic 0x${magic.toString(16)}, opcode ${opcode})${detail ? `: ${detail}` : ''}`,
      EXIT_CODES.PROTOCOL_UNKNOWN_MESSAGE
    );
    this.magic = magic;
    this.opcode = opcode;
  }
}

/**
 * Connecting to a service socket failed.
 *
 * Indicates the service is not running or the socket is unavailable.
 */
export class IPCConnectionError extends IPCError {
  public override readonly name = 'IPCConnectionError';
  public readonly socketPath: string;
  public readonly code?: string;

  constructor(message: string, socketPath: string, code?: string) {
    super(message, EXIT_CODES.RESOURCE_NOT_FOUND);
    this.socketPath = socketPath;
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * A synchronous call or connect attempt did not finish in time.
 *
 * @example
 * ```typescript
 * throw new IPCTimeoutError('getHeaders', 5000);
 * ```
 */
export class IPCTimeoutError extends IPCError {
  public override readonly name = 'IPCTimeoutError';
  public readonly requestName: string;
  public readonly timeoutMs: number;

  constructor(requestName: string, timeoutMs: number) {
    super(`${requestName} request timeout after ${timeoutMs / 1000}s`, EXIT_CODES.IPC_TIMEOUT);
    this.requestName = requestName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Client of the request service.
 *
 * Wraps one Connection to the service and tracks the requests it started.
 * The client allocates request ids itself so that every notification the
 * service sends refers to a request the client already knows.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';

import { REQUEST_SERVICE_NAME } from '@/constants.js';
import { connectToServer } from '@/ipc/client.js';
import { Connection } from '@/ipc/connection/index.js';
import { ConnectionClosedError } from '@/ipc/errors/index.js';
import type { IPCError } from '@/ipc/errors/index.js';
import { createStub } from '@/ipc/protocol/index.js';
import type { Handlers } from '@/ipc/protocol/index.js';
import type { Transport } from '@/ipc/transport/index.js';
import { getServiceSocketPath } from '@/session/paths.js';
import { createLogger } from '@/ui/logging/index.js';

import {
  RequestClientEndpoint,
  RequestServerEndpoint,
  type RequestClientMessages,
  type RequestServerMessages,
} from './endpoints.js';
import type { CacheLevel, HeaderMap, NetworkError, SelectedFile } from './types.js';

const log = createLogger('client');

const MAX_REQUEST_ID = 0x7fffffff;

export interface RequestResult {
  requestId: number;
  statusCode: number | undefined;
  reasonPhrase: string | undefined;
  headers: HeaderMap;
  body: SelectedFile | undefined;
  totalSize: bigint;
  networkError: NetworkError | undefined;
  /** Set when the connection to the service died before the request finished */
  connectionError?: IPCError;
}

type RequestEvents = {
  started: (body: SelectedFile) => void;
  headers: (headers: HeaderMap, statusCode: number | undefined, reasonPhrase: string | undefined) => void;
  certificateRequested: () => void;
  finished: (result: RequestResult) => void;
};

/**
 * One request started through a RequestClient.
 */
export class Request extends EventEmitter {
  readonly done: Promise<RequestResult>;

  private statusCode: number | undefined;
  private reasonPhrase: string | undefined;
  private headers: HeaderMap = [];
  private body: SelectedFile | undefined;
  private settle: (result: RequestResult) => void = () => undefined;
  private finished = false;
  private listening = false;
  private readonly backlog: Array<() => void> = [];

  constructor(
    readonly id: number,
    readonly method: string,
    readonly url: URL,
    private readonly owner: RequestClient
  ) {
    super();
    this.done = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  override on<Event extends keyof RequestEvents>(event: Event, listener: RequestEvents[Event]): this {
    return super.on(event, listener);
  }

  override once<Event extends keyof RequestEvents>(
    event: Event,
    listener: RequestEvents[Event]
  ): this {
    return super.once(event, listener);
  }

  override off<Event extends keyof RequestEvents>(event: Event, listener: RequestEvents[Event]): this {
    return super.off(event, listener);
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Ask the service to stop this request. No further notifications follow.
   */
  async stop(): Promise<boolean> {
    return this.owner.stopRequest(this);
  }

  /**
   * Answer a `certificateRequested` notification.
   */
  async setCertificate(certificate: string, key: string): Promise<boolean> {
    return this.owner.setCertificate(this, certificate, key);
  }

  /**
   * Start emitting. Notifications that arrived together with the
   * startRequest reply are held until the caller's current turn ends, so
   * listeners attached right after `await client.startRequest()` see them.
   *
   * @internal
   */
  listen(): void {
    setImmediate(() => {
      this.listening = true;
      for (const event of this.backlog.splice(0)) {
        event();
      }
    });
  }

  /** @internal */
  didStart(body: SelectedFile): void {
    this.deliver(() => {
      this.body = body;
      this.emit('started', body);
    });
  }

  /** @internal */
  didReceiveHeaders(
    headers: HeaderMap,
    statusCode: number | undefined,
    reasonPhrase: string | undefined
  ): void {
    this.deliver(() => {
      this.headers = headers;
      this.statusCode = statusCode;
      this.reasonPhrase = reasonPhrase;
      this.emit('headers', headers, statusCode, reasonPhrase);
    });
  }

  /** @internal */
  didRequestCertificate(): void {
    this.deliver(() => this.emit('certificateRequested'));
  }

  /** @internal */
  didFinish(totalSize: bigint, networkError: NetworkError | undefined, connectionError?: IPCError): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.deliver(() => this.complete(totalSize, networkError, connectionError));
  }

  private deliver(event: () => void): void {
    if (this.listening) {
      event();
    } else {
      this.backlog.push(event);
    }
  }

  private complete(
    totalSize: bigint,
    networkError: NetworkError | undefined,
    connectionError: IPCError | undefined
  ): void {
    const result: RequestResult = {
      requestId: this.id,
      statusCode: this.statusCode,
      reasonPhrase: this.reasonPhrase,
      headers: this.headers,
      body: this.body,
      totalSize,
      networkError,
      ...(connectionError ? { connectionError } : {}),
    };
    this.emit('finished', result);
    this.settle(result);
  }
}

export interface RequestClientConnectOptions {
  /** Defaults to the request service socket of the current session */
  socketPath?: string;
  connectTimeoutMs?: number;
  syncTimeoutMs?: number;
  /** Accept bodies as descriptors; only for a service in this process */
  sharedDescriptorTable?: boolean;
}

export interface StartRequestOptions {
  headers?: HeaderMap;
  body?: Uint8Array;
}

export class RequestClient {
  private readonly requests: Map<number, Request>;
  private nextRequestId = 1;

  private constructor(
    private readonly connection: Connection<RequestServerMessages>,
    requests: Map<number, Request>
  ) {
    this.requests = requests;
    connection.once('die', (error) => this.handleDie(error));
  }

  /**
   * Connect to the request service.
   *
   * @example
   * ```typescript
   * const client = await RequestClient.connect();
   * const request = await client.startRequest('GET', new URL('file:///index.html'));
   * const result = await request?.done;
   * ```
   */
  static async connect(options: RequestClientConnectOptions = {}): Promise<RequestClient> {
    const requests = new Map<number, Request>();
    const connection = await connectToServer({
      socketPath: options.socketPath ?? getServiceSocketPath(REQUEST_SERVICE_NAME),
      local: RequestClientEndpoint,
      handlers: createClientHandlers(requests),
      peer: RequestServerEndpoint,
      ...(options.connectTimeoutMs !== undefined ? { connectTimeoutMs: options.connectTimeoutMs } : {}),
      ...(options.syncTimeoutMs !== undefined ? { syncTimeoutMs: options.syncTimeoutMs } : {}),
      sharedDescriptorTable: options.sharedDescriptorTable ?? false,
    });
    return new RequestClient(connection, requests);
  }

  /**
   * Run the client over an already-established transport.
   */
  static attach(transport: Transport): RequestClient {
    const requests = new Map<number, Request>();
    const connection = new Connection({
      transport,
      stub: createStub(RequestClientEndpoint, createClientHandlers(requests)),
      peer: RequestServerEndpoint,
    });
    return new RequestClient(connection, requests);
  }

  get isConnected(): boolean {
    return this.connection.isOpen;
  }

  get activeRequestCount(): number {
    return this.requests.size;
  }

  async getHeaders(url: URL): Promise<{ status: number; headers: HeaderMap }> {
    const id = this.allocateRequestId();
    const response = await this.connection.sendSync('getHeaders', { id, url });
    return { status: response.status, headers: response.headers };
  }

  /**
   * Start a request.
   *
   * @returns The tracked request, or null when the service refused it
   * @throws ConnectionClosedError if the service connection is gone
   */
  async startRequest(
    method: string,
    url: URL,
    options: StartRequestOptions = {}
  ): Promise<Request | null> {
    const requestId = this.allocateRequestId();
    const request = new Request(requestId, method, url, this);
    this.requests.set(requestId, request);

    let started: boolean;
    try {
      ({ started } = await this.connection.sendSync('startRequest', {
        requestId,
        method,
        url,
        requestHeaders: options.headers ?? [],
        body: options.body ?? new Uint8Array(),
      }));
    } catch (error) {
      this.requests.delete(requestId);
      throw error;
    }

    if (!started) {
      this.requests.delete(requestId);
      log.debug(`${method} ${url.href} refused`);
      return null;
    }
    request.listen();
    return request;
  }

  ensureConnection(url: URL, cacheLevel: CacheLevel): void {
    this.connection.post('ensureConnection', { url, cacheLevel });
  }

  /** @internal */
  async stopRequest(request: Request): Promise<boolean> {
    if (this.requests.get(request.id) !== request) {
      return false;
    }
    this.requests.delete(request.id);
    const { stopped } = await this.connection.sendSync('stopRequest', { requestId: request.id });
    return stopped;
  }

  /** @internal */
  async setCertificate(request: Request, certificate: string, key: string): Promise<boolean> {
    if (this.requests.get(request.id) !== request) {
      return false;
    }
    const { accepted } = await this.connection.sendSync('setCertificate', {
      requestId: request.id,
      certificate,
      key,
    });
    return accepted;
  }

  close(): void {
    this.connection.shutdown();
  }

  private allocateRequestId(): number {
    for (;;) {
      const id = this.nextRequestId;
      this.nextRequestId = id >= MAX_REQUEST_ID ? 1 : id + 1;
      if (!this.requests.has(id)) {
        return id;
      }
    }
  }

  private handleDie(error: IPCError | undefined): void {
    const orphaned = [...this.requests.values()];
    this.requests.clear();
    for (const request of orphaned) {
      request.didFinish(0n, 'Unknown', error ?? new ConnectionClosedError(RequestServerEndpoint.name));
    }
  }
}

/**
 * Read a response body into memory. A descriptor-backed body is read from
 * its current position and closed.
 */
export function readBody(body: SelectedFile): Uint8Array {
  if (body.fileOrContents.kind === 'contents') {
    return body.fileOrContents.value;
  }

  const file = body.fileOrContents.value;
  const fd = file.fd;
  if (fd === null) {
    throw new Error(`Body of ${body.name} was already consumed`);
  }
  try {
    return new Uint8Array(fs.readFileSync(fd));
  } finally {
    file.close();
  }
}

function createClientHandlers(requests: Map<number, Request>): Handlers<RequestClientMessages> {
  const lookup = (requestId: number, event: string): Request | undefined => {
    const request = requests.get(requestId);
    if (!request) {
      log.debug(`${event} for unknown request #${requestId}`);
    }
    return request;
  };

  return {
    requestStarted: ({ requestId, body }) => {
      const request = lookup(requestId, 'requestStarted');
      if (!request) {
        if (body.fileOrContents.kind === 'file') {
          body.fileOrContents.value.close();
        }
        return;
      }
      request.didStart(body);
    },
    headersBecameAvailable: ({ requestId, headers, statusCode, reasonPhrase }) => {
      lookup(requestId, 'headersBecameAvailable')?.didReceiveHeaders(headers, statusCode, reasonPhrase);
    },
    requestFinished: ({ requestId, totalSize, networkError }) => {
      const request = lookup(requestId, 'requestFinished');
      if (!request) {
        return;
      }
      requests.delete(requestId);
      request.didFinish(totalSize, networkError);
    },
    certificateRequested: ({ requestId }) => {
      lookup(requestId, 'certificateRequested')?.didRequestCertificate();
    },
  };
}

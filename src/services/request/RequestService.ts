/**
 * Request service: serves `file:` URLs under a root directory to any number
 * of clients over the RequestServer / RequestClient endpoints.
 *
 * A started request answers immediately; its progress (body, headers,
 * completion) follows as RequestClient notifications once the reply has
 * been sent, in the order requestStarted, headersBecameAvailable,
 * requestFinished.
 */

import * as fs from 'fs';
import * as path from 'path';

import { IpcFile } from '@/ipc/file/IpcFile.js';
import type { IPCError } from '@/ipc/errors/index.js';
import type { Handlers, MessageNames, PayloadOf } from '@/ipc/protocol/index.js';
import { MultiServer } from '@/ipc/server/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

import {
  RequestClientEndpoint,
  RequestServerEndpoint,
  type RequestClientMessages,
  type RequestServerMessages,
} from './endpoints.js';
import type { HeaderMap, NetworkError, SelectedFile } from './types.js';

const CONTENT_TYPES: Record<string, string> = {
  '.css': 'text/css',
  '.gif': 'image/gif',
  '.htm': 'text/html',
  '.html': 'text/html',
  '.jpeg': 'image/jpeg',
  '.jpg': 'image/jpeg',
  '.js': 'text/javascript',
  '.json': 'application/json',
  '.png': 'image/png',
  '.svg': 'image/svg+xml',
  '.txt': 'text/plain',
  '.wasm': 'application/wasm',
};

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const REASON_PHRASES: Record<number, string> = {
  200: 'OK',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  501: 'Not Implemented',
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? DEFAULT_CONTENT_TYPE;
}

export interface RequestServiceOptions {
  /** Directory `file:` URL paths are resolved under */
  root: string;
  /**
   * Deliver bodies as open descriptors instead of inline bytes. Only valid
   * when the clients share this process's descriptor table.
   */
  shareDescriptors?: boolean;
  /** Ask for a client certificate before serving each request */
  requireCertificate?: boolean;
  /** Default sendSync timeout for client connections */
  syncTimeoutMs?: number;
}

type ActiveRequestState = 'awaiting-certificate' | 'running';

interface ActiveRequest {
  method: string;
  url: URL;
  state: ActiveRequestState;
}

type ResolvedPath =
  | { kind: 'file'; filePath: string; size: number }
  | { kind: 'error'; status: number };

export class RequestService {
  readonly server: MultiServer<RequestServerMessages, RequestClientMessages>;

  private readonly root: string;
  private readonly requests = new Map<number, Map<number, ActiveRequest>>();
  private readonly log = createLogger('request');

  constructor(private readonly options: RequestServiceOptions) {
    this.root = path.resolve(options.root);
    this.server = new MultiServer({
      local: RequestServerEndpoint,
      peer: RequestClientEndpoint,
      createHandlers: (clientId) => this.createHandlers(clientId),
      sharedDescriptorTable: options.shareDescriptors ?? false,
      ...(options.syncTimeoutMs !== undefined ? { syncTimeoutMs: options.syncTimeoutMs } : {}),
    });

    this.server.on('clientDied', (clientId, error) => this.handleClientDied(clientId, error));
  }

  async listen(socketPath: string): Promise<void> {
    await this.server.listen(socketPath);
  }

  async stop(): Promise<void> {
    this.requests.clear();
    await this.server.stop();
  }

  /**
   * Number of requests started but not yet finished or stopped.
   */
  get activeRequestCount(): number {
    let count = 0;
    for (const table of this.requests.values()) {
      count += table.size;
    }
    return count;
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  private createHandlers(clientId: number): Handlers<RequestServerMessages> {
    const table = new Map<number, ActiveRequest>();
    this.requests.set(clientId, table);

    return {
      getHeaders: async ({ id, url }) => {
        const resolved = await this.resolve(url);
        if (resolved.kind === 'error') {
          return { id, status: resolved.status, headers: [] };
        }
        return {
          id,
          status: 200,
          headers: [{ name: 'Content-Type', value: contentTypeFor(resolved.filePath) }],
        };
      },

      startRequest: ({ requestId, method, url, requestHeaders, body }) => {
        if (table.has(requestId) || url.protocol !== 'file:') {
          return { started: false };
        }

        this.log.debug(
          `client ${clientId} #${requestId} ${method} ${url.href} ` +
            `(${requestHeaders.length} headers, ${body.byteLength} body bytes)`
        );

        const request: ActiveRequest = {
          method,
          url,
          state: this.options.requireCertificate ? 'awaiting-certificate' : 'running',
        };
        table.set(requestId, request);

        setImmediate(() => {
          if (!this.isActive(clientId, requestId, request)) {
            return;
          }
          if (request.state === 'awaiting-certificate') {
            this.notify(clientId, 'certificateRequested', { requestId });
            return;
          }
          this.schedule(clientId, requestId, request);
        });
        return { started: true };
      },

      stopRequest: ({ requestId }) => ({ stopped: table.delete(requestId) }),

      setCertificate: ({ requestId, certificate, key }) => {
        const request = table.get(requestId);
        if (request?.state !== 'awaiting-certificate') {
          return { accepted: false };
        }
        if (certificate.length === 0 || key.length === 0) {
          return { accepted: false };
        }

        request.state = 'running';
        setImmediate(() => this.schedule(clientId, requestId, request));
        return { accepted: true };
      },

      ensureConnection: ({ url, cacheLevel }) => {
        this.log.debug(`client ${clientId} warm-up ${cacheLevel} for ${url.origin}`);
      },
    };
  }

  private handleClientDied(clientId: number, error: IPCError | undefined): void {
    const table = this.requests.get(clientId);
    this.requests.delete(clientId);
    if (table && table.size > 0) {
      this.log.debug(`client ${clientId} left ${table.size} requests behind`);
    }
    if (error) {
      this.log.info(`client ${clientId} died: ${error.message}`);
    }
  }

  // ==========================================================================
  // Request execution
  // ==========================================================================

  private schedule(clientId: number, requestId: number, request: ActiveRequest): void {
    void this.run(clientId, requestId, request).catch((error: unknown) => {
      this.log.info(`client ${clientId} #${requestId} failed: ${getErrorMessage(error)}`);
      if (this.isActive(clientId, requestId, request)) {
        this.finish(clientId, requestId, 0n, 'Unknown');
      }
    });
  }

  private async run(clientId: number, requestId: number, request: ActiveRequest): Promise<void> {
    if (!this.isActive(clientId, requestId, request)) {
      return;
    }

    if (request.method !== 'GET' && request.method !== 'HEAD') {
      this.sendHeaders(clientId, requestId, 405, [{ name: 'Allow', value: 'GET, HEAD' }]);
      this.finish(clientId, requestId, 0n);
      return;
    }

    const resolved = await this.resolve(request.url);
    if (!this.isActive(clientId, requestId, request)) {
      return;
    }
    if (resolved.kind === 'error') {
      this.sendHeaders(clientId, requestId, resolved.status, []);
      this.finish(clientId, requestId, 0n);
      return;
    }

    const headers: HeaderMap = [
      { name: 'Content-Type', value: contentTypeFor(resolved.filePath) },
      { name: 'Content-Length', value: resolved.size.toString() },
    ];

    if (request.method === 'HEAD') {
      this.sendHeaders(clientId, requestId, 200, headers);
      this.finish(clientId, requestId, 0n);
      return;
    }

    const body = await this.openBody(resolved.filePath);
    if (!this.isActive(clientId, requestId, request)) {
      if (body.fileOrContents.kind === 'file') {
        body.fileOrContents.value.close();
      }
      return;
    }

    this.notify(clientId, 'requestStarted', { requestId, body });
    this.sendHeaders(clientId, requestId, 200, headers);
    this.finish(clientId, requestId, BigInt(resolved.size));
  }

  private async openBody(filePath: string): Promise<SelectedFile> {
    const name = path.basename(filePath);
    if (this.options.shareDescriptors) {
      return { name, fileOrContents: { kind: 'file', value: IpcFile.open(filePath) } };
    }
    const contents = await fs.promises.readFile(filePath);
    return { name, fileOrContents: { kind: 'contents', value: new Uint8Array(contents) } };
  }

  private sendHeaders(clientId: number, requestId: number, status: number, headers: HeaderMap): void {
    this.notify(clientId, 'headersBecameAvailable', {
      requestId,
      headers,
      statusCode: status,
      reasonPhrase: REASON_PHRASES[status],
    });
  }

  private finish(
    clientId: number,
    requestId: number,
    totalSize: bigint,
    networkError?: NetworkError
  ): void {
    this.requests.get(clientId)?.delete(requestId);
    this.notify(clientId, 'requestFinished', { requestId, totalSize, networkError });
  }

  private isActive(clientId: number, requestId: number, request: ActiveRequest): boolean {
    return this.requests.get(clientId)?.get(requestId) === request;
  }

  private notify<N extends MessageNames<RequestClientMessages, 'message'>>(
    clientId: number,
    name: N,
    payload: PayloadOf<RequestClientMessages[N]>
  ): void {
    const connection = this.server.client(clientId);
    if (!connection?.isOpen) {
      this.log.debug(`client ${clientId} gone, dropping ${name}`);
      return;
    }
    try {
      connection.post(name, payload);
    } catch (error) {
      this.log.debug(`client ${clientId} ${name} not delivered: ${getErrorMessage(error)}`);
    }
  }

  // ==========================================================================
  // Path resolution
  // ==========================================================================

  /**
   * Map a URL onto a readable regular file under the root.
   */
  private async resolve(url: URL): Promise<ResolvedPath> {
    if (url.protocol !== 'file:') {
      return { kind: 'error', status: 501 };
    }

    let relative: string;
    try {
      relative = decodeURIComponent(url.pathname);
    } catch {
      return { kind: 'error', status: 404 };
    }

    const filePath = path.resolve(this.root, `.${path.posix.normalize(relative)}`);
    const fromRoot = path.relative(this.root, filePath);
    if (fromRoot.startsWith('..') || path.isAbsolute(fromRoot)) {
      return { kind: 'error', status: 403 };
    }

    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) {
        return { kind: 'error', status: 404 };
      }
      await fs.promises.access(filePath, fs.constants.R_OK);
      return { kind: 'file', filePath, size: stats.size };
    } catch (error) {
      const code = getErrorCode(error);
      if (code === 'EACCES' || code === 'EPERM') {
        return { kind: 'error', status: 403 };
      }
      return { kind: 'error', status: 404 };
    }
  }
}

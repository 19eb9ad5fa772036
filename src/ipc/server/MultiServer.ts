import { EventEmitter } from 'events';
import * as fs from 'fs';
import { createServer, type Server, type Socket } from 'net';
import * as path from 'path';

import { Connection } from '@/ipc/connection/index.js';
import type { IPCError } from '@/ipc/errors/index.js';
import { createStub } from '@/ipc/protocol/index.js';
import type {
  Endpoint,
  Handlers,
  MessageMap,
  MessageNames,
  PayloadOf,
} from '@/ipc/protocol/index.js';
import { SocketTransport } from '@/ipc/transport/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

type MultiServerEvents<P extends MessageMap> = {
  client: (connection: Connection<P>) => void;
  clientDied: (clientId: number, error: IPCError | undefined) => void;
};

export interface MultiServerOptions<L extends MessageMap, P extends MessageMap> {
  /** Endpoint this server implements */
  local: Endpoint<L>;
  /** Endpoint every client implements */
  peer: Endpoint<P>;
  /**
   * Build the handlers for a newly accepted client. Handlers that need to
   * talk back to their client look it up by id through `server.client(id)`.
   */
  createHandlers: (clientId: number, server: MultiServer<L, P>) => Handlers<L>;
  /** Default sendSync timeout for every client connection */
  syncTimeoutMs?: number;
  /** Clients resolve descriptor numbers in this process's table (see SocketTransport) */
  sharedDescriptorTable?: boolean;
}

/**
 * Accepts peers on a Unix domain socket and keeps one Connection per peer.
 *
 * The server's table is the only owner of its connections. Client ids start
 * at 1, only grow, and are never reused while the server lives; a connection
 * leaves the table when it dies.
 */
export class MultiServer<L extends MessageMap, P extends MessageMap> extends EventEmitter {
  private server: Server | null = null;
  private socketPath: string | null = null;
  private nextClientId = 1;
  private readonly connections = new Map<number, Connection<P>>();
  private readonly log = createLogger('server');

  constructor(private readonly options: MultiServerOptions<L, P>) {
    super();
  }

  override on<Event extends keyof MultiServerEvents<P>>(
    event: Event,
    listener: MultiServerEvents<P>[Event]
  ): this {
    return super.on(event, listener);
  }

  override once<Event extends keyof MultiServerEvents<P>>(
    event: Event,
    listener: MultiServerEvents<P>[Event]
  ): this {
    return super.once(event, listener);
  }

  override off<Event extends keyof MultiServerEvents<P>>(
    event: Event,
    listener: MultiServerEvents<P>[Event]
  ): this {
    return super.off(event, listener);
  }

  /**
   * Start listening on the provided Unix domain socket path.
   *
   * Creates the parent directory and removes a stale socket file first.
   */
  async listen(socketPath: string): Promise<void> {
    if (this.server) {
      throw new Error(`${this.options.local.name} server already listening on ${this.socketPath}`);
    }

    this.socketPath = socketPath;
    fs.mkdirSync(path.dirname(socketPath), { recursive: true });
    this.cleanupStaleSocket();

    const server = createServer((socket: Socket) => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onStartupError = (error: Error): void => {
        this.server = null;
        reject(error);
      };

      server.once('error', onStartupError);
      server.listen(socketPath, () => {
        server.off('error', onStartupError);
        server.on('error', (error) => {
          this.log.info(`Accept failed on ${socketPath}: ${error.message}`);
        });
        this.log.info(`${this.options.local.name} listening on ${socketPath}`);
        resolve();
      });
    });
  }

  get address(): string | null {
    return this.socketPath;
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Look up a live client connection by id.
   */
  client(clientId: number): Connection<P> | undefined {
    return this.connections.get(clientId);
  }

  clients(): IterableIterator<Connection<P>> {
    return this.connections.values();
  }

  /**
   * Post a message to every live client.
   *
   * @returns Number of clients the message was handed to
   */
  broadcast<N extends MessageNames<P, 'message'>>(name: N, payload: PayloadOf<P[N]>): number {
    let delivered = 0;
    for (const connection of [...this.connections.values()]) {
      try {
        connection.post(name, payload);
        delivered += 1;
      } catch (error) {
        this.log.debug(
          `Broadcast of ${name} to client ${connection.clientId} failed: ${getErrorMessage(error)}`
        );
      }
    }
    return delivered;
  }

  /**
   * Kill every client connection, stop listening and remove the socket file.
   */
  async stop(): Promise<void> {
    for (const connection of [...this.connections.values()]) {
      connection.shutdown();
    }
    this.connections.clear();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          this.log.info(`${this.options.local.name} server stopped`);
          resolve();
        });
      });
      this.server = null;
    }

    this.cleanupStaleSocket();
    this.socketPath = null;
  }

  private accept(socket: Socket): void {
    const clientId = this.nextClientId++;
    const clientLog = createLogger('server', clientId);

    let connection: Connection<P>;
    try {
      const stub = createStub(this.options.local, this.options.createHandlers(clientId, this));
      const { syncTimeoutMs, sharedDescriptorTable } = this.options;
      connection = new Connection({
        transport: new SocketTransport(socket, { sharedDescriptorTable: sharedDescriptorTable ?? false }),
        stub,
        peer: this.options.peer,
        clientId,
        ...(syncTimeoutMs !== undefined ? { syncTimeoutMs } : {}),
      });
    } catch (error) {
      clientLog.info(`Dropping client: ${getErrorMessage(error)}`);
      socket.destroy();
      return;
    }

    this.connections.set(clientId, connection);
    connection.once('die', (error) => {
      this.connections.delete(clientId);
      clientLog.debug(`Disconnected (${this.connections.size} remaining)`);
      this.emit('clientDied', clientId, error);
    });

    clientLog.debug('Accepted');
    this.emit('client', connection);
  }

  private cleanupStaleSocket(): void {
    if (!this.socketPath) {
      return;
    }

    try {
      fs.unlinkSync(this.socketPath);
    } catch (error) {
      this.log.debug(`Failed to remove socket file: ${getErrorMessage(error)}`);
    }
  }
}

import { createServer, type Server } from 'node:http';
import { type WebSocket, WebSocketServer } from 'ws';
import type { ServerConfig } from './config/serverConfig.js';
import { ConnectFour } from './game/ConnectFour.js';
import type { GameEngineFactory } from './game/types.js';
import { ConnectionHandler } from './session/ConnectionHandler.js';
import { SessionRegistry } from './session/SessionRegistry.js';
import { CloseCode } from './transport/Connection.js';
import { WebSocketConnection } from './transport/WebSocketConnection.js';
import { logger } from './utils/logger.js';

export interface DroplineServerOptions {
  readonly config: ServerConfig;
  /** Engine factory (default: Connect Four on the configured board) */
  readonly createGame?: GameEngineFactory;
}

/**
 * WebSocket session server. Runs one ConnectionHandler per connection
 * against a shared SessionRegistry.
 */
export class DroplineServer {
  private readonly httpServer: Server;
  private readonly wss: WebSocketServer;
  private readonly registry: SessionRegistry;
  private readonly config: ServerConfig;
  private readonly handlers = new Set<Promise<void>>();
  private readonly connections = new Set<WebSocketConnection>();

  constructor(options: DroplineServerOptions) {
    this.config = options.config;
    const board = options.config.board;
    this.registry = new SessionRegistry({
      createGame: options.createGame ?? (() => new ConnectFour(board)),
      tokenBytes: options.config.tokens.bytes,
    });
    this.httpServer = createServer();
    this.wss = new WebSocketServer({
      server: this.httpServer,
      maxPayload: options.config.server.maxPayloadBytes,
    });

    this.setupWebSocketHandlers();
  }

  private setupWebSocketHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      const connection = new WebSocketConnection(ws, {
        maxQueuedMessages: this.config.server.maxQueuedMessages,
      });
      this.connections.add(connection);
      logger.info('New WebSocket connection', { connectionId: connection.id });

      const handler = new ConnectionHandler(connection, this.registry);
      const running: Promise<void> = handler
        .run()
        .catch((error: unknown) => {
          logger.error('Connection handler crashed', {
            connectionId: connection.id,
            error: error instanceof Error ? error.message : String(error),
          });
        })
        .finally(() => {
          this.handlers.delete(running);
          this.connections.delete(connection);
        });
      this.handlers.add(running);
    });

    this.wss.on('error', (error: Error) => {
      logger.error('WebSocket server error', { error: error.message });
    });
  }

  /**
   * Start listening.
   * @returns Bound port (useful when the configured port is 0)
   */
  listen(): Promise<number> {
    const { host, port } = this.config.server;
    return new Promise((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        const address = this.httpServer.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        logger.info('Server started', { port: boundPort, host });
        resolve(boundPort);
      });
    });
  }

  /** Live session count */
  get sessionCount(): number {
    return this.registry.size;
  }

  /**
   * End all sessions, close remaining connections, wait for every handler
   * to detach, and stop listening.
   */
  async close(): Promise<void> {
    this.registry.close();
    for (const connection of this.connections) {
      connection.close(CloseCode.GOING_AWAY, 'Server shutting down');
    }
    await Promise.all([...this.handlers]);

    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });
    if (this.httpServer.listening) {
      this.httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
    logger.info('Server closed');
  }
}

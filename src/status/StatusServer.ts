import * as http from 'http';
import { EventEmitter } from 'events';
import { Logger, createLogger } from '../common/logger';
import { toError } from '../common/errors';
import { FailoverStatus } from '../failover/FailoverCoordinator';

export interface StatusProvider {
  getStatus(): FailoverStatus;
}

export interface StatusServerConfig {
  port: number;
  host: string;
}

export interface StatusResponse {
  statusCode: number;
  body: unknown;
}

/**
 * Read-only HTTP view of the coordinator.
 *
 *   GET /status  full status as JSON
 *   GET /health  200 when ready with quorum, 503 otherwise
 */
export class StatusServer extends EventEmitter {
  private server: http.Server | null = null;
  private readonly config: StatusServerConfig;

  constructor(
    private readonly provider: StatusProvider,
    config: Partial<StatusServerConfig> = {},
    private readonly logger: Logger = createLogger()
  ) {
    super();
    this.config = { port: 8080, host: '127.0.0.1', ...config };
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Bound port, useful when started on port 0
   */
  get port(): number | undefined {
    const address = this.server?.address();
    return address !== null && typeof address === 'object' ? address.port : undefined;
  }

  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Status server is already running');
    }

    const server = http.createServer((req, res) => this.handleRequest(req, res));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.logger.engine(`Status server listening on ${this.config.host}:${this.port ?? this.config.port}`);
    this.emit('started', { port: this.port, host: this.config.host });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    this.emit('stopped');
  }

  /**
   * Route a request without going through a socket
   */
  handle(method: string, path: string): StatusResponse {
    if (method !== 'GET') {
      return { statusCode: 405, body: { error: 'Method not allowed' } };
    }

    switch (path) {
      case '/status':
        return { statusCode: 200, body: this.provider.getStatus() };
      case '/health': {
        const status = this.provider.getStatus();
        const healthy = status.ready && status.quorum.hasQuorum;
        return {
          statusCode: healthy ? 200 : 503,
          body: {
            healthy,
            ready: status.ready,
            quorum: status.quorum.hasQuorum,
            alive: status.quorum.currentCount,
            total: status.quorum.totalCount
          }
        };
      }
      default:
        return { statusCode: 404, body: { error: 'Not found' } };
    }
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    let response: StatusResponse;
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');
      response = this.handle(req.method ?? 'GET', url.pathname);
    } catch (error) {
      this.logger.error(`Status request failed: ${toError(error).message}`);
      response = { statusCode: 500, body: { error: 'Internal server error' } };
    }

    res.writeHead(response.statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response.body));
  }
}

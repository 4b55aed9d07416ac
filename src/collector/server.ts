/**
 * Collector Server
 *
 * Receiving end for simulated devices. Accepts one JSON message per POST,
 * validates it against the wire schema, stamps `received_at` and hands the
 * record to a sink (stdout by default). Uses Node.js built-in http module.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'node:http';
import { getLogger } from '../core/logger.js';
import { WireMessageSchema, type WireMessage } from '../fleet/message.js';

export type ReceivedMessage = WireMessage & { received_at: string };

export interface CollectorServerConfig {
  port: number;
  host?: string;
  /** Receives each accepted message; defaults to one JSON line on stdout */
  onMessage?: (message: ReceivedMessage) => void;
  /** Largest accepted request body in bytes */
  maxBodyBytes?: number;
  now?: () => Date;
}

export interface CollectorStats {
  accepted: number;
  rejected: number;
}

// ═══════════════════════════════════════════════════════════════
// COLLECTOR SERVER
// ═══════════════════════════════════════════════════════════════

export class CollectorServer {
  private server: Server | null = null;
  private readonly config: Required<Omit<CollectorServerConfig, 'host'>> & { host?: string };
  private stats: CollectorStats = { accepted: 0, rejected: 0 };

  constructor(config: CollectorServerConfig) {
    this.config = {
      port: config.port,
      host: config.host,
      onMessage: config.onMessage ?? ((message) => process.stdout.write(`${JSON.stringify(message)}\n`)),
      maxBodyBytes: config.maxBodyBytes ?? 1024 * 1024,
      now: config.now ?? (() => new Date()),
    };
  }

  /** Start listening; resolves with the bound URL */
  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          getLogger().error({ err }, 'Collector request failed');
          if (!res.headersSent) {
            this.sendJSON(res, 500, { status: 'fail', message: 'Internal server error' });
          }
        });
      });
      this.server = server;

      server.on('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        const url = `http://${this.config.host ?? 'localhost'}:${this.port}`;
        getLogger().info({ url }, `Starting collector on port ${this.port}...`);
        resolve(url);
      });
    });
  }

  /** Stop the server */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      this.server = null;
      if (!server) {
        resolve();
        return;
      }
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /** Actual bound port (differs from the configured one when that was 0) */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  getStats(): CollectorStats {
    return { ...this.stats };
  }

  // ─── Request Handling ─────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method?.toUpperCase() !== 'POST') {
      return this.reject(res, 405, { status: 'fail', message: 'Method not allowed' });
    }

    const body = await this.readBody(req);
    if (body === null) {
      return this.reject(res, 413, { status: 'fail', message: 'Payload too large' });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      return this.reject(res, 400, { status: 'fail', message: 'Invalid JSON' });
    }

    const parsed = WireMessageSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      return this.reject(res, 400, { status: 'fail', message: 'Invalid message', issues });
    }

    const record: ReceivedMessage = { ...parsed.data, received_at: this.config.now().toISOString() };
    this.stats.accepted++;
    this.config.onMessage(record);
    this.sendJSON(res, 200, { status: 'success' });
  }

  private reject(res: ServerResponse, status: number, body: Record<string, unknown>): void {
    this.stats.rejected++;
    this.sendJSON(res, status, body);
  }

  /** Read the request body; null when it exceeds maxBodyBytes */
  private async readBody(req: IncomingMessage): Promise<string | null> {
    const chunks: Buffer[] = [];
    let size = 0;
    // Keep consuming past the limit; breaking out would destroy the socket before the 413 goes out
    for await (const chunk of req) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buf.length;
      if (size <= this.config.maxBodyBytes) {
        chunks.push(buf);
      }
    }
    return size > this.config.maxBodyBytes ? null : Buffer.concat(chunks).toString('utf-8');
  }

  private sendJSON(res: ServerResponse, status: number, body: Record<string, unknown>): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }
}

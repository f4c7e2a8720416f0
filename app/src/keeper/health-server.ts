/**
 * Health and price monitoring server
 */

import express, { Express } from 'express';
import { Server, createServer } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { Logger } from '../utils/logger';
import { PriceValidator } from '../oracles/price-validator';
import { CollateralEngine } from '../engine/collateral-engine';
import { KeeperService } from './keeper-service';
import { HealthReport } from './health';

export interface HealthServerConfig {
  keeper: KeeperService;
  validator: PriceValidator;
  engine: CollateralEngine;
  logger: Logger;
}

/**
 * JSON with bigint values as decimal strings
 */
function toJson(data: unknown): string {
  return JSON.stringify(data, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
}

export class HealthServer {
  private app: Express;
  private server: Server;
  private wss: WebSocketServer;
  private logger: Logger;

  constructor(private readonly config: HealthServerConfig) {
    this.logger = config.logger;
    this.app = express();
    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server });

    this.setupRoutes();
    this.setupWebSocket();
    config.keeper.on('tick', (report: HealthReport) => this.broadcast({ type: 'health', report }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      const report = this.config.keeper.healthReport();
      res.status(report.status === 'ok' ? 200 : 503).type('application/json').send(toJson(report));
    });

    this.app.get('/api/prices', (_req, res) => {
      res.type('application/json').send(
        toJson({
          prices: this.config.validator.getTrustedPrices(),
          position: this.config.engine.position(),
          paused: this.config.engine.isPaused(),
        })
      );
    });
  }

  private setupWebSocket(): void {
    this.wss.on('connection', (ws) => {
      this.logger.debug('WebSocket client connected');
      ws.send(toJson({ type: 'initial', report: this.config.keeper.healthReport() }));
      ws.on('close', () => this.logger.debug('WebSocket client disconnected'));
    });
  }

  private broadcast(data: unknown): void {
    const message = toJson(data);
    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  listen(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.logger.info(`Health server listening on :${this.port() ?? port} (GET /health, GET /api/prices, ws)`);
        resolve();
      });
    });
  }

  /**
   * Bound port once listening; resolves port 0 to the one the OS picked
   */
  port(): number | null {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : null;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.wss.clients.forEach((client) => client.terminate());
      this.wss.close();
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

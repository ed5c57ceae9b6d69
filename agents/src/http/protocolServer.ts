/**
 * Protocol Server
 * JSON endpoint the game host calls with perceive events and interact requests
 */

import type { Server } from 'node:http';
import cors from 'cors';
import express, { type Express, type Request, type Response } from 'express';
import { logger } from '@elizaos/core';
import { ClassifierError, ProtocolError, SessionNotFoundError, WerewolfPluginError, errorMessage } from '../errors.js';
import { parseInteractRequest, parsePerceiveEvent } from '../protocol/schema.js';
import type { AgentSessionsManager } from '../sessions.js';

interface ErrorBody {
  success: false;
  error: string;
  code?: string;
  issues?: string[];
}

export function statusFor(error: unknown): number {
  if (error instanceof ProtocolError) return 400;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof ClassifierError) return 502;
  return 500;
}

function errorBody(error: unknown): ErrorBody {
  const body: ErrorBody = { success: false, error: errorMessage(error) };
  if (error instanceof WerewolfPluginError) body.code = error.code;
  if (error instanceof ProtocolError) body.issues = error.issues;
  return body;
}

export class ProtocolServer {
  private server: Server | null = null;
  private startedAt = Date.now();

  constructor(private readonly sessions: AgentSessionsManager) {}

  // ============================================================================
  // Handlers
  // ============================================================================

  async handlePerceive(req: Request, res: Response): Promise<void> {
    const gameId = req.params.gameId;
    try {
      const event = parsePerceiveEvent(req.body);
      await this.sessions.perceive(gameId, event);
      res.json({ success: true });
    } catch (error) {
      this.fail(res, error, `perceive ${gameId}`);
    }
  }

  async handleInteract(req: Request, res: Response): Promise<void> {
    const gameId = req.params.gameId;
    try {
      const request = parseInteractRequest(req.body);
      const response = await this.sessions.interact(gameId, request);
      res.json(response);
    } catch (error) {
      this.fail(res, error, `interact ${gameId}`);
    }
  }

  handleHealth(_req: Request, res: Response): void {
    res.json({
      status: 'ok',
      uptime: Math.round((Date.now() - this.startedAt) / 1000),
      sessions: this.sessions.size
    });
  }

  private fail(res: Response, error: unknown, operation: string): void {
    const status = statusFor(error);
    if (status === 500) {
      logger.error(`[Protocol] ${operation} failed: ${errorMessage(error)}`);
    } else {
      logger.warn(`[Protocol] ${operation} rejected: ${errorMessage(error)}`);
    }
    res.status(status).json(errorBody(error));
  }

  // ============================================================================
  // App
  // ============================================================================

  createApp(): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        logger.debug(`[Protocol] ${req.method} ${req.path} - ${res.statusCode} (${Date.now() - start}ms)`);
      });
      next();
    });

    app.get('/health', (req: Request, res: Response) => this.handleHealth(req, res));
    app.post('/games/:gameId/perceive', async (req: Request, res: Response) => {
      await this.handlePerceive(req, res);
    });
    app.post('/games/:gameId/interact', async (req: Request, res: Response) => {
      await this.handleInteract(req, res);
    });

    return app;
  }

  listen(port: number): Promise<Server> {
    const app = this.createApp();
    return new Promise((resolve, reject) => {
      const server = app.listen(port, () => {
        logger.info(`[Protocol] Listening on port ${port}`);
        resolve(server);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

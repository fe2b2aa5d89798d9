/**
 * Monitoring Routes
 * Availability and connection queries over HTTP
 */

import { Router, type Request, type Response } from 'express';
import { websocketConfig } from '@/shared/config';
import type { EngineService } from '@/modules/engine/services/engine.service';
import type { ConnectionRegistry } from '@/modules/socket/services/connection-registry.service';
import { SessionState } from '@/modules/socket/types';
import { SUPPORTED_OUTPUT_FORMATS } from '@/modules/streaming/config';

export interface MonitoringDeps {
  engine: Pick<EngineService, 'getStatus'>;
  registry: Pick<ConnectionRegistry, 'count' | 'countByState' | 'getStats'>;
  /** Live sockets as seen by the ws server; defaults to the registry count */
  getTotalConnections?: () => number;
}

export function createMonitoringRouter(deps: MonitoringDeps): Router {
  const router = Router();
  const totalConnections = deps.getTotalConnections ?? (() => deps.registry.count());

  router.get('/health', (_req: Request, res: Response) => {
    const engine = deps.engine.getStatus();

    res.json({
      status: engine.ready ? 'ok' : 'degraded',
      message: 'Streaming speech server is running',
      uptime: process.uptime(),
      sessions: deps.registry.getStats(),
      engine,
      websocketServer: {
        path: websocketConfig.path,
        totalConnections: totalConnections(),
        activeStreams: deps.registry.countByState(SessionState.STREAMING),
      },
    });
  });

  router.get('/ws/stream/status', (_req: Request, res: Response) => {
    const engine = deps.engine.getStatus();

    if (!engine.ready || !engine.capabilities) {
      res.status(503).json({
        available: false,
        ready: false,
        state: engine.state,
        error: engine.error ?? 'Streaming engine not initialized',
      });
      return;
    }

    res.json({
      available: true,
      ready: true,
      engine: engine.engine,
      sampleRate: engine.capabilities.sampleRate,
      supportedFormats: SUPPORTED_OUTPUT_FORMATS,
      endpoint: websocketConfig.path,
    });
  });

  router.get('/ws/stream/connections', (_req: Request, res: Response) => {
    res.json({
      totalConnections: totalConnections(),
      timestampSeconds: Math.floor(Date.now() / 1000),
    });
  });

  return router;
}

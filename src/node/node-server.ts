// ========================================
// Node HTTP Server
// ========================================

import express, { Request, Response } from 'express';
import { NodeCrashedError, errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type { NodeFaultEngine } from './fault-engine.js';
import { NodeMetrics } from './node-metrics.js';

export interface NodeAppOptions {
    metrics?: NodeMetrics;
    /** Called after the crash fault has dropped the connection. */
    onCrash?: (error: NodeCrashedError) => void;
}

export function createNodeApp(engine: NodeFaultEngine, options: NodeAppOptions = {}) {
    const app = express();
    const metrics = options.metrics ?? new NodeMetrics(engine.label);
    const log = createLogger(`Node ${engine.label}`);

    // ========================================
    // Workload Simulation
    // ========================================
    app.get('/process', async (req: Request, res: Response) => {
        try {
            const outcome = await engine.handleRequest();
            metrics.recordOutcome(outcome, engine.getGauges());
            res.status(outcome.status).json(outcome.payload);
        } catch (error: unknown) {
            if (error instanceof NodeCrashedError) {
                metrics.recordCrash();
                // No response at all: the caller sees a connection failure
                req.socket.destroy();
                options.onCrash?.(error);
                return;
            }
            log.error('Unexpected failure in /process:', errorMessage(error));
            res.status(500).json({ node: engine.label, status: 'error', error: errorMessage(error) });
        }
    });

    // ========================================
    // Health Check
    // ========================================
    app.get('/health', (_req: Request, res: Response) => {
        res.json(engine.health());
    });

    // ========================================
    // Prometheus Scrape Target
    // ========================================
    app.get('/metrics', async (_req: Request, res: Response) => {
        try {
            metrics.recordGauges(engine.getGauges());
            res.set('Content-Type', metrics.contentType);
            res.send(await metrics.exposition());
        } catch (error: unknown) {
            res.status(500).send(errorMessage(error));
        }
    });

    return app;
}

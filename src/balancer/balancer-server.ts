// ========================================
// Trust LB - HTTP API Server
// ========================================

import express, { Request, Response } from 'express';
import cors from 'cors';
import { nodeLabel } from '../types.js';
import type { FaultClass, NodeId, WeightBands } from '../types.js';
import type { WeightedDispatcher } from './dispatcher.js';
import type { ObservationLedger } from './observation-ledger.js';
import { detectionReport, summarizeEvents } from './report.js';
import type { TrustWeightEngine } from './trust-engine.js';

export interface BalancerAppDeps {
    nodeIds: readonly NodeId[];
    dispatcher: WeightedDispatcher;
    trust: TrustWeightEngine;
    ledger: ObservationLedger;
    faultMap: ReadonlyMap<NodeId, FaultClass>;
    bands: WeightBands;
    statsWindowSeconds?: number;
}

export function createBalancerApp(deps: BalancerAppDeps) {
    const app = express();

    app.use(cors());

    // Request logging (skip health checks and proxied traffic)
    app.use((req, _res, next) => {
        if (req.path !== '/health' && req.path !== '/process') {
            console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        }
        next();
    });

    // ========================================
    // Health Check
    // ========================================
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            service: 'trust-lb',
            mode: deps.trust.mode,
            nodes: deps.nodeIds.length,
            timestamp: new Date().toISOString(),
        });
    });

    // ========================================
    // Client entry: forward to one node
    // ========================================
    app.get('/process', async (_req: Request, res: Response) => {
        const { event, response } = await deps.dispatcher.dispatch();
        res.set('X-Routed-To', nodeLabel(event.nodeId));
        res.set('X-Routing-Mode', event.mode);
        if (response) {
            res.status(response.status).json(response.body);
            return;
        }
        res.status(502).json({
            ok: false,
            node: nodeLabel(event.nodeId),
            mode: event.mode,
            error: event.error ?? 'no response',
        });
    });

    // ========================================
    // Diagnostics
    // ========================================
    app.get('/weights', (_req: Request, res: Response) => {
        res.json({
            table: deps.trust.routing.toJSON(),
            states: deps.trust.snapshot().map((s) => ({
                node: nodeLabel(s.nodeId),
                weight: s.weight,
                p_faulty: s.pFaulty,
                probabilities: s.probabilities,
                updated_at: s.updatedAt === null ? null : new Date(s.updatedAt).toISOString(),
                error: s.error ?? null,
            })),
        });
    });

    app.get('/report', (_req: Request, res: Response) => {
        res.json(detectionReport(deps.trust.snapshot(), deps.faultMap, deps.bands));
    });

    app.get('/stats', (_req: Request, res: Response) => {
        const events = deps.ledger.recent(deps.statsWindowSeconds ?? 300);
        res.json(summarizeEvents(deps.nodeIds, events));
    });

    // ========================================
    // Root Endpoint
    // ========================================
    app.get('/', (_req: Request, res: Response) => {
        res.json({
            service: 'Trust LB',
            version: '1.0.0',
            endpoints: {
                health: 'GET /health',
                process: 'GET /process',
                weights: 'GET /weights',
                report: 'GET /report',
                stats: 'GET /stats',
            },
        });
    });

    return app;
}

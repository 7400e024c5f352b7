// ========================================
// Simulated Node - Process Entry
// ========================================

import 'dotenv/config';

import { loadNodeConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { listen } from '../server.js';
import { NodeFaultEngine } from './fault-engine.js';
import { createNodeApp } from './node-server.js';

async function main() {
    const config = loadNodeConfig();
    const engine = new NodeFaultEngine({
        id: config.id,
        faultClass: config.faultClass,
        rampWindowSeconds: config.rampWindowSeconds,
        oscillationPeriodSeconds: config.oscillationPeriodSeconds,
        workloadIterations: config.workloadIterations,
        memory: config.memory,
    });

    const app = createNodeApp(engine, {
        onCrash: () => {
            console.error(`[Node ${engine.label}] CRASH fault triggered. Exiting...`);
            process.exit(1);
        },
    });

    const running = await listen(app, config.port);

    const p = engine.profile;
    console.log(`--- Node ${engine.label} initialized. FAULT_TYPE: ${engine.faultClass} ---`);
    console.log(`🌐 Listening on http://0.0.0.0:${running.port}`);
    console.log(`   Base latency: ${p.baseLatencyMs.toFixed(1)}ms, CPU load: ${(p.baseCpuLoad * 100).toFixed(0)}%`);
    console.log(`   Jitter: ${p.jitterMs.toFixed(1)}ms, Packet loss: ${(p.packetLoss * 100).toFixed(2)}%, Stability: ${p.stability.toFixed(2)}`);
    console.log('📡 Endpoints: GET /process, GET /health, GET /metrics');

    const shutdown = async (signal: string) => {
        console.log(`[Node ${engine.label}] ${signal} received, closing server...`);
        try {
            await running.close();
            process.exit(0);
        } catch (error: unknown) {
            console.error(`[Node ${engine.label}] Shutdown failed:`, errorMessage(error));
            process.exit(1);
        }
    };
    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    console.error('[Node] Startup failed:', errorMessage(error));
    process.exit(1);
});

// ========================================
// Trust LB - Process Entry
// ========================================

import 'dotenv/config';

import { loadBalancerConfig, nodeUrl } from '../config.js';
import { errorMessage } from '../errors.js';
import { listen } from '../server.js';
import { createBalancerApp } from './balancer-server.js';
import { loadClassifier } from './classifier.js';
import { WeightedDispatcher } from './dispatcher.js';
import { ObservationLedger } from './observation-ledger.js';
import { PrometheusMetricsSource } from './prometheus-source.js';
import { HttpNodeTransport } from './transports.js';
import { TrustWeightEngine } from './trust-engine.js';

async function main() {
    const config = loadBalancerConfig();

    const classifier = await loadClassifier(config.artifactsDir, { primaryFaultClass: config.primaryFaultClass });
    const trust = new TrustWeightEngine({
        nodeIds: config.nodeIds,
        metrics: new PrometheusMetricsSource(config.prometheusUrl, config.queryTimeoutMs),
        classifier,
        bands: config.bands,
        windowSeconds: config.windowSeconds,
        queryTimeoutMs: config.queryTimeoutMs,
        primaryFaultClass: config.primaryFaultClass,
    });

    const ledger = new ObservationLedger();
    const dispatcher = new WeightedDispatcher({
        nodeIds: config.nodeIds,
        routing: trust.routing,
        transport: new HttpNodeTransport(config.nodeUrlTemplate, config.requestTimeoutMs),
        recorder: ledger,
    });

    const app = createBalancerApp({
        nodeIds: config.nodeIds,
        dispatcher,
        trust,
        ledger,
        faultMap: config.faultMap,
        bands: config.bands,
    });
    const running = await listen(app, config.port);

    console.log();
    console.log('╔═══════════════════════════════════════════════════════╗');
    console.log('║   Trust-Weighted Load Balancer                        ║');
    console.log('╚═══════════════════════════════════════════════════════╝');
    console.log();
    console.log(`🌐 Server: http://0.0.0.0:${running.port}`);
    console.log(`🎯 Nodes: ${config.nodeIds.length} (${nodeUrl(config.nodeUrlTemplate, 1)} ...)`);
    console.log(`📈 Metrics: ${config.prometheusUrl}`);
    console.log(`🛡️ Classifier: ${classifier.name} (mode: ${trust.mode})`);
    console.log();

    trust.start(config.refreshIntervalMs);
    dispatcher.start(config.dispatchIntervalMs);

    const shutdown = async (signal: string) => {
        console.log(`[TrustLB] ${signal} received, draining...`);
        try {
            // Client requests already accepted finish before the loops drain
            await running.close();
            await dispatcher.stop();
            await trust.stop();
            process.exit(0);
        } catch (error: unknown) {
            console.error('[TrustLB] Shutdown failed:', errorMessage(error));
            process.exit(1);
        }
    };
    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    console.error('[TrustLB] Startup failed:', errorMessage(error));
    process.exit(1);
});

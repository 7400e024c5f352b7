// ========================================
// Trust LB Testbed - HTTP listen helper
// ========================================

import type { Express } from 'express';
import type { Server } from 'http';

export interface RunningServer {
    server: Server;
    port: number;
    close(): Promise<void>;
}

export interface ListenOptions {
    host?: string;
    /** How long close() lets in-flight requests run before dropping them. */
    shutdownGraceMs?: number;
}

/**
 * Listen and resolve once bound. Port 0 picks a free port.
 */
export function listen(app: Express, port: number, options: ListenOptions = {}): Promise<RunningServer> {
    const host = options.host ?? '0.0.0.0';
    const graceMs = options.shutdownGraceMs ?? 10_000;
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once('error', reject);
        server.once('listening', () => {
            const address = server.address();
            resolve({
                server,
                port: typeof address === 'object' && address !== null ? address.port : port,
                close: () =>
                    new Promise<void>((done, fail) => {
                        // Stop accepting; open requests finish before the callback fires
                        const force = setTimeout(() => server.closeAllConnections(), graceMs);
                        force.unref();
                        server.close((err) => {
                            clearTimeout(force);
                            if (err) fail(err);
                            else done();
                        });
                        server.closeIdleConnections();
                    }),
            });
        });
    });
}

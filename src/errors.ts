// ========================================
// Trust LB Testbed - Errors
// ========================================

export type TestbedErrorCode = 'NODE_CRASHED' | 'TIMEOUT' | 'CONFIG' | 'CLASSIFIER';

export class TestbedError extends Error {
    readonly code: TestbedErrorCode;

    constructor(code: TestbedErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Raised by the crash fault. The node never answers again.
 */
export class NodeCrashedError extends TestbedError {
    readonly node: string;

    constructor(node: string) {
        super('NODE_CRASHED', `${node} crashed`);
        this.node = node;
    }
}

export class TimeoutError extends TestbedError {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

export class ConfigError extends TestbedError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

export class ClassifierError extends TestbedError {
    constructor(message: string) {
        super('CLASSIFIER', message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ========================================
// Async helpers
// ========================================

export function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

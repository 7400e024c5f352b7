// ========================================
// Trust LB Testbed - Console Logging
// ========================================

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

function debugEnabled(): boolean {
    return (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';
}

/**
 * Console logger that tags every line with `[component]`.
 */
export function createLogger(component: string): Logger {
    const tag = `[${component}]`;
    return {
        debug(message, ...details) {
            if (debugEnabled()) console.debug(tag, message, ...details);
        },
        info(message, ...details) {
            console.log(tag, message, ...details);
        },
        warn(message, ...details) {
            console.warn(tag, message, ...details);
        },
        error(message, ...details) {
            console.error(tag, message, ...details);
        },
    };
}

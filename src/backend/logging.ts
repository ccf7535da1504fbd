/**
 * Logging goes to the console. Services take a Logger so tests can
 * capture or silence output without patching globals.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
    log: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

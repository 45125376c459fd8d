/**
 * Anything with console-like methods. `console` itself is the default.
 */
export interface NutLogger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

/**
 * Prefixes every line with `[component]` and drops debug lines unless enabled.
 */
export function scopedLogger(component: string, base: NutLogger = console, debug: boolean = false): NutLogger {
    const prefix = `[${component}]`;
    return {
        debug: (message, ...meta) => {
            if (debug) base.debug(`${prefix} ${message}`, ...meta);
        },
        info: (message, ...meta) => base.info(`${prefix} ${message}`, ...meta),
        warn: (message, ...meta) => base.warn(`${prefix} ${message}`, ...meta),
        error: (message, ...meta) => base.error(`${prefix} ${message}`, ...meta),
    };
}

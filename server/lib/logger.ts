/** Thin logger over console.info / console.warn / console.error so the
 *  eslint no-console rule is satisfied. Anything that reports progress
 *  takes a `Logger` so tests can capture the lines.                    */
export type LogFn = (...args: unknown[]) => void;

export interface Logger {
    info: LogFn;
    warn: LogFn;
    error: LogFn;
    debug: LogFn;
}

export const logger: Logger = {
    info: (...args: unknown[]) => console.info(...args),
    warn: (...args: unknown[]) => console.warn(...args),
    error: (...args: unknown[]) => console.error(...args),
    debug: (...args: unknown[]) =>
        process.env.NODE_ENV === "development" ? console.info("[debug]", ...args) : undefined,
};

/**
 * Console output for the CLI.
 *
 * `--output json` turns on silent mode so stdout carries only the JSON
 * document. Diagnostic records go through the pino logger in
 * `src/logging`, not here.
 */

let silentMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(...args);
    }
}

/**
 * Log error to stderr. Never silenced.
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}

/**
 * Tagged progress line on stderr so stdout stays free for the report.
 * Silenced in silent mode.
 */
export function status(message: string): void {
    if (!silentMode) {
        console.error(`[factweave] ${message}`);
    }
}

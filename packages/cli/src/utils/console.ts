/**
 * Formatted console output helpers, used outside the full-screen loop.
 */

export function log(message: string): void {
    console.log(message);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function fail(message: string): void {
    console.error(`\n✖ Error: ${message}`);
}

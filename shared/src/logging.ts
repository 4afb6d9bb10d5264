/**
 * Diagnostic output helpers used by both CLIs and their services.
 *
 * Diagnostics never go to stdout: the CLIs wire `logCallback` to stderr so
 * that fingerprint lists and notices can be piped cleanly.
 */

import type { LogConfig } from './types';

/**
 * Log a message using the config callback if provided.
 *
 * @param config Configuration object with optional logCallback
 * @param message Message to log
 */
export function log(config: LogConfig, message: string): void {
    if (config.logCallback) {
        config.logCallback(message);
    }
}

/** LogConfig that writes each message as one line to `stream`. */
export function streamLogConfig(stream: NodeJS.WritableStream): LogConfig {
    return { logCallback: (message) => { stream.write(`${message}\n`); } };
}

/**
 * Safely extract error message from any error type.
 * Handles Error objects, strings, and unknown types.
 *
 * @param error Error to extract message from
 * @param fallback Optional fallback message if extraction fails or error is empty
 * @returns Error message string
 */
export function extractErrorMessage(error: unknown, fallback = 'Unknown error'): string {
    if (error == null) {
        return fallback;
    }
    if (error instanceof Error) {
        return error.message || fallback;
    }
    if (typeof error === 'object' && 'message' in error) {
        return String(error.message) || fallback;
    }
    const message = String(error);
    return message || fallback;
}

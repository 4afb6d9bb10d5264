/**
 * Error types shared by both CLIs.
 *
 * Per-key errors (lookup, identities, armor) are caught by the batch drivers,
 * logged and skipped. Usage, date and output-directory errors end the process
 * with exit code 1.
 */

export type ExpiryToolErrorCode =
    | 'KEY_LOOKUP_FAILED'
    | 'NO_VALID_IDENTITIES'
    | 'ARMOR_FAILED'
    | 'INVALID_DATE'
    | 'OUTPUT_DIRECTORY'
    | 'USAGE';

export class ExpiryToolError extends Error {
    constructor(
        message: string,
        public readonly code: ExpiryToolErrorCode,
    ) {
        super(message);
        this.name = 'ExpiryToolError';
    }
}

/** gpg could not list the key, or the listing did not resolve to exactly one key. */
export class KeyLookupError extends ExpiryToolError {
    constructor(
        public readonly fingerprint: string,
        message = `Invalid key ${fingerprint}`,
    ) {
        super(message, 'KEY_LOOKUP_FAILED');
        this.name = 'KeyLookupError';
    }
}

export class NoValidIdentitiesError extends ExpiryToolError {
    constructor(public readonly fingerprint: string) {
        super(`No valid UIDs for ${fingerprint}`, 'NO_VALID_IDENTITIES');
        this.name = 'NoValidIdentitiesError';
    }
}

export class ArmorTransformError extends ExpiryToolError {
    constructor(
        public readonly exitCode: number,
        public readonly stderr: string,
    ) {
        super(`gpg --armor exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`, 'ARMOR_FAILED');
        this.name = 'ArmorTransformError';
    }
}

export class DateExpressionError extends ExpiryToolError {
    constructor(public readonly expression: string) {
        super(`Invalid date "${expression}". See date(1)`, 'INVALID_DATE');
        this.name = 'DateExpressionError';
    }
}

export class OutputDirectoryError extends ExpiryToolError {
    constructor(
        public readonly directory: string,
        reason: string,
    ) {
        super(`Can't make ${directory}: ${reason}`, 'OUTPUT_DIRECTORY');
        this.name = 'OutputDirectoryError';
    }
}

/** Bad command-line usage that argument parsing alone cannot catch. */
export class UsageError extends ExpiryToolError {
    constructor(message: string) {
        super(message, 'USAGE');
        this.name = 'UsageError';
    }
}

export function isExpiryToolError(error: unknown): error is ExpiryToolError {
    return error instanceof ExpiryToolError;
}

export const OUTPUT_FORMATS = ['fpr', 'fprdate', 'list', 'colon'] as const;

/**
 * How selected keys are printed:
 *   - `fpr`     — fingerprint per line
 *   - `fprdate` — `fingerprint expiration_epoch` per line
 *   - `list`    — `gpg --list-keys <fpr>` per key
 *   - `colon`   — `gpg --list-keys --with-colons <fpr>` per key
 */
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some((format) => format === value);
}

export const DEFAULT_BEFORE = '+30days';
export const DEFAULT_AFTER = 'yesterday';
/** `--all` lower bound: the epoch itself. */
export const ALL_AFTER = '@0';
export const DEFAULT_CAPABILITIES = 'e';

/** Parsed command line of `gpg-expires`. Built once, never mutated. */
export interface ExpiresConfig {
    readonly quiet: boolean;
    readonly warn: boolean;
    /** date(1) expression for the upper bound. */
    readonly before: string;
    /** date(1) expression for the lower bound. */
    readonly after: string;
    readonly capabilities: string;
    readonly format: OutputFormat;
    /** Restricts the keyring listing; empty lists every public key. */
    readonly keySpecs: readonly string[];
    readonly gpgBinDir?: string;
    readonly gnupgHome?: string;
}

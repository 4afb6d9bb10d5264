import type { GpgCli } from './gpgCli';

/** Where diagnostics go. No callback means diagnostics are dropped. */
export interface LogConfig {
    logCallback?: (message: string) => void;
}

/** Builds the GpgCli a service talks to; inject a mock factory in tests. */
export interface IGpgCliFactory {
    create(): GpgCli;
}

/**
 * One line of `gpg --with-colons` output.
 *
 * Only the fields the expiry tools read are kept (1-indexed in gpg's DETAILS doc):
 * 1 record type, 2 validity, 7 expiration, 10 user ID / fingerprint, 12 capabilities.
 */
export interface KeyRecord {
    /** `pub`, `sub`, `fpr`, `uid`, or whatever tag gpg emitted. */
    recordType: string;
    validity: string;
    /** Seconds since the epoch; 0 means the key does not expire. */
    expiryEpoch: number;
    /** Fingerprint for `fpr`, user ID for `uid`; colon escapes decoded. */
    value: string;
    /** Single-letter usage flags, e.g. `scESC` or `e`. */
    capabilities: string;
}

/** A primary key or subkey reduced to what the expiry filters need. */
export interface KeySummary {
    fingerprint: string;
    expiryEpoch: number;
    capabilities: string;
}

/** Bounds are exclusive. `warnOnUnset` also selects keys that never expire. */
export interface ExpiryWindow {
    afterEpoch: number;
    beforeEpoch: number;
    warnOnUnset: boolean;
}

/** Result of reading one key's colon listing for a notice. */
export interface KeyIdentities {
    fingerprint: string;
    /** User IDs whose validity is not n (not valid), e (expired) or r (revoked). */
    recipientUids: string[];
    expiryEpoch: number;
}

export interface Notice extends KeyIdentities {
    subject: string;
    /** Plain text, or gpg's armored output when encrypted or signed. */
    body: string;
}

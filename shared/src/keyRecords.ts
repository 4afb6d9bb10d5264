/**
 * Pure parsing and filtering of `gpg --with-colons` listings.
 *
 * Nothing here spawns a process; GpgCli produces the text and the services
 * feed it through these functions.
 *
 * @see https://git.gnupg.org/cgi-bin/gitweb.cgi?p=gnupg.git;a=blob_plain;f=doc/DETAILS
 */

import { KeyLookupError } from './errors';
import type { ExpiryWindow, KeyIdentities, KeyRecord, KeySummary } from './types';

/** uid validity codes that disqualify an identity as a notice recipient. */
const UNACCEPTABLE_UID_VALIDITY = new Set(['n', 'e', 'r']);

const FINGERPRINT_PATTERN = /^[0-9A-F]{40}$/;

// gpg may print date fields in ISO 8601 basic form instead of epoch seconds
const ISO_BASIC_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;

// ============================================================================
// Field decoding
// ============================================================================

/**
 * Decode the C-style `\xNN` escapes gpg uses for colons and control characters
 * inside user IDs (e.g. `Foo\x3a Bar` → `Foo: Bar`).
 */
export function unescapeGpgColonField(field: string): string {
    return field.replace(/\\x([0-9a-fA-F]{2})/g, (_match, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

/** Parse field 7 of a key record. Empty or unparseable means "never expires". */
export function parseExpiryField(field: string): number {
    const trimmed = field.trim();
    if (/^\d+$/.test(trimmed)) {
        return parseInt(trimmed, 10);
    }
    const iso = ISO_BASIC_TIMESTAMP.exec(trimmed);
    if (iso) {
        const [, y, mo, d, h, mi, s] = iso.map(Number);
        return Math.floor(Date.UTC(y, mo - 1, d, h, mi, s) / 1000);
    }
    return 0;
}

/** Split one colon-delimited line into a {@link KeyRecord}. Missing fields read as empty. */
export function parseColonRecord(line: string): KeyRecord {
    const fields = line.split(':');
    const field = (n: number): string => fields[n - 1] ?? '';
    return {
        recordType: field(1).trim(),
        validity: field(2),
        expiryEpoch: parseExpiryField(field(7)),
        value: unescapeGpgColonField(field(10)),
        capabilities: field(12),
    };
}

/** Split gpg output into lines; handles the CRLF line endings of gpg.exe. */
export function splitLines(output: string): string[] {
    return output.split(/\r?\n/);
}

// ============================================================================
// Classifier
// ============================================================================

/**
 * Reduce colon records to one {@link KeySummary} per `fpr:` record.
 *
 * gpg prints each fingerprint immediately after the `pub:`/`sub:` record it
 * belongs to, so expiry and capabilities are carried forward from the most
 * recent key record rather than joined on a key ID. Before any key record the
 * carried values are `0` and `''`.
 */
export function* classifyRecords(lines: Iterable<string>): Generator<KeySummary> {
    let expiryEpoch = 0;
    let capabilities = '';

    for (const line of lines) {
        const record = parseColonRecord(line);
        if (record.recordType === 'pub' || record.recordType === 'sub') {
            expiryEpoch = record.expiryEpoch;
            capabilities = record.capabilities;
        } else if (record.recordType === 'fpr') {
            yield { fingerprint: record.value, expiryEpoch, capabilities };
        }
    }
}

export type SummaryColumn = keyof KeySummary;

const ALL_SUMMARY_COLUMNS: readonly SummaryColumn[] = ['fingerprint', 'expiryEpoch', 'capabilities'];

/**
 * Space-separated summary line, `"<FPR> <EXPIRY_EPOCH> <CAPS>"` by default.
 * `columns` picks a prefix or subset, e.g. `['fingerprint', 'expiryEpoch']` for `fprdate`.
 */
export function formatSummary(summary: KeySummary, columns: readonly SummaryColumn[] = ALL_SUMMARY_COLUMNS): string {
    return columns.map((column) => String(summary[column])).join(' ');
}

// ============================================================================
// Filters
// ============================================================================

/**
 * Keep summaries sharing at least one capability letter with `requested`.
 * Letters are compared case-sensitively, so `e` (encryption subkey) does not
 * match the primary key's aggregate `E`. An empty `requested` keeps nothing.
 */
export function* filterByCapabilities(summaries: Iterable<KeySummary>, requested: string): Generator<KeySummary> {
    if (!requested) {
        return;
    }
    for (const summary of summaries) {
        if ([...summary.capabilities].some((c) => requested.includes(c))) {
            yield summary;
        }
    }
}

/** `after < expiry < before`, or an unset expiry when `warnOnUnset`. Bounds are not validated. */
export function isInExpiryWindow(expiryEpoch: number, window: ExpiryWindow): boolean {
    if (window.warnOnUnset && expiryEpoch === 0) {
        return true;
    }
    return expiryEpoch > window.afterEpoch && expiryEpoch < window.beforeEpoch;
}

export function* filterByExpiryWindow(summaries: Iterable<KeySummary>, window: ExpiryWindow): Generator<KeySummary> {
    for (const summary of summaries) {
        if (isInExpiryWindow(summary.expiryEpoch, window)) {
            yield summary;
        }
    }
}

// ============================================================================
// Fingerprint validation
// ============================================================================

export type FingerprintResult =
    | { ok: true; fingerprint: string }
    | { ok: false; input: string };

/**
 * Uppercase, strip whitespace and require exactly 40 hex digits.
 * `'abcd ef01 ...'` → `'ABCDEF01...'`.
 */
export function normalizeFingerprint(input: string): FingerprintResult {
    const fingerprint = input.toUpperCase().replace(/\s/g, '');
    return FINGERPRINT_PATTERN.test(fingerprint) ? { ok: true, fingerprint } : { ok: false, input };
}

// ============================================================================
// Identity collection (notice recipients)
// ============================================================================

/**
 * Read the colon listing of a single key (`gpg --list-keys --with-colons <fpr>`).
 *
 * Every `uid:` record with acceptable validity becomes a recipient. The expiry
 * reported is the one carried to the `fpr:` record equal to `fingerprint`, so a
 * subkey fingerprint yields the subkey's expiry and a primary fingerprint the
 * primary's.
 *
 * Throws {@link KeyLookupError} when the listing holds more than one primary
 * key or no fingerprint record equal to `fingerprint`.
 */
export function collectKeyIdentities(output: string, fingerprint: string): KeyIdentities {
    const recipientUids: string[] = [];
    let primaryKeys = 0;
    let carriedExpiry = 0;
    let expiryEpoch: number | undefined;

    for (const line of splitLines(output)) {
        const record = parseColonRecord(line);
        switch (record.recordType) {
            case 'pub':
                primaryKeys++;
                carriedExpiry = record.expiryEpoch;
                break;
            case 'sub':
                carriedExpiry = record.expiryEpoch;
                break;
            case 'fpr':
                if (record.value.toUpperCase() === fingerprint) {
                    expiryEpoch = carriedExpiry;
                }
                break;
            case 'uid':
                if (record.value && !UNACCEPTABLE_UID_VALIDITY.has(record.validity)) {
                    recipientUids.push(record.value);
                }
                break;
        }
    }

    if (primaryKeys > 1) {
        throw new KeyLookupError(fingerprint, `Ambiguous key ${fingerprint}: ${primaryKeys} keys matched`);
    }
    if (expiryEpoch === undefined) {
        throw new KeyLookupError(fingerprint, `Key ${fingerprint} not found in gpg listing`);
    }
    return { fingerprint, recipientUids, expiryEpoch };
}

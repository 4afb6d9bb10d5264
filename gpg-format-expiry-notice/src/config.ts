export const DEFAULT_SUBJECT = 'GPG Key Expiry Notice';

/** Value of the `X-Generator:` header on every notice. */
export const GENERATOR = 'gpg-format-expiry-notice';

/** Notices go to standard output, or to `<path>/<FPR>.mail`. */
export type NoticeDestination =
    | { kind: 'stdout' }
    | { kind: 'directory'; path: string };

/** Parsed command line of `gpg-format-expiry-notice`. Built once, never mutated. */
export interface NoticeConfig {
    readonly destination: NoticeDestination;
    /** Encrypt the body to the key the notice is about. Off with `--plain`. */
    readonly encrypt: boolean;
    /** Key to sign the body with; clear-signs when not encrypting. */
    readonly signAs?: string;
    readonly subject: string;
    /** Raw fingerprint inputs, validated one by one when notices are written. */
    readonly fingerprints: readonly string[];
    readonly gpgBinDir?: string;
    readonly gnupgHome?: string;
}

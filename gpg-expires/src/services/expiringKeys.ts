/**
 * Expiring keys service.
 *
 * Lists the public keyring with colons, reduces it to key summaries, keeps the
 * ones matching the requested capabilities and expiry window, and prints them
 * in the configured format.
 *
 * gpg, date(1) and stdout are injectable so the service can be unit-tested
 * without a real keyring.
 */

import {
    DateResolver,
    GpgCli,
    UsageError,
    classifyRecords,
    filterByCapabilities,
    filterByExpiryWindow,
    formatEpoch,
    formatSummary,
    log,
    splitLines,
} from '@gpg-expiry/shared';
import type { ExpiryWindow, IGpgCliFactory, KeySummary, LogConfig } from '@gpg-expiry/shared';
import type { ExpiresConfig } from '../config';

/**
 * Injectable dependencies for {@link ExpiringKeys}.
 * All fields are optional; production defaults use gpg, date(1) and process.stdout.
 */
export interface ExpiringKeysDeps {
    /** Defaults to `new GpgCli({ gpgBinDir, gnupgHome })` from the config. */
    gpgCliFactory?: IGpgCliFactory;
    dateResolver?: DateResolver;
    /** Receives primary output. Defaults to `process.stdout.write`. */
    write?: (text: string) => void;
}

export class ExpiringKeys {
    private readonly gpgCli: GpgCli;
    private readonly dateResolver: DateResolver;
    private readonly writeFn: (text: string) => void;

    constructor(
        private readonly config: ExpiresConfig,
        private readonly logConfig: LogConfig,
        deps?: Partial<ExpiringKeysDeps>
    ) {
        this.gpgCli = deps?.gpgCliFactory?.create()
            ?? new GpgCli({ gpgBinDir: config.gpgBinDir, gnupgHome: config.gnupgHome });
        this.dateResolver = deps?.dateResolver ?? new DateResolver();
        this.writeFn = deps?.write ?? ((text) => { process.stdout.write(text); });
    }

    /**
     * Resolve `--after`/`--before` to epoch seconds.
     * Throws {@link UsageError} when the lower bound is later than the upper bound.
     */
    async resolveWindow(): Promise<ExpiryWindow> {
        const afterEpoch = await this.dateResolver.toEpoch(this.config.after);
        const beforeEpoch = await this.dateResolver.toEpoch(this.config.before);
        if (afterEpoch > beforeEpoch) {
            throw new UsageError(`"${this.config.after}" is after "${this.config.before}"`);
        }
        return { afterEpoch, beforeEpoch, warnOnUnset: this.config.warn };
    }

    /** Keys (primary or sub) matching the configured capabilities inside `window`, in keyring order. */
    async findExpiring(window: ExpiryWindow): Promise<KeySummary[]> {
        const listing = await this.gpgCli.listPublicKeys(this.config.keySpecs);
        const summaries = classifyRecords(splitLines(listing));
        return [...filterByExpiryWindow(filterByCapabilities(summaries, this.config.capabilities), window)];
    }

    async render(keys: readonly KeySummary[]): Promise<void> {
        for (const key of keys) {
            switch (this.config.format) {
                case 'fpr':
                    this.writeFn(`${formatSummary(key, ['fingerprint'])}\n`);
                    break;
                case 'fprdate':
                    this.writeFn(`${formatSummary(key, ['fingerprint', 'expiryEpoch'])}\n`);
                    break;
                case 'list':
                case 'colon':
                    this.writeFn(await this.gpgCli.showKey(key.fingerprint, this.config.format === 'colon'));
                    break;
            }
        }
    }

    /** Resolve the window, print the header unless quiet, then list and render. Returns the number of keys printed. */
    async run(): Promise<number> {
        const window = await this.resolveWindow();
        if (!this.config.quiet) {
            log(this.logConfig, 'Keys expiring:');
            log(this.logConfig, `  after: ${this.config.after} (${formatEpoch(window.afterEpoch)})`);
            log(this.logConfig, `  before: ${this.config.before} (${formatEpoch(window.beforeEpoch)})`);
        }

        const keys = await this.findExpiring(window);
        await this.render(keys);
        return keys.length;
    }
}

/**
 * Notice writer service.
 *
 * Validates each input fingerprint, composes its notice and writes it to the
 * configured destination. A bad fingerprint or a key that cannot be turned
 * into a notice is logged and skipped; the rest of the batch still runs.
 *
 * Filesystem calls and gpg are injectable so the service can be unit-tested
 * without a real keyring.
 */

import * as fs from 'fs';
import * as path from 'path';
import { GpgCli, OutputDirectoryError, extractErrorMessage, log, normalizeFingerprint } from '@gpg-expiry/shared';
import type { IGpgCliFactory, LogConfig } from '@gpg-expiry/shared';
import type { NoticeConfig } from '../config';
import { NoticeComposer, renderNotice } from './noticeComposer';

/**
 * Injectable dependencies for {@link NoticeWriter}.
 * All fields are optional; production defaults use gpg, `fs` and process.stdout.
 */
export interface NoticeWriterDeps {
    /** Defaults to `new GpgCli({ gpgBinDir, gnupgHome })` from the config. */
    gpgCliFactory?: IGpgCliFactory;
    /** Receives notices when the destination is stdout. */
    write?: (text: string) => void;
    /** `mkdir -p`; returns the first directory created, if any. */
    mkdir?: (dir: string) => string | undefined;
    writeFile?: (filePath: string, content: string) => void;
}

export interface NoticeBatchResult {
    written: number;
    skipped: number;
}

export class NoticeWriter {
    private readonly composer: NoticeComposer;
    private readonly writeFn: (text: string) => void;
    private readonly mkdirFn: (dir: string) => string | undefined;
    private readonly writeFileFn: (filePath: string, content: string) => void;

    constructor(
        private readonly config: NoticeConfig,
        private readonly logConfig: LogConfig,
        deps?: Partial<NoticeWriterDeps>
    ) {
        const gpgCli = deps?.gpgCliFactory?.create()
            ?? new GpgCli({ gpgBinDir: config.gpgBinDir, gnupgHome: config.gnupgHome });
        this.composer = new NoticeComposer(gpgCli, {
            subject: config.subject,
            encrypt: config.encrypt,
            signAs: config.signAs,
        });
        this.writeFn = deps?.write ?? ((text) => { process.stdout.write(text); });
        this.mkdirFn = deps?.mkdir ?? ((dir) => fs.mkdirSync(dir, { recursive: true }));
        this.writeFileFn = deps?.writeFile ?? ((filePath, content) => fs.writeFileSync(filePath, content, 'utf8'));
    }

    /**
     * Create the output directory (and parents) when writing to files.
     * Throws {@link OutputDirectoryError} when it cannot be created.
     */
    prepareDestination(): void {
        const { destination } = this.config;
        if (destination.kind !== 'directory') {
            return;
        }
        try {
            const created = this.mkdirFn(destination.path);
            if (created !== undefined) {
                log(this.logConfig, `Created directory ${created}`);
            }
        } catch (err: unknown) {
            throw new OutputDirectoryError(destination.path, extractErrorMessage(err));
        }
    }

    /** One notice per valid fingerprint in `config.fingerprints`, strictly in order. */
    async writeAll(): Promise<NoticeBatchResult> {
        const result: NoticeBatchResult = { written: 0, skipped: 0 };

        for (const input of this.config.fingerprints) {
            const validated = normalizeFingerprint(input);
            if (!validated.ok) {
                log(this.logConfig, `Invalid fingerprint ${validated.input}`);
                result.skipped++;
                continue;
            }

            const { fingerprint } = validated;
            try {
                const notice = await this.composer.compose(fingerprint);
                this.emit(fingerprint, renderNotice(notice));
                result.written++;
            } catch (err: unknown) {
                log(this.logConfig, extractErrorMessage(err));
                log(this.logConfig, `Could not generate message for ${fingerprint}`);
                result.skipped++;
            }
        }

        return result;
    }

    private emit(fingerprint: string, text: string): void {
        const { destination } = this.config;
        if (destination.kind === 'stdout') {
            this.writeFn(text);
        } else {
            this.writeFileFn(path.join(destination.path, `${fingerprint}.mail`), text);
        }
    }
}

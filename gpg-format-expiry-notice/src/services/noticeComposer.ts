import {
    KeyLookupError,
    NoValidIdentitiesError,
    collectKeyIdentities,
    formatExpiry,
} from '@gpg-expiry/shared';
import type { GpgCli, Notice } from '@gpg-expiry/shared';
import { GENERATOR } from '../config';

export interface NoticeOptions {
    subject: string;
    encrypt: boolean;
    signAs?: string;
}

/**
 * Builds the expiry notice for one validated fingerprint.
 *
 * Every failure is thrown as an ExpiryToolError so the caller can log it and
 * move on to the next fingerprint:
 *   - gpg cannot list the key, or the listing is ambiguous → KeyLookupError
 *   - no identity survives the validity filter             → NoValidIdentitiesError
 *   - gpg fails to encrypt or sign the body                → ArmorTransformError
 */
export class NoticeComposer {
    constructor(
        private readonly gpgCli: GpgCli,
        private readonly options: NoticeOptions
    ) {}

    async compose(fingerprint: string): Promise<Notice> {
        const { exitCode, stdout } = await this.gpgCli.lookupKey(fingerprint);
        if (exitCode !== 0) {
            throw new KeyLookupError(fingerprint);
        }

        const identities = collectKeyIdentities(stdout, fingerprint);
        if (identities.recipientUids.length === 0) {
            throw new NoValidIdentitiesError(fingerprint);
        }

        const body = await this.gpgCli.armorTransform(renderBody(fingerprint, identities.expiryEpoch), {
            encryptTo: this.options.encrypt ? fingerprint : undefined,
            signAs: this.options.signAs,
        });
        return { ...identities, subject: this.options.subject, body };
    }
}

export function renderBody(fingerprint: string, expiryEpoch: number): string {
    return [
        'This message is to remind you that your GPG key:',
        `> ${fingerprint}`,
        'Will expire on:',
        `> ${formatExpiry(expiryEpoch)}`,
        '',
    ].join('\n');
}

// A user ID or subject must not be able to start a header of its own
function headerValue(value: string): string {
    return value.replace(/[\r\n]+/g, ' ');
}

/**
 * Mail text: one `To:` line per recipient, `Subject:`, `X-Generator:`, a blank
 * line, then the body. Ends with exactly one newline.
 */
export function renderNotice(notice: Notice): string {
    const header = [
        ...notice.recipientUids.map((uid) => `To: ${headerValue(uid)}`),
        `Subject: ${headerValue(notice.subject)}`,
        `X-Generator: ${GENERATOR}`,
    ].join('\n');
    return `${header}\n\n${notice.body}`.replace(/\n+$/, '') + '\n';
}

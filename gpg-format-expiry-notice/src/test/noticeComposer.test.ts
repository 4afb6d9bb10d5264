/**
 * Unit tests for NoticeComposer, renderBody and renderNotice.
 */

import { expect } from 'chai';
import { describe, it } from 'mocha';
import { ArmorTransformError, KeyLookupError, NoValidIdentitiesError } from '@gpg-expiry/shared';
import { NoticeComposer, renderBody, renderNotice } from '../services/noticeComposer';
import { BODY_A, FPR_A, FPR_B, FPR_C, FPR_D, keyringGpg } from './fixtures';

const encrypted = { subject: 'GPG Key Expiry Notice', encrypt: true };

describe('NoticeComposer', () => {
    it('collects usable user IDs and encrypts the body to the key', async () => {
        const gpg = keyringGpg();
        const notice = await new NoticeComposer(gpg, encrypted).compose(FPR_A);

        expect(notice.fingerprint).to.equal(FPR_A);
        expect(notice.recipientUids).to.deep.equal(['Alice <alice@example.com>', 'Alice Work <alice@work.example>']);
        expect(notice.expiryEpoch).to.equal(2000000000);
        expect(notice.subject).to.equal('GPG Key Expiry Notice');
        expect(gpg.armorCalls).to.deep.equal([{ body: BODY_A, opts: { encryptTo: FPR_A, signAs: undefined } }]);
        expect(notice.body).to.equal(`-----BEGIN FAKE ARMOR enc=${FPR_A} sig=-----\n${BODY_A}-----END FAKE ARMOR-----\n`);
    });

    it('reports the subkey expiry for a subkey fingerprint', async () => {
        const notice = await new NoticeComposer(keyringGpg(), encrypted).compose(FPR_B);
        expect(notice.expiryEpoch).to.equal(3000000000);
    });

    it('leaves the body plain when neither encrypting nor signing', async () => {
        const notice = await new NoticeComposer(keyringGpg(), { subject: 's', encrypt: false }).compose(FPR_A);
        expect(notice.body).to.equal(BODY_A);
    });

    it('signs without encrypting', async () => {
        const gpg = keyringGpg();
        await new NoticeComposer(gpg, { subject: 's', encrypt: false, signAs: 'signer@example.com' }).compose(FPR_A);
        expect(gpg.armorCalls[0].opts).to.deep.equal({ encryptTo: undefined, signAs: 'signer@example.com' });
    });

    it('throws KeyLookupError when gpg cannot list the key', async () => {
        try {
            await new NoticeComposer(keyringGpg(), encrypted).compose(FPR_C);
            expect.fail('Expected compose to throw');
        } catch (error: unknown) {
            expect(error).to.be.instanceOf(KeyLookupError);
            expect(error instanceof Error && error.message).to.equal(`Invalid key ${FPR_C}`);
        }
    });

    it('throws NoValidIdentitiesError when every user ID is unusable', async () => {
        const gpg = keyringGpg();
        try {
            await new NoticeComposer(gpg, encrypted).compose(FPR_D);
            expect.fail('Expected compose to throw');
        } catch (error: unknown) {
            expect(error).to.be.instanceOf(NoValidIdentitiesError);
        }
        expect(gpg.armorCalls).to.have.length(0);
    });

    it('propagates armor failures', async () => {
        const gpg = keyringGpg();
        gpg.armorShouldThrow = new ArmorTransformError(2, 'gpg: public key not found');
        try {
            await new NoticeComposer(gpg, encrypted).compose(FPR_A);
            expect.fail('Expected compose to throw');
        } catch (error: unknown) {
            expect(error).to.equal(gpg.armorShouldThrow);
        }
    });
});

describe('renderBody()', () => {
    it('names the key and its expiry', () => {
        expect(renderBody(FPR_A, 2000000000)).to.equal(BODY_A);
    });

    it('reads "never" for a key without an expiration', () => {
        expect(renderBody(FPR_D, 0)).to.equal(
            `This message is to remind you that your GPG key:\n> ${FPR_D}\nWill expire on:\n> never\n`
        );
    });
});

describe('renderNotice()', () => {
    const notice = {
        fingerprint: FPR_A,
        recipientUids: ['Alice <alice@example.com>'],
        expiryEpoch: 2000000000,
        subject: 'Renew your key',
        body: 'body\n\n\n',
    };

    it('writes To, Subject and X-Generator headers, a blank line and the body', () => {
        expect(renderNotice(notice)).to.equal([
            'To: Alice <alice@example.com>',
            'Subject: Renew your key',
            'X-Generator: gpg-format-expiry-notice',
            '',
            'body',
            '',
        ].join('\n'));
    });

    it('keeps header values on one line', () => {
        const text = renderNotice({ ...notice, recipientUids: ['Eve\r\nBcc: eve@example.com'], subject: 'a\nb' });
        expect(text.split('\n').slice(0, 2)).to.deep.equal(['To: Eve Bcc: eve@example.com', 'Subject: a b']);
    });
});

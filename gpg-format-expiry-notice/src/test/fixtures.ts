import { MockGpgCli } from '@gpg-expiry/shared/test';

export const FPR_A = 'A'.repeat(40);
export const FPR_B = 'B'.repeat(40);
export const FPR_C = 'C'.repeat(40);
export const FPR_D = 'D'.repeat(40);

const pub = (expiry: string) => `pub:u:255:22:1111222233334444:1600000000:${expiry}::u:::scESC:::::ed25519:::0:`;
const sub = (expiry: string) => `sub:u:255:18:5555666677778888:1600000000:${expiry}:::::e:::::cv25519::`;
const fpr = (fingerprint: string) => `fpr:::::::::${fingerprint}:`;
const uid = (validity: string, name: string) => `uid:${validity}::::1600000000::0123456789ABCDEF0123456789ABCDEF01234567::${name}::::::::::0:`;

/** Key A (expires 2033-05-18) with subkey B (expires 2065-01-24); two usable user IDs out of four. */
export const LISTING_A = [
    pub('2000000000'), fpr(FPR_A),
    uid('u', 'Alice <alice@example.com>'),
    uid('r', 'Alice Old <alice@old.example>'),
    uid('e', 'Alice Expired <alice@expired.example>'),
    uid('-', 'Alice Work <alice@work.example>'),
    sub('3000000000'), fpr(FPR_B),
    '',
].join('\n');

/** Key D: never expires, every user ID revoked. */
export const LISTING_D = [
    pub(''), fpr(FPR_D),
    uid('r', 'Dave <dave@example.com>'),
    '',
].join('\n');

export const BODY_A = [
    'This message is to remind you that your GPG key:',
    `> ${FPR_A}`,
    'Will expire on:',
    '> Wed, 18 May 2033 03:33:20 GMT',
    '',
].join('\n');

/** Full stdout notice for key A with the default subject, encrypted to A. */
export const NOTICE_A = [
    'To: Alice <alice@example.com>',
    'To: Alice Work <alice@work.example>',
    'Subject: GPG Key Expiry Notice',
    'X-Generator: gpg-format-expiry-notice',
    '',
    `-----BEGIN FAKE ARMOR enc=${FPR_A} sig=-----`,
    BODY_A + '-----END FAKE ARMOR-----',
    '',
].join('\n');

/** MockGpgCli that knows keys A (and its subkey B) and D; C is unknown. */
export function keyringGpg(): MockGpgCli {
    const gpg = new MockGpgCli();
    gpg.lookupResults.set(FPR_A, { exitCode: 0, stdout: LISTING_A, stderr: '' });
    gpg.lookupResults.set(FPR_B, { exitCode: 0, stdout: LISTING_A, stderr: '' });
    gpg.lookupResults.set(FPR_D, { exitCode: 0, stdout: LISTING_D, stderr: '' });
    return gpg;
}

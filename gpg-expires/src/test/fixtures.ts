/**
 * A small keyring listing shared by the gpg-expires tests.
 *
 *   key 1: primary AAAA… (scESC, 2033-05-18), encryption subkey BBBB… (e, 2033-05-18)
 *   key 2: primary CCCC… (scE, never),        encryption subkey DDDD… (e, never)
 *   key 3: primary EEEE… (scESC, 2023-11-14), encryption subkey FFFF… (e, 2023-11-14)
 */

import { FixedDateResolver } from '@gpg-expiry/shared/test';

export const FPR_A = 'A'.repeat(40);
export const FPR_B = 'B'.repeat(40);
export const FPR_C = 'C'.repeat(40);
export const FPR_D = 'D'.repeat(40);
export const FPR_E = 'E'.repeat(40);
export const FPR_F = 'F'.repeat(40);

const pub = (expiry: string, caps: string) => `pub:u:255:22:1111222233334444:1600000000:${expiry}::u:::${caps}:::::ed25519:::0:`;
const sub = (expiry: string, caps: string) => `sub:u:255:18:5555666677778888:1600000000:${expiry}:::::${caps}:::::cv25519::`;
const fpr = (fingerprint: string) => `fpr:::::::::${fingerprint}:`;
const uid = (name: string) => `uid:u::::1600000000::0123456789ABCDEF0123456789ABCDEF01234567::${name}::::::::::0:`;

export const KEYRING_LISTING = [
    'tru::1:1600000000:0:3:1:5',
    pub('2000000000', 'scESC'), fpr(FPR_A), uid('Alice <alice@example.com>'),
    sub('2000000000', 'e'), fpr(FPR_B),
    pub('', 'scE'), fpr(FPR_C), uid('Bob <bob@example.com>'),
    sub('', 'e'), fpr(FPR_D),
    pub('1700000000', 'scESC'), fpr(FPR_E), uid('Carol <carol@example.com>'),
    sub('1700000000', 'e'), fpr(FPR_F),
    '',
].join('\n');

/** `yesterday` → 2027-01-15, `+30days` → 2036-07-18, plus the other expressions the tests use. */
export function fixedDates(): FixedDateResolver {
    return new FixedDateResolver(new Map([
        ['yesterday', 1800000000],
        ['+30days', 2100000000],
        ['@0', 0],
        ['-1year', 1600000000],
        ['today', 1900000000],
    ]));
}

import { expect } from 'chai';
import { describe, it } from 'mocha';
import { DateResolver, formatEpoch, formatExpiry } from '../dateResolver';
import { DateExpressionError } from '../errors';
import type { ExecFileFn } from '../gpgCli';

describe('DateResolver', () => {
    it('runs date -d <expression> +%s and parses the epoch', async () => {
        const calls: Array<{ binary: string; args: readonly string[] }> = [];
        const exec: ExecFileFn = (binary, args) => {
            calls.push({ binary, args });
            return Promise.resolve({ stdout: '1700000000\n', stderr: '' });
        };

        const epoch = await new DateResolver({}, exec).toEpoch('+30days');

        expect(epoch).to.equal(1700000000);
        expect(calls).to.deep.equal([{ binary: 'date', args: ['-d', '+30days', '+%s'] }]);
    });

    it('uses the configured date binary', async () => {
        let used = '';
        const exec: ExecFileFn = (binary) => {
            used = binary;
            return Promise.resolve({ stdout: '0\n', stderr: '' });
        };
        await new DateResolver({ dateBin: '/usr/local/bin/gdate' }, exec).toEpoch('@0');
        expect(used).to.equal('/usr/local/bin/gdate');
    });

    it('accepts negative epochs', async () => {
        const exec: ExecFileFn = () => Promise.resolve({ stdout: '-3600\n', stderr: '' });
        expect(await new DateResolver({}, exec).toEpoch('1969-12-31 23:00 UTC')).to.equal(-3600);
    });

    it('throws DateExpressionError when date exits non-zero', async () => {
        const exec: ExecFileFn = () => Promise.reject(Object.assign(new Error('exit 1'), {
            code: 1,
            stdout: '',
            stderr: "date: invalid date 'next blursday'",
        }));
        try {
            await new DateResolver({}, exec).toEpoch('next blursday');
            expect.fail('Expected toEpoch to throw');
        } catch (error: unknown) {
            expect(error).to.be.instanceOf(DateExpressionError);
            expect(error instanceof Error && error.message).to.equal('Invalid date "next blursday". See date(1)');
        }
    });

    it('throws DateExpressionError when date prints something other than an integer', async () => {
        const exec: ExecFileFn = () => Promise.resolve({ stdout: '+%s\n', stderr: '' });
        try {
            await new DateResolver({}, exec).toEpoch('tomorrow');
            expect.fail('Expected toEpoch to throw');
        } catch (error: unknown) {
            expect(error).to.be.instanceOf(DateExpressionError);
        }
    });
});

describe('formatEpoch()', () => {
    it('formats as a UTC date string', () => {
        expect(formatEpoch(2000000000)).to.equal('Wed, 18 May 2033 03:33:20 GMT');
        expect(formatEpoch(0)).to.equal('Thu, 01 Jan 1970 00:00:00 GMT');
    });
});

describe('formatExpiry()', () => {
    it('reads "never" for an unset expiry', () => {
        expect(formatExpiry(0)).to.equal('never');
    });

    it('formats a set expiry like formatEpoch', () => {
        expect(formatExpiry(1700000000)).to.equal('Tue, 14 Nov 2023 22:13:20 GMT');
    });
});

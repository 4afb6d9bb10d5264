/**
 * Turns date(1) expressions such as `+30days`, `yesterday` or `next year`
 * into epoch seconds by asking GNU date, so `--before`/`--after` accept
 * exactly what `date -d` accepts.
 */

import { DateExpressionError } from './errors';
import { defaultExecFileAsync, isNonZeroExit } from './gpgCli';
import type { ExecFileFn } from './gpgCli';

export interface DateResolverOpts {
    /** date binary; defaults to `date` looked up on PATH. */
    dateBin?: string;
}

export class DateResolver {
    private readonly dateBin: string;
    private readonly _execFileAsync: ExecFileFn;

    constructor(opts?: DateResolverOpts, execFileAsync: ExecFileFn = defaultExecFileAsync) {
        this.dateBin = opts?.dateBin ?? 'date';
        this._execFileAsync = execFileAsync;
    }

    /** Run `date -d <expression> +%s`. Throws {@link DateExpressionError} when date rejects it. */
    async toEpoch(expression: string): Promise<number> {
        let stdout: string;
        try {
            ({ stdout } = await this._execFileAsync(this.dateBin, ['-d', expression, '+%s'], {
                encoding: 'utf8',
                env: process.env,
                shell: false,
                timeout: 5000,
            }));
        } catch (err: unknown) {
            if (isNonZeroExit(err)) {
                throw new DateExpressionError(expression);
            }
            throw err;
        }

        const trimmed = stdout.trim();
        if (!/^-?\d+$/.test(trimmed)) {
            throw new DateExpressionError(expression);
        }
        return parseInt(trimmed, 10);
    }
}

/** `Wed, 18 May 2033 03:33:20 GMT` */
export function formatEpoch(epoch: number): string {
    return new Date(epoch * 1000).toUTCString();
}

/** Like {@link formatEpoch}, but a key without an expiration reads `never`. */
export function formatExpiry(expiryEpoch: number): string {
    return expiryEpoch === 0 ? 'never' : formatEpoch(expiryEpoch);
}

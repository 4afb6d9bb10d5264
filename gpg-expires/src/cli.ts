/**
 * gpg-expires — composition root.
 *
 * Parses argv into an {@link ExpiresConfig}, wires the ExpiringKeys service
 * and turns the outcome into an exit code. No business logic lives here.
 */

import { Command, Option } from 'commander';
import {
    UsageError,
    configureProgram,
    exitCodeFor,
    nonEmpty,
    readLines,
    streamLogConfig,
    takeOperands,
} from '@gpg-expiry/shared';
import type { CliIo, GpgLocationOptions, LogConfig } from '@gpg-expiry/shared';
import {
    ALL_AFTER,
    DEFAULT_AFTER,
    DEFAULT_BEFORE,
    DEFAULT_CAPABILITIES,
    OUTPUT_FORMATS,
    isOutputFormat,
} from './config';
import type { ExpiresConfig } from './config';
import { ExpiringKeys } from './services/expiringKeys';
import type { ExpiringKeysDeps } from './services/expiringKeys';

export const VERSION = '1.0.0';

interface RawExpiresOptions extends GpgLocationOptions {
    quiet: boolean;
    warn: boolean;
    before: string;
    after: string;
    all: boolean;
    capabilities: string;
    format: string;
}

const EXAMPLES = `
Examples:
  Check a set of defined keys
    $ cat keys.txt | gpg-expires

  Show key info for keys expiring between -1year and today
    $ gpg-expires -a -1year -b today -f list

  Fingerprints in order of expiration
    $ gpg-expires --before "next year" --format fprdate | sort -k2
`;

export function buildProgram(io: CliIo): Command {
    const program = new Command()
        .name('gpg-expires')
        .description('List keys in the GnuPG keyring that are going to expire in the given time frame')
        .version(VERSION)
        .option('-q, --quiet', 'quiet mode: no header on stderr', false)
        .option('-w, --warn', 'also list keys that have no expiration date', false)
        .option('-b, --before <date>', 'show keys expiring before this date(1) expression', nonEmpty, DEFAULT_BEFORE)
        .option('-a, --after <date>', 'show keys expiring after this date(1) expression', nonEmpty, DEFAULT_AFTER)
        .option('--all', 'set after to 1970-01-01', false)
        .option('-c, --capabilities <chars>', 'only check keys with any of these capabilities (eg. esca)', nonEmpty, DEFAULT_CAPABILITIES)
        .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('fpr'))
        .addHelpText('after', EXAMPLES);
    return configureProgram(program, io);
}

/**
 * Parse user arguments (argv without node and script) into a config.
 * `keySpecs` is filled in later from stdin.
 */
export function parseExpiresArgs(argv: readonly string[], io: CliIo, logConfig: LogConfig): ExpiresConfig {
    const program = buildProgram(io);
    program.parse([...argv], { from: 'user' });
    takeOperands(program.args, logConfig);

    const opts = program.opts<RawExpiresOptions>();
    if (!isOutputFormat(opts.format)) {
        throw new UsageError(`Invalid format: ${opts.format}`);
    }
    return {
        quiet: opts.quiet,
        warn: opts.warn,
        before: opts.before,
        after: opts.all ? ALL_AFTER : opts.after,
        capabilities: opts.capabilities,
        format: opts.format,
        keySpecs: [],
        gpgBinDir: opts.gpgBinDir,
        gnupgHome: opts.homedir,
    };
}

/** Run the tool; resolves to the process exit code. */
export async function main(argv: readonly string[], io: CliIo, deps?: Partial<ExpiringKeysDeps>): Promise<number> {
    const logConfig = streamLogConfig(io.stderr);
    try {
        const parsed = parseExpiresArgs(argv, io, logConfig);
        // A piped stdin restricts the listing to the keys it names
        const keySpecs = io.stdin.isTTY ? [] : await readLines(io.stdin);
        const config: ExpiresConfig = { ...parsed, keySpecs };

        const service = new ExpiringKeys(config, logConfig, {
            write: (text) => { io.stdout.write(text); },
            ...deps,
        });
        await service.run();
        return 0;
    } catch (error: unknown) {
        return exitCodeFor(error, logConfig);
    }
}

/**
 * gpg-format-expiry-notice — composition root.
 *
 * Parses argv into a {@link NoticeConfig}, gathers fingerprints from the
 * arguments, a file or stdin, and hands them to the NoticeWriter service.
 * Only usage and output-directory errors change the exit code; skipped keys
 * are counted on stderr.
 */

import * as fs from 'fs';
import { Command } from 'commander';
import {
    UsageError,
    configureProgram,
    exitCodeFor,
    log,
    nonEmpty,
    readFileLines,
    readLines,
    streamLogConfig,
    takeOperands,
} from '@gpg-expiry/shared';
import type { CliIo, GpgLocationOptions, LogConfig } from '@gpg-expiry/shared';
import { DEFAULT_SUBJECT } from './config';
import type { NoticeConfig, NoticeDestination } from './config';
import { NoticeWriter } from './services/noticeWriter';
import type { NoticeWriterDeps } from './services/noticeWriter';

export const VERSION = '1.0.0';

interface RawNoticeOptions extends GpgLocationOptions {
    outputDirectory?: string;
    stdout: boolean;
    plain: boolean;
    signas?: string;
    file?: string;
    subject: string;
}

const EXAMPLES = `
Examples:
  Generate a message for $key_fingerprint
    $ gpg-format-expiry-notice $key_fingerprint --stdout

  Generate messages for every key gpg-expires reports, one file each
    $ gpg-expires | gpg-format-expiry-notice -f - -o ./dir

  Generate a message and mail it immediately
    $ gpg-format-expiry-notice $key_fingerprint --stdout | mail -t
`;

export function buildProgram(io: CliIo): Command {
    const program = new Command()
        .name('gpg-format-expiry-notice')
        .description('Format emails reminding key owners that their GnuPG key is going to expire')
        .version(VERSION)
        .usage('[(-o <dir>) | --stdout] [-p] [-u <key>] [-f <file>|-] [-s <subject>] [<fpr>...]')
        .option('-o, --output-directory <dir>', 'store notices in <dir>, one <fingerprint>.mail file per key', nonEmpty)
        .option('--stdout', 'write notices to standard output', false)
        .option('-p, --plain', 'do not encrypt the body; with --signas the signature is a clear signature', false)
        .option('-u, --signas <key>', 'sign the body with <key>', nonEmpty)
        .option('-f, --file <file>', 'read fingerprints from <file>, or from stdin when <file> is "-"', nonEmpty)
        .option('-s, --subject <subject>', 'message subject', nonEmpty, DEFAULT_SUBJECT)
        .addHelpText('after', EXAMPLES);
    return configureProgram(program, io);
}

/** `--stdout` XOR `--output-directory`; exactly one is required. */
export function resolveDestination(opts: Pick<RawNoticeOptions, 'stdout' | 'outputDirectory'>): NoticeDestination {
    if (opts.stdout && opts.outputDirectory) {
        throw new UsageError('standard output, or directory, which one?');
    }
    if (opts.stdout) {
        return { kind: 'stdout' };
    }
    if (opts.outputDirectory) {
        return { kind: 'directory', path: opts.outputDirectory };
    }
    throw new UsageError('one of --output-directory <dir> or --stdout is required');
}

/**
 * Fingerprint inputs: positional operands when `--file` is absent, stdin for
 * `--file -`, otherwise the lines of the named file.
 */
export async function gatherFingerprints(file: string | undefined, operands: readonly string[], io: CliIo): Promise<string[]> {
    if (file === undefined) {
        return [...operands];
    }
    if (file === '-') {
        return readLines(io.stdin);
    }
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
        throw new UsageError(`Cannot read ${file}`);
    }
    return readFileLines(file);
}

/** Parse user arguments (argv without node and script) into a config. */
export async function parseNoticeArgs(argv: readonly string[], io: CliIo, logConfig: LogConfig): Promise<NoticeConfig> {
    const program = buildProgram(io);
    program.parse([...argv], { from: 'user' });
    const operands = takeOperands(program.args, logConfig);

    const opts = program.opts<RawNoticeOptions>();
    const destination = resolveDestination(opts);
    return {
        destination,
        encrypt: !opts.plain,
        signAs: opts.signas,
        subject: opts.subject,
        fingerprints: await gatherFingerprints(opts.file, operands, io),
        gpgBinDir: opts.gpgBinDir,
        gnupgHome: opts.homedir,
    };
}

/** Run the tool; resolves to the process exit code. */
export async function main(argv: readonly string[], io: CliIo, deps?: Partial<NoticeWriterDeps>): Promise<number> {
    const logConfig = streamLogConfig(io.stderr);
    try {
        const config = await parseNoticeArgs(argv, io, logConfig);
        const writer = new NoticeWriter(config, logConfig, {
            write: (text) => { io.stdout.write(text); },
            ...deps,
        });
        writer.prepareDestination();
        const { written, skipped } = await writer.writeAll();
        if (skipped > 0) {
            log(logConfig, `Skipped ${skipped} of ${written + skipped} fingerprints`);
        }
        return 0;
    } catch (error: unknown) {
        return exitCodeFor(error, logConfig);
    }
}

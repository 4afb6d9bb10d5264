/**
 * Command-line plumbing shared by both tools: commander setup, unknown-option
 * warnings and mapping of thrown errors to exit codes.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { extractErrorMessage, log } from './logging';
import type { LogConfig } from './types';

/** The process streams a CLI talks to; tests pass in-memory streams. */
export interface CliIo {
    stdout: NodeJS.WritableStream;
    stderr: NodeJS.WritableStream;
    stdin: NodeJS.ReadableStream & { isTTY?: boolean };
}

/** Options every tool accepts for locating gpg and the keyring. */
export interface GpgLocationOptions {
    gpgBinDir?: string;
    homedir?: string;
}

/** commander argParser for options whose value may not be empty. */
export function nonEmpty(value: string): string {
    if (value === '') {
        throw new InvalidArgumentError('requires a non-empty option argument');
    }
    return value;
}

/**
 * Apply the behaviour both tools share: errors are thrown instead of exiting,
 * help/errors go to the given streams, unknown options are collected instead
 * of rejected, and `--gpg-bin-dir` / `--homedir` are declared.
 */
export function configureProgram(program: Command, io: CliIo): Command {
    return program
        .option('--gpg-bin-dir <dir>', 'directory containing the gpg binary (default: found on PATH)', nonEmpty)
        .option('--homedir <dir>', 'GnuPG home directory (sets GNUPGHOME for gpg)', nonEmpty)
        .allowUnknownOption(true)
        .allowExcessArguments(true)
        .exitOverride()
        .configureOutput({
            writeOut: (str) => { io.stdout.write(str); },
            writeErr: (str) => { io.stderr.write(str); },
        });
}

/**
 * Warn about every argument that looks like an option commander did not
 * recognise and return the remaining operands. A lone `-` is an operand.
 */
export function takeOperands(args: readonly string[], logConfig: LogConfig): string[] {
    const operands: string[] = [];
    for (const arg of args) {
        if (arg.length > 1 && arg.startsWith('-')) {
            log(logConfig, `WARN: Unknown option (ignored): ${arg}`);
        } else {
            operands.push(arg);
        }
    }
    return operands;
}

/**
 * Exit code for an error that ended a CLI run. commander has already printed
 * its own message (and exits 0 for --help / --version); anything else is logged.
 */
export function exitCodeFor(error: unknown, logConfig: LogConfig): number {
    if (error instanceof CommanderError) {
        return error.exitCode;
    }
    log(logConfig, `ERROR: ${extractErrorMessage(error)}`);
    return 1;
}

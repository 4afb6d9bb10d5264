/**
 * GpgCli — base class for every gpg subprocess the expiry tools run.
 *
 * Handles:
 *   - Binary detection: explicit path validation, PATH probe (whichSync), or
 *     well-known Gpg4win locations (Windows fallback)
 *   - Optional GNUPGHOME injection into every subprocess call
 *   - gpg --list-public-keys --with-colons --with-fingerprint  (listPublicKeys)
 *   - gpg --list-keys --with-colons <fpr>                     (lookupKey)
 *   - gpg --list-keys [--with-colons] <fpr>                   (showKey)
 *   - gpg --armor [--encrypt ...] [--sign|--clear-sign] via stdin (armorTransform)
 *
 * Colon listings are read as UTF-8 so user IDs keep their non-ASCII characters.
 *
 * Subclassed by MockGpgCli (shared/src/test/mocks.ts) which replaces the
 * subprocess-backed operations with recorded, preset results.
 */

import * as fs from 'fs';
import * as path from 'path';
import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import which from 'which';
import { ArmorTransformError } from './errors';

const execFileRaw = promisify(execFile);

// ============================================================================
// Well-known Gpg4win installation paths probed on Windows when PATH misses
// ============================================================================

const WELL_KNOWN_WINDOWS_PATHS = [
    'C:\\Program Files\\GnuPG\\bin',
    'C:\\Program Files\\Gpg4win\\bin',
    'C:\\Program Files (x86)\\GnuPG\\bin',
    'C:\\Program Files (x86)\\Gpg4win\\bin',
];

// ============================================================================
// Public interfaces
// ============================================================================

export interface GpgCliOpts {
    /** Absolute directory path containing gpg. If omitted or `''`, detection runs at construction time. */
    gpgBinDir?: string;
    /** If set, injected as GNUPGHOME in every subprocess call. */
    gnupgHome?: string;
}

/**
 * Shape of errors thrown by `promisify(execFile)` on non-zero exit.
 * `code` is `null` when the process was killed by a signal rather than exiting normally.
 */
export interface ExecFileError {
    code?: number | null;
    stdout?: string;
    stderr?: string;
}

/** Normalised result returned by every GpgCli subprocess helper. */
export interface GpgExecResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/** What `armorTransform` should do with the body. Neither field set means passthrough. */
export interface ArmorOptions {
    /** Fingerprint to encrypt to. */
    encryptTo?: string;
    /** Fingerprint or user ID to sign as. Clear-signs when not encrypting. */
    signAs?: string;
}

// ============================================================================
// Dependency injection interfaces (for unit testing without real gpg)
// ============================================================================

/** Low-level subprocess execution function signature (injectable for tests). */
export type ExecFileFn = (
    binary: string,
    args: readonly string[],
    // literal `false`: callers cannot opt into a shell
    opts: { encoding: BufferEncoding; env: NodeJS.ProcessEnv; timeout?: number; maxBuffer?: number; readonly shell: false }
) => Promise<{ stdout: string; stderr: string }>;

/** Stdin-piping subprocess function signature (injectable for tests). */
export type SpawnForStdinFn = (
    binary: string,
    args: readonly string[],
    input: Buffer,
    env: NodeJS.ProcessEnv
) => Promise<GpgExecResult>;

/** Optional dependencies; each has a production default. */
export interface GpgCliDeps {
    /** Override `fs.existsSync` (used in detection). */
    existsSync?: (p: string) => boolean;
    /** Override `which.sync` (used in PATH probe during detection). */
    whichSync?: (cmd: string) => string | null;
    /** Override the subprocess executor (used by run / runRaw). */
    execFileAsync?: ExecFileFn;
    /** Override the stdin-piping subprocess executor (used by armorTransform). */
    spawnForStdin?: SpawnForStdinFn;
}

// ============================================================================
// Default production implementations
// ============================================================================

/** Wraps `promisify(execFile)` with the simpler `ExecFileFn` signature. */
export const defaultExecFileAsync: ExecFileFn = async (binary, args, opts) => {
    const { stdout, stderr } = await execFileRaw(binary, [...args], opts);
    return { stdout: stdout.toString(), stderr: stderr.toString() };
};

/** Spawns a process and pipes `input` to stdin; collects stdout/stderr as UTF-8. */
function defaultSpawnForStdin(
    binary: string,
    args: readonly string[],
    input: Buffer,
    env: NodeJS.ProcessEnv
): Promise<GpgExecResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(binary, [...args], {
            env,
            shell: false,
            stdio: ['pipe', 'pipe', 'pipe'],
        });
        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];

        child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

        child.stdin.write(input);
        child.stdin.end();

        child.on('close', (code) => {
            const stdout = Buffer.concat(stdoutChunks).toString('utf8');
            const stderr = Buffer.concat(stderrChunks).toString('utf8');
            resolve({ stdout, stderr, exitCode: code ?? 0 });
        });

        child.on('error', reject);
    });
}

/** True for the rejection `promisify(execFile)` produces when the process exits non-zero. */
export function isNonZeroExit(err: unknown): err is ExecFileError & { code: number; stdout: string } {
    if (typeof err !== 'object' || err === null || !('code' in err) || !('stdout' in err)) {
        return false;
    }
    return typeof err.code === 'number' && typeof err.stdout === 'string';
}

// ============================================================================
// Main class
// ============================================================================

export class GpgCli {
    private readonly binDir: string;
    // Protected so MockGpgCli can inspect the resolved binary
    protected readonly gpgBin: string;
    protected readonly gnupgHome: string | undefined;

    // Resolved deps
    private readonly _existsSync: (p: string) => boolean;
    private readonly _whichSync: (cmd: string) => string | null;
    private readonly _execFileAsync: ExecFileFn;
    private readonly _spawnForStdin: SpawnForStdinFn;

    constructor(opts?: GpgCliOpts, deps?: Partial<GpgCliDeps>) {
        this._existsSync = deps?.existsSync ?? fs.existsSync;
        this._whichSync = deps?.whichSync ?? ((cmd) => which.sync(cmd, { nothrow: true }));
        this._execFileAsync = deps?.execFileAsync ?? defaultExecFileAsync;
        this._spawnForStdin = deps?.spawnForStdin ?? defaultSpawnForStdin;

        this.gnupgHome = opts?.gnupgHome || undefined;
        this.binDir = this.detect(opts?.gpgBinDir ?? '');
        this.gpgBin = path.join(this.binDir, process.platform === 'win32' ? 'gpg.exe' : 'gpg');
    }

    // -------------------------------------------------------------------------
    // Private: detection (runs once at construction)
    // -------------------------------------------------------------------------

    private detect(gpgBinDir: string): string {
        const gpgName = process.platform === 'win32' ? 'gpg.exe' : 'gpg';

        if (gpgBinDir) {
            // An explicit path is never second-guessed
            if (!this._existsSync(path.join(gpgBinDir, gpgName))) {
                throw new Error(`GnuPG bin not found at configured path: ${gpgBinDir}`);
            }
            return gpgBinDir;
        }

        const fromPath = this._whichSync('gpg');
        if (fromPath) {
            return path.dirname(fromPath);
        }

        if (process.platform === 'win32') {
            for (const dir of WELL_KNOWN_WINDOWS_PATHS) {
                if (this._existsSync(path.join(dir, gpgName))) {
                    return dir;
                }
            }
        }

        throw new Error('GnuPG bin not found. Install GnuPG or pass --gpg-bin-dir.');
    }

    // -------------------------------------------------------------------------
    // Public: metadata
    // -------------------------------------------------------------------------

    /** Return the resolved bin directory path. */
    getBinDir(): string {
        return this.binDir;
    }

    // -------------------------------------------------------------------------
    // Protected: subprocess helpers (available to subclasses)
    // -------------------------------------------------------------------------

    /** Effective environment for subprocess calls. Always explicit (never inherits undefined). */
    protected get env(): NodeJS.ProcessEnv {
        return this.gnupgHome ? { ...process.env, GNUPGHOME: this.gnupgHome } : { ...process.env };
    }

    /**
     * Run gpg. Rejects (throws) on non-zero exit or spawn error.
     * Use for operations where failure is unexpected (keyring listing).
     */
    protected async run(args: string[]): Promise<GpgExecResult> {
        const { stdout, stderr } = await this._execFileAsync(this.gpgBin, args, {
            encoding: 'utf8',
            env: this.env,
            shell: false,
            timeout: 30000,
            maxBuffer: 16 * 1024 * 1024, // full keyring listings grow with the number of keys
        });
        return { exitCode: 0, stdout, stderr };
    }

    /**
     * Run gpg. Returns exit code instead of rejecting on non-zero exit.
     * Use for operations where the caller needs to inspect the exit code.
     */
    protected async runRaw(args: string[]): Promise<GpgExecResult> {
        try {
            return await this.run(args);
        } catch (err: unknown) {
            // code is null only when the process was killed by a signal.
            if (isNonZeroExit(err)) {
                return { exitCode: err.code, stdout: err.stdout, stderr: err.stderr ?? '' };
            }
            throw err; // ENOENT, timeout
        }
    }

    // -------------------------------------------------------------------------
    // Public: key operations
    // -------------------------------------------------------------------------

    /**
     * Colon listing of the public keyring, with fingerprint records.
     * `keySpecs` restricts the listing to matching keys; empty lists everything.
     */
    async listPublicKeys(keySpecs: readonly string[] = []): Promise<string> {
        const { stdout } = await this.run([
            '--list-public-keys', '--with-colons', '--with-fingerprint', ...keySpecs,
        ]);
        return stdout;
    }

    /**
     * Colon listing of a single key. Does not throw when gpg cannot find the key;
     * the caller decides what a non-zero exit means.
     */
    async lookupKey(fingerprint: string): Promise<GpgExecResult> {
        return this.runRaw(['--list-keys', '--with-colons', fingerprint]);
    }

    /** Human-readable (`colons === false`) or colon listing of one key, for display. */
    async showKey(fingerprint: string, colons: boolean): Promise<string> {
        const args = colons ? ['--list-keys', '--with-colons', fingerprint] : ['--list-keys', fingerprint];
        const { stdout } = await this.run(args);
        return stdout;
    }

    /**
     * Pipe `body` through `gpg --armor` to encrypt and/or sign it.
     * Returns `body` unchanged when neither `encryptTo` nor `signAs` is set.
     */
    async armorTransform(body: string, opts: ArmorOptions = {}): Promise<string> {
        const args = buildArmorArgs(opts);
        if (args.length === 0) {
            return body;
        }

        const { exitCode, stdout, stderr } = await this._spawnForStdin(
            this.gpgBin,
            ['--armor', ...args],
            Buffer.from(body, 'utf8'),
            this.env
        );
        if (exitCode !== 0) {
            throw new ArmorTransformError(exitCode, stderr.trim());
        }
        return stdout;
    }
}

/**
 * gpg arguments (after `--armor`) for an encrypt/sign passthrough.
 *
 *   encrypt only     → --encrypt --recipient <fpr>
 *   encrypt + sign   → --encrypt --recipient <fpr> --local-user <key> --sign
 *   sign only        → --local-user <key> --clear-sign
 */
export function buildArmorArgs(opts: ArmorOptions): string[] {
    const args: string[] = [];
    if (opts.encryptTo) {
        args.push('--encrypt', '--recipient', opts.encryptTo);
    }
    if (opts.signAs) {
        args.push('--local-user', opts.signAs, opts.encryptTo ? '--sign' : '--clear-sign');
    }
    return args;
}

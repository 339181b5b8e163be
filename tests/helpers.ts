/**
 * Shared test fixtures: temp directories, scripted prompter, recording
 * command runner and hosting API, commander output capture.
 */
import { mkdirSync, readdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Command } from 'commander';
import type { ParserSetup } from '../src/config/resolver.js';
import { CollaboratorError } from '../src/errors.js';
import type { CommandResult, CommandRunner, RunCommandOptions } from '../src/external/CommandRunner.js';
import type { HostingApi, HttpMethod, RequestPayload } from '../src/external/GitHubApi.js';
import type { Prompter } from '../src/prompt/Prompter.js';
import type { FullProjectConfig, BarebonesProjectConfig } from '../src/config/projectConfig.js';

// ── Filesystem ───────────────────────────────────────────

export function tempDir(): string {
    const dir = join(tmpdir(), `seedbed-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(dir, { recursive: true });
    return dir;
}

/** Recursively list all files and links in a directory (relative paths) */
export function listFilesRecursive(dir: string, base = ''): string[] {
    const entries = readdirSync(dir, { withFileTypes: true });
    const results: string[] = [];
    for (const entry of entries) {
        const rel = base ? `${base}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            results.push(...listFilesRecursive(join(dir, entry.name), rel));
        } else {
            results.push(rel);
        }
    }
    return results.sort();
}

/** Run `fn` and return what it threw (fails the test when nothing is thrown). */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected an error to be thrown');
}

export async function catchAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
    try {
        await fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected an error to be thrown');
}

// ── Configurations ───────────────────────────────────────

export function fullConfig(overrides: Partial<FullProjectConfig> = {}): FullProjectConfig {
    return {
        barebones: false,
        project: 'demo',
        description: 'A demo project',
        url: 'https://example.com/demo',
        mainPackage: 'demo_pkg',
        mitLicense: true,
        authors: 'Ada <ada@example.com>, Bob',
        minPythonVersion: '3.9',
        maxPythonVersion: '3.12',
        pyTyped: true,
        scheduleHookUpdates: true,
        extraDeps: '',
        extraDevDeps: '',
        github: true,
        doctests: true,
        ...overrides,
    };
}

export function barebonesConfig(overrides: Partial<BarebonesProjectConfig> = {}): BarebonesProjectConfig {
    return {
        barebones: true,
        project: 'demo',
        description: 'A demo project',
        mainPackage: 'demo_pkg',
        mitLicense: true,
        authors: 'Ada <ada@example.com>, Bob',
        minPythonVersion: '3.9',
        pyTyped: true,
        extraDeps: '',
        extraDevDeps: '',
        ...overrides,
    };
}

// ── Prompter ─────────────────────────────────────────────

/** Prompter answering from fixed scripts; an unscripted question fails the test. */
export class ScriptedPrompter implements Prompter {
    readonly asked: string[] = [];
    readonly secretsAsked: string[] = [];
    readonly errors: string[] = [];
    private readonly answers: string[];
    private readonly secrets: string[];

    constructor(answers: string[] = [], secrets: string[] = []) {
        this.answers = [...answers];
        this.secrets = [...secrets];
    }

    async ask(message: string): Promise<string> {
        this.asked.push(message);
        const answer = this.answers.shift();
        if (answer === undefined) throw new Error(`unexpected prompt: ${message}`);
        return answer;
    }

    async askSecret(message: string): Promise<string> {
        this.secretsAsked.push(message);
        const answer = this.secrets.shift();
        if (answer === undefined) throw new Error(`unexpected secret prompt: ${message}`);
        return answer;
    }

    error(message: string): void {
        this.errors.push(message);
    }

    /** Answers not consumed yet */
    get remaining(): number {
        return this.answers.length + this.secrets.length;
    }
}

// ── Command runner ───────────────────────────────────────

export interface RecordedCommand {
    readonly argv: readonly string[];
    readonly options: RunCommandOptions;
}

/** Records every command; `fail` decides which ones exit non-zero. */
export class RecordingRunner implements CommandRunner {
    readonly commands: RecordedCommand[] = [];
    private readonly fail: (argv: readonly string[]) => boolean;
    private readonly stdout: (argv: readonly string[]) => string;

    constructor(options: {
        fail?: (argv: readonly string[]) => boolean;
        stdout?: (argv: readonly string[]) => string;
    } = {}) {
        this.fail = options.fail ?? (() => false);
        this.stdout = options.stdout ?? (() => '');
    }

    run(argv: readonly string[], options: RunCommandOptions = {}): CommandResult {
        this.commands.push({ argv, options });
        const failed = this.fail(argv);
        const result: CommandResult = { status: failed ? 1 : 0, stdout: this.stdout(argv), stderr: '' };
        if (failed && options.check !== false) {
            throw new CollaboratorError('command', `'${argv.join(' ')}' failed with exit status 1`, { command: result });
        }
        return result;
    }

    /** Recorded command lines, joined with spaces */
    get lines(): string[] {
        return this.commands.map(c => c.argv.join(' '));
    }
}

// ── Hosting API ──────────────────────────────────────────

export interface RecordedCall {
    readonly endpoint: string;
    readonly method: HttpMethod;
    readonly data: RequestPayload | undefined;
}

/** Records calls and answers from a `METHOD endpoint` → body table. */
export class RecordingHostingApi implements HostingApi {
    readonly calls: RecordedCall[] = [];
    private readonly responses: Readonly<Record<string, unknown>>;

    constructor(responses: Readonly<Record<string, unknown>> = {}) {
        this.responses = responses;
    }

    async call(endpoint: string, method: HttpMethod = 'GET', data?: RequestPayload): Promise<unknown> {
        this.calls.push({ endpoint, method, data });
        return this.responses[`${method} ${endpoint}`] ?? {};
    }
}

// ── Commander ────────────────────────────────────────────

export interface CapturedOutput {
    out: string;
    err: string;
}

/** Make `parser` throw instead of exiting, and collect what it prints. */
export function captureParser(output: CapturedOutput = { out: '', err: '' }): ParserSetup {
    return (parser: Command) => {
        parser.exitOverride();
        parser.configureOutput({
            writeOut: (str) => { output.out += str; },
            writeErr: (str) => { output.err += str; },
        });
    };
}

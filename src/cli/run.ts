/**
 * Orchestration — one `seedbed` run.
 *
 * ```
 * resolve configuration ─▶ materialize ─▶ create project ─▶ (GitHub setup)
 * ```
 *
 * Exit codes:
 *
 * | code | meaning                                                        |
 * |------|----------------------------------------------------------------|
 * | 0    | success                                                        |
 * | 1    | failure before the project was fully created                   |
 * | 2    | failure after the project was created (remote state may exist) |
 *
 * Only filesystem and collaborator failures are mapped to exit codes.
 * Authoring defects propagate; parse errors and prompt interrupts
 * terminate the process on their own.
 *
 * @module
 */
import { existsSync, rmSync } from 'node:fs';
import { resolve } from 'node:path';
import { toProjectConfig } from '../config/projectConfig.js';
import { createRegistry } from '../config/registry.js';
import { type ParserSetup, resolveConfiguration } from '../config/resolver.js';
import { CollaboratorError, isFileSystemError } from '../errors.js';
import type { CommandRunner, CommandRunnerOptions } from '../external/CommandRunner.js';
import { detectGitUser } from '../external/gitUser.js';
import type { HostingApi } from '../external/GitHubApi.js';
import type { SecretEncryptor } from '../external/SecretEncryptor.js';
import {
    createScaffoldObserver,
    type ScaffoldObserverFn,
    SILENT_OBSERVER,
} from '../observability/ScaffoldObserver.js';
import { type Prompter, promptYesNo } from '../prompt/Prompter.js';
import { materialize } from '../scaffold/materialize.js';
import { createProject } from '../setup/createProject.js';
import { setupGitHub } from '../setup/setupGitHub.js';

// ── Types ────────────────────────────────────────────────

export type ExitCode = 0 | 1 | 2;

/** Everything a run talks to. The `seedbed` binary wires the real ones. */
export interface RunOptions {
    readonly prompter: Prompter;
    readonly createRunner: (options: CommandRunnerOptions) => CommandRunner;
    readonly createHostingApi: (token: string, observer: ScaffoldObserverFn) => HostingApi;
    readonly encryptor: SecretEncryptor;
    /** Base for a relative project path (default: `process.cwd()`) */
    readonly cwd?: string;
    /** Observer for a run with the given silence (default: stderr trace, or nothing) */
    readonly createObserver?: (silent: boolean) => ScaffoldObserverFn;
    readonly setupParser?: ParserSetup;
}

function defaultObserver(silent: boolean): ScaffoldObserverFn {
    return silent ? SILENT_OBSERVER : createScaffoldObserver();
}

// ── Run ──────────────────────────────────────────────────

/**
 * Execute one run for `argv` (user arguments only).
 *
 * @returns the process exit code
 */
export async function run(argv: readonly string[], options: RunOptions): Promise<ExitCode> {
    const { prompter } = options;
    const cwd = options.cwd ?? process.cwd();

    const gitUser = detectGitUser(options.createRunner({ observer: SILENT_OBSERVER, silent: true }));
    const registry = createRegistry({ gitUser });

    const { mode, silent, configuration } = await resolveConfiguration(argv, registry, prompter, {
        setupParser: options.setupParser,
    });
    const config = toProjectConfig(configuration);

    const observer = (options.createObserver ?? defaultObserver)(silent);
    const runner = options.createRunner({ observer, silent });
    const root = resolve(cwd, config.project);
    const existedBefore = existsSync(root);
    let created = false;

    try {
        materialize(config, { cwd, observer });
        createProject(config, { runner, observer, cwd });
        created = true;

        if (mode === 'non-interactive' || config.barebones || !config.github) return 0;

        const wanted = await promptYesNo(prompter, 'create and configure github repository for project', true);
        if (!wanted) return 0;

        await setupGitHub(config, {
            prompter,
            runner,
            observer,
            cwd,
            encryptor: options.encryptor,
            createHostingApi: token => options.createHostingApi(token, observer),
        });
        return 0;
    } catch (err) {
        if (!(err instanceof CollaboratorError) && !isFileSystemError(err)) throw err;
        prompter.error(err.message);

        if (created) return 2;

        if (mode === 'interactive' && !existedBefore && existsSync(root)) {
            const clean = await promptYesNo(prompter, `clean project folder '${config.project}'`, true);
            if (clean) removeProject(root, prompter, observer);
        }
        return 1;
    }
}

function removeProject(root: string, prompter: Prompter, observer: ScaffoldObserverFn): void {
    try {
        rmSync(root, { recursive: true, force: true });
        observer({ type: 'info', message: `removed ${root}` });
    } catch (err) {
        if (!isFileSystemError(err)) throw err;
        prompter.error(err.message);
    }
}

/**
 * CommandRunner — the process execution seam.
 *
 * The production runner uses `spawnSync`, so every command runs to
 * completion before the next one starts. Output is inherited by the
 * terminal unless the run is silent or the caller captures it; a
 * silent run replays the captured output when the command fails.
 *
 * @module
 */
import { spawnSync, type StdioOptions } from 'node:child_process';
import { CollaboratorError } from '../errors.js';
import type { ScaffoldObserverFn } from '../observability/ScaffoldObserver.js';

// ── Types ────────────────────────────────────────────────

export interface RunCommandOptions {
    readonly cwd?: string;
    /** Added to the inherited environment */
    readonly env?: Readonly<Record<string, string>>;
    /** Written to the command's stdin */
    readonly input?: string;
    /** Throw on a non-zero exit status (default: true) */
    readonly check?: boolean;
    /** Capture stdout/stderr instead of showing them */
    readonly capture?: boolean;
}

export interface CommandResult {
    readonly status: number | null;
    readonly stdout: string;
    readonly stderr: string;
}

export interface CommandRunner {
    /**
     * Run `argv` and wait for it.
     *
     * @throws CollaboratorError when the command cannot be started, or
     *   exits non-zero and `check` is not `false`
     */
    run(argv: readonly string[], options?: RunCommandOptions): CommandResult;
}

export interface CommandRunnerOptions {
    readonly observer: ScaffoldObserverFn;
    /** Hide command output unless the command fails */
    readonly silent: boolean;
}

// ── Production runner ────────────────────────────────────

export function createCommandRunner(options: CommandRunnerOptions): CommandRunner {
    const { observer, silent } = options;

    return {
        run(argv, runOptions = {}) {
            const [command, ...args] = argv;
            if (command === undefined) {
                throw new CollaboratorError('command', 'cannot run an empty command line');
            }

            const { cwd, env, input, check = true, capture = false } = runOptions;
            observer({ type: 'run', argv, ...(cwd !== undefined ? { cwd } : {}) });

            const hideOutput = silent || capture;
            const stdio: StdioOptions = [
                input !== undefined ? 'pipe' : 'inherit',
                hideOutput ? 'pipe' : 'inherit',
                hideOutput ? 'pipe' : 'inherit',
            ];

            const spawned = spawnSync(command, args, {
                encoding: 'utf-8',
                stdio,
                ...(cwd !== undefined ? { cwd } : {}),
                ...(env !== undefined ? { env: { ...process.env, ...env } } : {}),
                ...(input !== undefined ? { input } : {}),
            });

            const result: CommandResult = {
                status: spawned.status,
                stdout: spawned.stdout ?? '',
                stderr: spawned.stderr ?? '',
            };

            if (spawned.error !== undefined) {
                throw new CollaboratorError('command', `cannot run '${command}': ${spawned.error.message}`, {
                    cause: spawned.error,
                    command: result,
                });
            }

            if (check && result.status !== 0) {
                if (silent && !capture) {
                    process.stderr.write(result.stdout + result.stderr);
                }
                throw new CollaboratorError(
                    'command',
                    `'${argv.join(' ')}' failed with exit status ${String(result.status)}`,
                    { command: result },
                );
            }

            return result;
        },
    };
}

/**
 * ScaffoldObserver — Typed Side-Effect Tracing
 *
 * Every filesystem change, spawned command and API call the tool
 * makes is announced as a typed event. The observer is threaded
 * explicitly through the materializer, the command runner, the
 * hosting API client and the orchestrator; there is no global
 * verbosity switch.
 *
 * @example
 * ```typescript
 * import { createScaffoldObserver, SILENT_OBSERVER } from 'seedbed';
 *
 * const trace = createScaffoldObserver();            // `+ WRITE ...` lines on stderr
 * const quiet = SILENT_OBSERVER;                      // --silent
 *
 * const events: ScaffoldEvent[] = [];
 * materialize(config, { observer: (event) => events.push(event) });
 * ```
 *
 * @module
 */
import pc from 'picocolors';

// ============================================================================
// Events
// ============================================================================

/** A directory was created. */
export interface MkdirEvent {
    readonly type: 'mkdir';
    readonly path: string;
}

/** A file was created with content. */
export interface WriteEvent {
    readonly type: 'write';
    readonly path: string;
}

/** An empty file was created. */
export interface TouchEvent {
    readonly type: 'touch';
    readonly path: string;
}

/** A symbolic link was created. */
export interface SymlinkEvent {
    readonly type: 'symlink';
    readonly path: string;
    /** Link target, relative to the link's directory */
    readonly target: string;
}

/** A file was made executable. */
export interface ChmodEvent {
    readonly type: 'chmod';
    readonly path: string;
    readonly mode: number;
}

/** An existing file was modified in place. */
export interface UpdateEvent {
    readonly type: 'update';
    readonly path: string;
}

/** An external command is about to run. */
export interface RunEvent {
    readonly type: 'run';
    readonly argv: readonly string[];
    readonly cwd?: string;
}

/** A hosting API endpoint is about to be called. */
export interface CallEvent {
    readonly type: 'call';
    readonly method: string;
    readonly endpoint: string;
}

/** Free-form progress message. */
export interface InfoEvent {
    readonly type: 'info';
    readonly message: string;
}

/**
 * Everything the tool does outside its own memory, one variant per
 * kind of side effect. `type` is the discriminant.
 */
export type ScaffoldEvent =
    | MkdirEvent
    | WriteEvent
    | TouchEvent
    | SymlinkEvent
    | ChmodEvent
    | UpdateEvent
    | RunEvent
    | CallEvent
    | InfoEvent;

/** Called once per side effect, before it happens. */
export type ScaffoldObserverFn = (event: ScaffoldEvent) => void;

/** Observer that drops every event. Selected by `--silent`. */
export const SILENT_OBSERVER: ScaffoldObserverFn = () => undefined;

// ============================================================================
// Formatting
// ============================================================================

const SAFE_ARG = /^[\w@%+=:,./-]+$/;

/**
 * Quote one argument the way a POSIX shell would need it.
 * @internal exported for testing
 */
export function shellQuote(arg: string): string {
    if (arg === '') return `''`;
    if (SAFE_ARG.test(arg)) return arg;
    return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Render one event as a single trace line (without newline).
 * @internal exported for testing
 */
export function formatScaffoldEvent(event: ScaffoldEvent): string {
    switch (event.type) {
        case 'mkdir':
            return `+ MKDIR ${event.path}`;
        case 'write':
            return `+ WRITE ${event.path}`;
        case 'touch':
            return `+ TOUCH ${event.path}`;
        case 'symlink':
            return `+ SYMLINK ${event.path} -> ${event.target}`;
        case 'chmod':
            return `+ CHMOD+x ${event.path}`;
        case 'update':
            return `+ UPDATE ${event.path}`;
        case 'run':
            return `+ RUN ${event.argv.map(shellQuote).join(' ')}`;
        case 'call':
            return `+ CALL ${event.method} ${event.endpoint}`;
        case 'info':
            return event.message;
    }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Observer for a non-silent run.
 *
 * Returns `handler` unchanged when given. Otherwise every event becomes
 * one stderr line, dimmed except for `info` messages:
 *
 * ```
 * + MKDIR /work/demo
 * + WRITE /work/demo/pyproject.toml
 * + RUN git init -b master
 * ```
 */
export function createScaffoldObserver(handler?: ScaffoldObserverFn): ScaffoldObserverFn {
    if (handler) return handler;

    return (event: ScaffoldEvent): void => {
        const line = formatScaffoldEvent(event);
        process.stderr.write(`${event.type === 'info' ? line : pc.dim(line)}\n`);
    };
}

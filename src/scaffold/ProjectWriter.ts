/**
 * ProjectWriter — create-only filesystem operations under one root.
 *
 * Every write uses exclusive-create (`wx`): an existing file is an
 * `EEXIST` error, never an overwrite. Each operation is reported to
 * the observer before it happens.
 *
 * @module
 */
import { chmodSync, mkdirSync, symlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { ScaffoldObserverFn } from '../observability/ScaffoldObserver.js';

/** rwxr-xr-x */
export const EXECUTABLE_MODE = 0o755;

/** Strip trailing whitespace and end with exactly one newline. */
export function normalizeText(text: string): string {
    return `${text.trimEnd()}\n`;
}

export class ProjectWriter {
    readonly root: string;
    private readonly observer: ScaffoldObserverFn;

    constructor(root: string, observer: ScaffoldObserverFn) {
        this.root = root;
        this.observer = observer;
    }

    /** Absolute path of `relative` under the root. */
    resolve(relative: string): string {
        return join(this.root, relative);
    }

    /**
     * Create the root directory. Missing parents are created; the root
     * itself must not exist yet.
     */
    createRoot(): void {
        mkdirSync(dirname(this.root), { recursive: true });
        this.observer({ type: 'mkdir', path: this.root });
        mkdirSync(this.root);
    }

    mkdir(relative: string): void {
        const path = this.resolve(relative);
        this.observer({ type: 'mkdir', path });
        mkdirSync(path, { recursive: true });
    }

    write(relative: string, text: string): void {
        const path = this.resolve(relative);
        this.observer({ type: 'write', path });
        writeFileSync(path, normalizeText(text), { encoding: 'utf-8', flag: 'wx' });
    }

    touch(relative: string): void {
        const path = this.resolve(relative);
        this.observer({ type: 'touch', path });
        writeFileSync(path, '', { flag: 'wx' });
    }

    /** Create `relative` as a link pointing at `target` (relative to the link's directory). */
    symlink(relative: string, target: string): void {
        const path = this.resolve(relative);
        this.observer({ type: 'symlink', path, target });
        symlinkSync(target, path);
    }

    chmod(relative: string, mode: number): void {
        const path = this.resolve(relative);
        this.observer({ type: 'chmod', path, mode });
        chmodSync(path, mode);
    }
}

/**
 * Terminal prompter backed by `@clack/prompts`.
 *
 * @module
 */
import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Prompter } from './Prompter.js';

function answerOrExit(value: string | symbol): string {
    if (p.isCancel(value)) {
        p.cancel('Operation cancelled.');
        process.exit(1);
    }
    return typeof value === 'string' ? value : '';
}

/** Create the interactive prompter used by the `seedbed` binary. */
export function createClackPrompter(): Prompter {
    return {
        async ask(message) {
            return answerOrExit(await p.text({ message }));
        },
        async askSecret(message) {
            return answerOrExit(await p.password({ message }));
        },
        error(message) {
            process.stderr.write(`${pc.red(message)}\n`);
        },
    };
}

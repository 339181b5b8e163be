/**
 * Prompter — the terminal input seam.
 *
 * The core only needs three primitives: ask for a line, ask for a
 * hidden line, and print a diagnostic. The validate/re-prompt loops
 * below are built on top of them so that every key prompts the same
 * way regardless of the terminal library behind it.
 *
 * @module
 */
import type { Validator } from '../config/validators.js';

// ── Types ────────────────────────────────────────────────

/**
 * Raw terminal input.
 *
 * Implementations terminate the process (exit code 1) when the user
 * interrupts a prompt; callers never see a cancelled answer.
 */
export interface Prompter {
    /** Ask for one line of input. Returns the raw answer. */
    ask(message: string): Promise<string>;
    /** Ask for one line of hidden input (tokens). */
    askSecret(message: string): Promise<string>;
    /** Print one diagnostic line to the error stream. */
    error(message: string): void;
}

export interface InputOptions {
    readonly defaultValue?: string | undefined;
    readonly validator?: Validator | undefined;
}

// ── Loops ────────────────────────────────────────────────

/**
 * Ask until the answer passes `validator`.
 *
 * An empty answer takes the default (when there is one); the answer
 * is trimmed before validation.
 */
export async function promptInput(
    prompter: Prompter,
    description: string,
    options: InputOptions = {},
): Promise<string> {
    const { defaultValue, validator } = options;
    const message = defaultValue !== undefined
        ? `${description} [default: '${defaultValue}']`
        : description;

    for (;;) {
        let answer = await prompter.ask(message);
        if (answer === '' && defaultValue !== undefined) answer = defaultValue;
        answer = answer.trim();

        const error = validator?.(answer);
        if (error === undefined) return answer;
        prompter.error(`error: ${error}`);
    }
}

const YES_NO = /^(y|yes|n|no)$/i;

const validateYesNo: Validator = (value) =>
    YES_NO.test(value) ? undefined : 'enter [y]es/[n]o';

/** Ask a yes/no question until the answer is one of y, yes, n, no. */
export async function promptYesNo(
    prompter: Prompter,
    description: string,
    defaultValue?: boolean,
): Promise<boolean> {
    const answer = await promptInput(prompter, `${description} ([y]es/[n]o)`, {
        defaultValue: defaultValue === undefined ? undefined : defaultValue ? 'yes' : 'no',
        validator: validateYesNo,
    });
    return answer.toLowerCase().startsWith('y');
}

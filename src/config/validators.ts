/**
 * Validators — raw string in, error message (or `undefined`) out.
 *
 * Validators never throw for malformed input; the message they
 * return is shown verbatim both by the prompt loop and by the
 * command-line parser.
 *
 * @module
 */

/** A validation result: `undefined` when valid, otherwise the message. */
export type Validator = (value: string) => string | undefined;

/** Lowest python3 minor version a generated project may support. */
export const MIN_PYTHON_MINOR_VERSION = 9;

const PYTHON_VERSION = /^3(\.[0-9]+){1,2}$/;
const URL_SCHEME = /^([a-z][a-z0-9+.-]*):\/\/([^/?#]*)/i;

export const validateNonEmpty: Validator = (value) =>
    value === '' ? 'cannot be empty' : undefined;

export const validatePythonVersion: Validator = (value) => {
    if (!PYTHON_VERSION.test(value)) return 'not a valid python3 version';
    const minor = Number(value.split('.')[1]);
    if (minor < MIN_PYTHON_MINOR_VERSION) {
        return `can only create projects supporting python 3.${MIN_PYTHON_MINOR_VERSION}+`;
    }
    return undefined;
};

export const validateUrl: Validator = (value) => {
    const match = URL_SCHEME.exec(value);
    const scheme = match?.[1]?.toLowerCase();
    const netloc = match?.[2] ?? '';
    if ((scheme !== 'http' && scheme !== 'https') || netloc === '') {
        return "url must start with 'http[s]://'";
    }
    return undefined;
};

/** Accept the empty string, otherwise delegate to `validator`. */
export function optional(validator: Validator): Validator {
    return (value) => (value === '' ? undefined : validator(value));
}

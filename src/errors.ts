/**
 * Error Types
 *
 * Two kinds of failure leave the core as exceptions:
 *
 * - {@link AuthoringDefectError} — a bug in the key registry or the
 *   template data. Never caught; the run crashes.
 * - {@link CollaboratorError} — a command, the hosting API or the
 *   secret encryptor failed. The orchestrator maps it to an exit code.
 *
 * Validation failures are not exceptions: validators return the
 * message as data (see `config/validators.ts`).
 *
 * @module
 */

// ============================================================================
// Authoring Defect
// ============================================================================

/**
 * Raised when the registry or template data is inconsistent
 * (unsupported boolean default, missing or extra placeholder,
 * a resolved configuration missing a required key).
 */
export class AuthoringDefectError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AuthoringDefectError';
    }
}

// ============================================================================
// Collaborator Failure
// ============================================================================

/** Which external collaborator failed. */
export type CollaboratorKind = 'command' | 'hosting-api' | 'encryption';

/** Extra detail carried by a failed command. */
export interface CommandFailure {
    /** Exit status, `null` when the process was killed or never started */
    readonly status: number | null;
    readonly stdout: string;
    readonly stderr: string;
}

/**
 * Structured failure of an external collaborator.
 *
 * `cause` holds the underlying error (spawn error, HTTP error,
 * zod issue list); `command` is set only for `collaborator: 'command'`.
 */
export class CollaboratorError extends Error {
    readonly collaborator: CollaboratorKind;
    readonly command?: CommandFailure | undefined;

    constructor(
        collaborator: CollaboratorKind,
        message: string,
        options?: { cause?: unknown; command?: CommandFailure | undefined },
    ) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'CollaboratorError';
        this.collaborator = collaborator;
        this.command = options?.command;
    }
}

/**
 * Whether `err` is a Node filesystem error (`EEXIST`, `EACCES`, ...).
 * @internal
 */
export function isFileSystemError(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error
        && 'code' in err
        && typeof err.code === 'string'
        && 'syscall' in err;
}

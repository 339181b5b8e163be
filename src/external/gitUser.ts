import { CollaboratorError } from '../errors.js';
import type { CommandRunner } from './CommandRunner.js';

/**
 * `Name <email>` from the git configuration, or `undefined` when
 * either value is unset or git cannot be run.
 */
export function detectGitUser(runner: CommandRunner): string | undefined {
    const values: string[] = [];
    for (const key of ['user.name', 'user.email']) {
        let value: string;
        try {
            const result = runner.run(['git', 'config', key], { capture: true, check: false });
            if (result.status !== 0) return undefined;
            value = result.stdout.trim();
        } catch (err) {
            if (err instanceof CollaboratorError) return undefined;
            throw err;
        }
        if (value === '') return undefined;
        values.push(value);
    }
    const [name, email] = values;
    return `${name} <${email}>`;
}

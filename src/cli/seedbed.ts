#!/usr/bin/env node
/**
 * seedbed — Python project scaffolding CLI
 *
 * Usage:
 *   seedbed                         configure everything interactively
 *   seedbed --path my-lib --desc …  non-interactive, one flag per key
 *   seedbed -i --path my-lib        seed prompts from flags
 *
 * Run `seedbed --help` for the full list of flags.
 *
 * @module
 */
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { detectAcquisitionMode } from '../config/resolver.js';
import { createCommandRunner } from '../external/CommandRunner.js';
import { createGitHubApi } from '../external/GitHubApi.js';
import { createSecretEncryptor } from '../external/SecretEncryptor.js';
import { createClackPrompter } from '../prompt/ClackPrompter.js';
import { run } from './run.js';

// ── Entrypoint ───────────────────────────────────────────

async function main(): Promise<void> {
    const argv = process.argv.slice(2);
    const interactive = detectAcquisitionMode(argv) === 'interactive';

    if (interactive) p.intro(pc.bgGreen(pc.black(' seedbed ')));

    const code = await run(argv, {
        prompter: createClackPrompter(),
        createRunner: createCommandRunner,
        createHostingApi: createGitHubApi,
        encryptor: createSecretEncryptor(),
    });

    if (interactive && code === 0) {
        p.outro(`${pc.green('Done!')} Your project is ready.`);
    }
    process.exit(code);
}

// ── Run ──────────────────────────────────────────────────

main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
});

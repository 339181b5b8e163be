/**
 * GitHub setup — create the remote repository, point the project at
 * it, push, and configure branch/tag protection, workflow permissions
 * and the Actions secrets the generated workflows expect.
 *
 * Interactive only: tokens are read from hidden prompts, never from
 * the command line.
 *
 * @module
 */
import { readFileSync, writeFileSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import type { FullProjectConfig } from '../config/projectConfig.js';
import type { CommandRunner } from '../external/CommandRunner.js';
import {
    type ActionsPublicKey,
    ActionsPublicKeySchema,
    type CreatedRepository,
    CreatedRepositorySchema,
    type HostingApi,
    parseResponse,
} from '../external/GitHubApi.js';
import type { SecretEncryptor } from '../external/SecretEncryptor.js';
import type { ScaffoldObserverFn } from '../observability/ScaffoldObserver.js';
import { type Prompter, promptYesNo } from '../prompt/Prompter.js';

// ── Types ────────────────────────────────────────────────

export interface SetupGitHubOptions {
    readonly prompter: Prompter;
    readonly runner: CommandRunner;
    readonly observer: ScaffoldObserverFn;
    /** Build an authenticated client for the entered token */
    readonly createHostingApi: (token: string) => HostingApi;
    readonly encryptor: SecretEncryptor;
    /** Base for a relative project path (default: `process.cwd()`) */
    readonly cwd?: string;
}

/** Repository coordinates used by the follow-up calls. */
export interface Repository {
    readonly owner: string;
    readonly name: string;
}

const DEFAULT_BRANCH = 'master';

// ── Public API ───────────────────────────────────────────

/**
 * Create and configure the GitHub repository for a created project.
 *
 * @throws CollaboratorError on any command, API or encryption failure
 */
export async function setupGitHub(config: FullProjectConfig, options: SetupGitHubOptions): Promise<void> {
    const { prompter, runner, observer, encryptor } = options;
    const root = resolve(options.cwd ?? process.cwd(), config.project);
    const name = basename(root);

    const token = await prompter.askSecret(
        "enter personal access token for github api (with 'administration:write' and 'secrets:write' permissions)",
    );
    const api = options.createHostingApi(token);
    const useSsh = await promptYesNo(prompter, 'use ssh for connecting to github (instead of https)', true);

    // ── 1. Create repository ─────────────────────────────

    const created: CreatedRepository = parseResponse(
        CreatedRepositorySchema,
        await api.call('user/repos', 'POST', {
            name,
            description: config.description,
            homepage: config.url,
        }),
        'repository creation',
    );
    const repo: Repository = { owner: created.owner.login, name };
    const repoUrl = created.html_url;
    const origin = useSsh ? created.ssh_url : repoUrl;

    // ── 2. Link and push ─────────────────────────────────

    const run = (argv: string[]): void => {
        runner.run(argv, { cwd: root });
    };

    updateFirst(join(root, 'pyproject.toml'), /# repository = .*/, `repository = "${repoUrl}"`, observer);
    run(['poetry', 'lock', '--no-update']);
    updateFirst(join(root, 'mkdocs.yml'), /# repo_url: .*/, `repo_url: "${repoUrl}"`, observer);

    run(['git', 'add', 'pyproject.toml', 'mkdocs.yml']);
    run(['git', 'commit', '--amend', '--no-edit']);
    run(['git', 'remote', 'add', 'origin', origin]);
    run(['git', 'push', '-u', 'origin', DEFAULT_BRANCH]);

    // ── 3. Policies ──────────────────────────────────────

    const base = `repos/${repo.owner}/${repo.name}`;
    await api.call(`${base}/branches/${DEFAULT_BRANCH}/protection`, 'PUT', {
        required_status_checks: null,
        enforce_admins: null,
        required_pull_request_reviews: null,
        restrictions: null,
        required_linear_history: true,
    });
    await api.call(`${base}/branches/${DEFAULT_BRANCH}/protection/required_pull_request_reviews`, 'PATCH', {
        required_approving_review_count: 0,
    });
    await api.call(`${base}/tags/protection`, 'POST', { pattern: 'v*' });
    await api.call(`${base}/actions/permissions/workflow`, 'PUT', {
        default_workflow_permissions: 'read',
        can_approve_pull_request_reviews: true,
    });

    // ── 4. Secrets ───────────────────────────────────────

    const releaseToken = await prompter.askSecret(
        "create a personal access token with 'contents:write' and 'pull_requests:write' permissions "
        + "for this project's repo (https://github.com/settings/personal-access-tokens/new) "
        + `(${repo.owner}/${repo.name}), and enter it here (or leave empty to skip this step)`,
    );
    if (releaseToken !== '') {
        await uploadActionsSecret(api, encryptor, repo, 'REPO_PAT', releaseToken);
    }

    const pypiToken = await prompter.askSecret(
        'enter token for uploading releases to pypi (or leave empty to skip this step)',
    );
    if (pypiToken !== '') {
        await uploadActionsSecret(api, encryptor, repo, 'PYPI_TOKEN', pypiToken);
    }

    observer({ type: 'info', message: 'successfully configured github for project' });
}

// ── Helpers ──────────────────────────────────────────────

/**
 * Encrypt `secret` with the repository's Actions public key and store it.
 * @internal exported for testing
 */
export async function uploadActionsSecret(
    api: HostingApi,
    encryptor: SecretEncryptor,
    repo: Repository,
    secretName: string,
    secret: string,
): Promise<void> {
    const base = `repos/${repo.owner}/${repo.name}/actions/secrets`;
    const publicKey: ActionsPublicKey = parseResponse(ActionsPublicKeySchema, await api.call(`${base}/public-key`), 'actions public key');
    await api.call(`${base}/${secretName}`, 'PUT', {
        encrypted_value: encryptor.encrypt(publicKey.key, secret),
        key_id: publicKey.key_id,
    });
}

/** Replace the first match of `pattern` in the file at `path`. */
function updateFirst(path: string, pattern: RegExp, replacement: string, observer: ScaffoldObserverFn): void {
    observer({ type: 'update', path });
    const text = readFileSync(path, 'utf-8');
    writeFileSync(path, text.replace(pattern, () => replacement), 'utf-8');
}

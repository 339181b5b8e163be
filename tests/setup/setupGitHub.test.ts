import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { setupGitHub, uploadActionsSecret, type SetupGitHubOptions } from '../../src/setup/setupGitHub.js';
import { CollaboratorError } from '../../src/errors.js';
import type { SecretEncryptor } from '../../src/external/SecretEncryptor.js';
import type { ScaffoldEvent } from '../../src/observability/ScaffoldObserver.js';
import {
    catchAsyncError,
    fullConfig,
    RecordingHostingApi,
    RecordingRunner,
    ScriptedPrompter,
    tempDir,
} from '../helpers.js';

const CREATED = {
    owner: { login: 'ada' },
    html_url: 'https://github.com/ada/demo',
    ssh_url: 'git@github.com:ada/demo.git',
};

const PUBLIC_KEY = { key_id: 'kid-1', key: 'test-public-key' };

const fakeEncryptor: SecretEncryptor = {
    encrypt: (key, plaintext) => `sealed(${key}:${plaintext})`,
};

let cwd: string;
let root: string;

beforeEach(() => {
    cwd = tempDir();
    root = join(cwd, 'demo');
    mkdirSync(root);
    writeFileSync(join(root, 'pyproject.toml'), 'name = "demo"\n# repository = ""\nlicense = "MIT"\n');
    writeFileSync(join(root, 'mkdocs.yml'), 'site_name: "demo"\n# repo_url: ""\n');
});

afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
});

interface Harness {
    readonly prompter: ScriptedPrompter;
    readonly runner: RecordingRunner;
    readonly api: RecordingHostingApi;
    readonly events: ScaffoldEvent[];
    readonly tokens: string[];
    readonly options: SetupGitHubOptions;
}

function harness(answers: string[], secrets: string[], runner = new RecordingRunner()): Harness {
    const prompter = new ScriptedPrompter(answers, secrets);
    const api = new RecordingHostingApi({
        'POST user/repos': CREATED,
        'GET repos/ada/demo/actions/secrets/public-key': PUBLIC_KEY,
    });
    const events: ScaffoldEvent[] = [];
    const tokens: string[] = [];
    return {
        prompter,
        runner,
        api,
        events,
        tokens,
        options: {
            prompter,
            runner,
            observer: e => events.push(e),
            createHostingApi: (token) => {
                tokens.push(token);
                return api;
            },
            encryptor: fakeEncryptor,
            cwd,
        },
    };
}

describe('setupGitHub', () => {
    it('creates, links, pushes and configures the repository', async () => {
        const h = harness([''], ['test-token', 'test-secret', 'test-pypi-token']);

        await setupGitHub(fullConfig(), h.options);

        expect(h.tokens).toEqual(['test-token']);
        expect(h.api.calls.map(c => `${c.method} ${c.endpoint}`)).toEqual([
            'POST user/repos',
            'PUT repos/ada/demo/branches/master/protection',
            'PATCH repos/ada/demo/branches/master/protection/required_pull_request_reviews',
            'POST repos/ada/demo/tags/protection',
            'PUT repos/ada/demo/actions/permissions/workflow',
            'GET repos/ada/demo/actions/secrets/public-key',
            'PUT repos/ada/demo/actions/secrets/REPO_PAT',
            'GET repos/ada/demo/actions/secrets/public-key',
            'PUT repos/ada/demo/actions/secrets/PYPI_TOKEN',
        ]);
        expect(h.api.calls[0]?.data).toEqual({
            name: 'demo',
            description: 'A demo project',
            homepage: 'https://example.com/demo',
        });
        expect(h.api.calls[3]?.data).toEqual({ pattern: 'v*' });
        expect(h.prompter.remaining).toBe(0);
        expect(h.events.at(-1)).toEqual({ type: 'info', message: 'successfully configured github for project' });
    });

    it('records the repository url in the manifests', async () => {
        const h = harness([''], ['test-token', '', '']);

        await setupGitHub(fullConfig(), h.options);

        expect(readFileSync(join(root, 'pyproject.toml'), 'utf-8'))
            .toBe('name = "demo"\nrepository = "https://github.com/ada/demo"\nlicense = "MIT"\n');
        expect(readFileSync(join(root, 'mkdocs.yml'), 'utf-8'))
            .toBe('site_name: "demo"\nrepo_url: "https://github.com/ada/demo"\n');
        expect(h.events.filter(e => e.type === 'update')).toEqual([
            { type: 'update', path: join(root, 'pyproject.toml') },
            { type: 'update', path: join(root, 'mkdocs.yml') },
        ]);
    });

    it('amends the initial commit and pushes over ssh', async () => {
        const h = harness([''], ['test-token', '', '']);

        await setupGitHub(fullConfig(), h.options);

        expect(h.runner.lines).toEqual([
            'poetry lock --no-update',
            'git add pyproject.toml mkdocs.yml',
            'git commit --amend --no-edit',
            'git remote add origin git@github.com:ada/demo.git',
            'git push -u origin master',
        ]);
        expect(h.runner.commands.every(c => c.options.cwd === root)).toBe(true);
    });

    it('pushes over https when ssh is declined', async () => {
        const h = harness(['no'], ['test-token', '', '']);

        await setupGitHub(fullConfig(), h.options);

        expect(h.runner.lines).toContain('git remote add origin https://github.com/ada/demo');
    });

    it('skips secrets left empty', async () => {
        const h = harness([''], ['test-token', '', '']);

        await setupGitHub(fullConfig(), h.options);

        expect(h.api.calls.some(c => c.endpoint.includes('actions/secrets'))).toBe(false);
    });

    it('fails on an unexpected repository response', async () => {
        const h = harness([''], ['test-token']);
        const broken = new RecordingHostingApi({ 'POST user/repos': { message: 'Bad credentials' } });

        const err = await catchAsyncError(() => setupGitHub(fullConfig(), {
            ...h.options,
            createHostingApi: () => broken,
        }));

        expect(err).toBeInstanceOf(CollaboratorError);
        expect(h.runner.commands).toEqual([]);
    });

    it('stops when the push fails', async () => {
        const runner = new RecordingRunner({ fail: argv => argv[1] === 'push' });
        const h = harness([''], ['test-token'], runner);

        const err = await catchAsyncError(() => setupGitHub(fullConfig(), h.options));

        expect(err).toBeInstanceOf(CollaboratorError);
        expect(h.api.calls.map(c => c.endpoint)).toEqual(['user/repos']);
    });
});

describe('uploadActionsSecret', () => {
    it('encrypts with the repository key and sends the key id', async () => {
        const api = new RecordingHostingApi({ 'GET repos/ada/demo/actions/secrets/public-key': PUBLIC_KEY });

        await uploadActionsSecret(api, fakeEncryptor, { owner: 'ada', name: 'demo' }, 'REPO_PAT', 'test-secret');

        expect(api.calls).toEqual([
            { endpoint: 'repos/ada/demo/actions/secrets/public-key', method: 'GET', data: undefined },
            {
                endpoint: 'repos/ada/demo/actions/secrets/REPO_PAT',
                method: 'PUT',
                data: { encrypted_value: 'sealed(test-public-key:test-secret)', key_id: 'kid-1' },
            },
        ]);
    });
});

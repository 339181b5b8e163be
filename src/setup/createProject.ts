/**
 * Project creation — turn the materialized skeleton into a working
 * repository: git init, dependency installation with poetry, hook
 * installation, docs build and the initial commit.
 *
 * @module
 */
import { resolve } from 'node:path';
import type { ProjectConfig } from '../config/projectConfig.js';
import type { CommandRunner } from '../external/CommandRunner.js';
import type { ScaffoldObserverFn } from '../observability/ScaffoldObserver.js';

export interface CreateProjectOptions {
    readonly runner: CommandRunner;
    readonly observer: ScaffoldObserverFn;
    /** Base for a relative project path (default: `process.cwd()`) */
    readonly cwd?: string;
}

const DEV_DEPENDENCIES = ['pre-commit', 'ruff', 'mypy'];
const DOCS_DEV_DEPENDENCIES = ['sphinx', 'git+https://github.com/liran-funaro/sphinx-markdown-builder'];
const SITE_DEPENDENCIES = [
    'mkdocstrings[python-legacy]',
    'mkdocs-material',
    'mkdocs-gen-files',
    'mkdocs-literate-nav',
    'git+https://github.com/jimporter/mike',
];
const PRETTIER_FILES = ['pyproject.toml', 'mkdocs.yml', 'LICENSE.md', 'README.md'];

/** `"a; b ;;c"` → `["a", "b", "c"]` */
export function splitDependencies(raw: string): string[] {
    return raw.split(';').map(dep => dep.trim()).filter(dep => dep !== '');
}

/**
 * Run the project setup commands inside the project directory.
 *
 * @throws CollaboratorError when any required command fails
 */
export function createProject(config: ProjectConfig, options: CreateProjectOptions): void {
    const { runner, observer } = options;
    const cwd = resolve(options.cwd ?? process.cwd(), config.project);
    const run = (argv: string[], extra: { check?: boolean; env?: Record<string, string> } = {}): void => {
        runner.run(argv, { cwd, ...extra });
    };

    run(['git', 'init', '-b', 'master']);
    run(['poetry', 'install', '--all-extras']);

    const devDependencies = [
        ...DEV_DEPENDENCIES,
        ...(config.barebones ? [] : DOCS_DEV_DEPENDENCIES),
        ...splitDependencies(config.extraDevDeps),
    ];
    run(['poetry', 'add', '--group', 'dev', ...devDependencies]);

    if (!config.barebones) {
        run(['poetry', 'add', '--group', 'site', ...SITE_DEPENDENCIES]);
    }

    const dependencies = splitDependencies(config.extraDeps);
    if (dependencies.length > 0) {
        run(['poetry', 'add', ...dependencies]);
    }

    run(['poetry', 'run', 'pre-commit', 'install']);
    run(['poetry', 'run', 'pre-commit', 'autoupdate']);

    if (!config.barebones) {
        run(['poetry', 'run', 'pre-commit', 'run', 'prettier', '--files', ...PRETTIER_FILES], { check: false });
        run(['poetry', 'run', 'python', 'scripts/make_docs.py']);
        run(['poetry', 'run', 'mkdocs', 'build']);
    }

    run(['git', 'add', '.']);
    const message = config.barebones ? 'Initial commit' : 'chore: initial commit';
    run(['git', 'commit', '-m', message], { env: { SKIP: 'cspell' } });

    observer({ type: 'info', message: `successfully initialized project at ${cwd}` });
}

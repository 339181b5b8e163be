/**
 * Scaffold Engine — Project Directory Builder
 *
 * Receives a resolved `ProjectConfig`, builds the ordered list of
 * filesystem entries for its project mode, and applies them under a
 * freshly created root directory. Nothing is ever merged into an
 * existing tree: the root must not exist and every file is created
 * exclusively.
 *
 * @module
 */
import { basename, resolve } from 'node:path';
import type { BarebonesProjectConfig, FullProjectConfig, ProjectConfig } from '../config/projectConfig.js';
import { type ScaffoldObserverFn, SILENT_OBSERVER } from '../observability/ScaffoldObserver.js';
import { render } from '../templates/index.js';
import { type AuthorList, parseAuthors } from './authors.js';
import { EXECUTABLE_MODE, ProjectWriter } from './ProjectWriter.js';

// ── Types ────────────────────────────────────────────────

/** One filesystem entry, relative to the project root. */
export type ScaffoldEntry =
    | { readonly kind: 'dir'; readonly path: string }
    | { readonly kind: 'file'; readonly path: string; readonly content: string; readonly executable?: boolean }
    | { readonly kind: 'touch'; readonly path: string }
    | { readonly kind: 'symlink'; readonly path: string; readonly target: string };

export interface MaterializeOptions {
    /** Base for a relative project path (default: `process.cwd()`) */
    readonly cwd?: string;
    readonly observer?: ScaffoldObserverFn;
}

/** Shared derived values for one project. */
interface ProjectFacts {
    /** Final segment of the project path */
    readonly name: string;
    readonly authors: AuthorList;
    /** Minor number of the minimum python version */
    readonly minMinor: number;
}

const SCRIPTS_DIR = 'scripts';
const WORKFLOWS_DIR = '.github/workflows';
const MONTHLY_SCHEDULE = '  schedule:\n    - cron: "0 0 1 * *"\n';

// ── Public API ───────────────────────────────────────────

/**
 * Create the project skeleton on disk.
 *
 * Filesystem errors (`EEXIST` when the root already exists, `EACCES`,
 * ...) propagate unchanged; partial output is left for the caller
 * to clean up.
 */
export function materialize(config: ProjectConfig, options: MaterializeOptions = {}): void {
    const root = resolve(options.cwd ?? process.cwd(), config.project);
    const writer = new ProjectWriter(root, options.observer ?? SILENT_OBSERVER);

    writer.createRoot();

    const entries = buildEntryList(config, basename(root));
    for (const entry of entries) {
        switch (entry.kind) {
            case 'dir':
                writer.mkdir(entry.path);
                break;
            case 'file':
                writer.write(entry.path, entry.content);
                break;
            case 'touch':
                writer.touch(entry.path);
                break;
            case 'symlink':
                writer.symlink(entry.path, entry.target);
                break;
        }
    }

    for (const entry of entries) {
        if (entry.kind === 'file' && entry.executable === true) {
            writer.chmod(entry.path, EXECUTABLE_MODE);
        }
    }
}

/**
 * Ordered entries for `config`, relative to the project root.
 * @internal exported for testing
 */
export function buildEntryList(config: ProjectConfig, name: string): ScaffoldEntry[] {
    const facts: ProjectFacts = {
        name,
        authors: parseAuthors(config.authors),
        minMinor: minorOf(config.minPythonVersion),
    };
    return config.barebones ? barebonesEntries(config, facts) : fullEntries(config, facts);
}

// ── Template values ──────────────────────────────────────

function minorOf(version: string): number {
    return Number(version.split('.')[1]);
}

/**
 * `"3.9", "3.10", ...` for every minor from `minMinor` to `maxMinor`.
 * @internal exported for testing
 */
export function pythonVersionMatrix(minMinor: number, maxMinor: number): string {
    const versions: string[] = [];
    for (let minor = minMinor; minor <= maxMinor; minor++) {
        versions.push(`"3.${minor}"`);
    }
    return versions.join(', ');
}

function license(config: ProjectConfig, facts: ProjectFacts): string {
    return config.mitLicense ? render('LICENSE-MIT.md', { author: facts.authors.joinedNames }) : '';
}

function readme(config: ProjectConfig, facts: ProjectFacts): string {
    return render('README.md', { title: facts.name, description: config.description }).trim();
}

// ── Barebones mode ───────────────────────────────────────

function barebonesEntries(config: BarebonesProjectConfig, facts: ProjectFacts): ScaffoldEntry[] {
    const pyproject = render('pyproject-minimal.toml', {
        min_python_version: config.minPythonVersion,
        mypy_target_version: `py3${facts.minMinor}`,
    });

    return [
        { kind: 'file', path: 'pyproject.toml', content: pyproject },
        { kind: 'file', path: 'LICENSE.md', content: license(config, facts) },
        { kind: 'file', path: 'README.md', content: readme(config, facts) },
        { kind: 'file', path: '.cspell.json', content: render('cspell.json') },
        { kind: 'file', path: '.editorconfig', content: render('editorconfig') },
        { kind: 'file', path: '.gitignore', content: render('gitignore') },
        { kind: 'file', path: '.pre-commit-config.yaml', content: render('pre-commit-config-minimal.yaml') },
        { kind: 'dir', path: config.mainPackage },
        { kind: 'touch', path: `${config.mainPackage}/__init__.py` },
        { kind: 'touch', path: 'project-words.txt' },
    ];
}

// ── Full mode ────────────────────────────────────────────

function fullEntries(config: FullProjectConfig, facts: ProjectFacts): ScaffoldEntry[] {
    const entries: ScaffoldEntry[] = [];
    const nameDump = JSON.stringify(facts.name);
    const joinedNames = facts.authors.joinedNames;
    const pkgDir = `src/${config.mainPackage}`;

    // ── Manifests ────────────────────────────────────────
    entries.push({
        kind: 'file',
        path: 'pyproject.toml',
        content: render('pyproject.toml', {
            name_dump: nameDump,
            description_dump: JSON.stringify(config.description),
            authors_dump: `[${facts.authors.authors.map(a => JSON.stringify(a)).join(', ')}]`,
            license: config.mitLicense ? 'MIT' : '',
            package: config.mainPackage,
            min_python_version: config.minPythonVersion,
            mypy_target_version: `py3${facts.minMinor}`,
        }),
    });
    entries.push({
        kind: 'file',
        path: 'mkdocs.yml',
        content: render('mkdocs.yml', {
            name_dump: nameDump,
            site_url: config.url,
            description_dump: JSON.stringify(`Documentation for '${facts.name}'.`),
            author_dump: JSON.stringify(joinedNames),
            copyright_dump: JSON.stringify(`Copyright (c) ${joinedNames}`),
        }),
    });
    entries.push({ kind: 'file', path: 'LICENSE.md', content: license(config, facts) });

    // ── CI workflows ─────────────────────────────────────
    if (config.github) {
        entries.push({ kind: 'dir', path: WORKFLOWS_DIR });
        const workflow = (file: string, content: string): ScaffoldEntry =>
            ({ kind: 'file', path: `${WORKFLOWS_DIR}/${file}`, content });

        entries.push(
            workflow('check-pr.yml', render('workflows/check-pr.yml')),
            workflow('release-new-version.yml', render('workflows/release-new-version.yml')),
            workflow('create-github-release.yml', render('workflows/create-github-release.yml')),
            workflow('publish-to-pypi.yml', render('workflows/publish-to-pypi.yml')),
            workflow('deploy-project-site.yml', render('workflows/deploy-project-site.yml')),
            workflow('run-tests.yml', render('workflows/run-tests.yml', {
                python_versions: pythonVersionMatrix(facts.minMinor, minorOf(config.maxPythonVersion)),
            })),
            workflow('update-pre-commit-hooks.yml', render('workflows/update-pre-commit-hooks.yml', {
                schedule: config.scheduleHookUpdates ? MONTHLY_SCHEDULE : '',
            })),
        );
    }

    // ── Directories ──────────────────────────────────────
    for (const dir of [SCRIPTS_DIR, pkgDir, 'tests', 'www/src', 'www/theme/overrides']) {
        entries.push({ kind: 'dir', path: dir });
    }

    // ── Root config ──────────────────────────────────────
    entries.push(
        { kind: 'file', path: 'README.md', content: readme(config, facts) },
        { kind: 'file', path: '.commitlintrc.yaml', content: render('commitlintrc.yaml') },
        { kind: 'file', path: '.cspell.json', content: render('cspell.json') },
        { kind: 'file', path: '.editorconfig', content: render('editorconfig') },
        { kind: 'file', path: '.gitattributes', content: render('gitattributes') },
        { kind: 'file', path: '.gitignore', content: render('gitignore') },
        { kind: 'file', path: '.pre-commit-config.yaml', content: render('pre-commit-config.yaml') },
        { kind: 'file', path: '.prettierignore', content: render('prettierignore') },
        { kind: 'file', path: '.prettierrc.js', content: render('prettierrc.js') },
    );

    // ── Helper scripts ───────────────────────────────────
    const script = (file: string, content: string): ScaffoldEntry =>
        ({ kind: 'file', path: `${SCRIPTS_DIR}/${file}`, content, executable: true });

    entries.push(
        script('gen_site_usage_pages.py', render('scripts/gen_site_usage_pages.py')),
        script('make_docs.py', render('scripts/make_docs.py')),
    );
    if (config.github) {
        entries.push(
            script('trigger_release.py', render('scripts/trigger_release.py')),
            script('commit_and_tag_version.py', render('scripts/commit_and_tag_version.py')),
            script('verify_pr_commits.py', render('scripts/verify_pr_commits.py')),
        );
    } else {
        entries.push(script('release_new_version.py', render('scripts/release_new_version.py')));
    }

    // ── Package and site sources ─────────────────────────
    entries.push(
        { kind: 'file', path: `${pkgDir}/__init__.py`, content: render('init.py') },
        { kind: 'file', path: `${pkgDir}/_version.py`, content: render('version.py') },
        { kind: 'file', path: 'www/theme/overrides/main.html', content: render('theme-main.html') },
        { kind: 'touch', path: 'project-words.txt' },
        { kind: 'touch', path: 'CHANGELOG.md' },
    );
    if (config.pyTyped) {
        entries.push({ kind: 'touch', path: `${pkgDir}/py.typed` });
    }
    entries.push({ kind: 'touch', path: 'tests/__init__.py' });
    if (config.doctests) {
        entries.push({
            kind: 'file',
            path: 'tests/test_doctests.py',
            content: render('test_doctests.py', { main_pkg: config.mainPackage }),
        });
    }

    // ── Documentation links ──────────────────────────────
    entries.push(
        { kind: 'symlink', path: 'www/src/CHANGELOG.md', target: '../../CHANGELOG.md' },
        { kind: 'symlink', path: 'www/src/LICENSE.md', target: '../../LICENSE.md' },
        { kind: 'symlink', path: 'www/src/index.md', target: '../../README.md' },
    );

    return entries;
}

/**
 * Template bodies and placeholder substitution.
 *
 * Bodies live as plain files under `templates/` at the package root
 * (`<name>.tpl`). Placeholders are `{{name}}`: lower-case letters and
 * underscores, no spaces, so GitHub Actions expressions and Jinja
 * blocks (`${{ matrix.os }}`, `{{ super() }}`) pass through untouched.
 *
 * @module
 */
import { readFileSync } from 'node:fs';
import { AuthoringDefectError } from '../errors.js';

// ── Catalogue ────────────────────────────────────────────

/** Logical template names, relative to the templates directory. */
export type TemplateName =
    | 'pyproject.toml'
    | 'pyproject-minimal.toml'
    | 'mkdocs.yml'
    | 'LICENSE-MIT.md'
    | 'README.md'
    | 'commitlintrc.yaml'
    | 'cspell.json'
    | 'editorconfig'
    | 'gitattributes'
    | 'gitignore'
    | 'pre-commit-config.yaml'
    | 'pre-commit-config-minimal.yaml'
    | 'prettierignore'
    | 'prettierrc.js'
    | 'init.py'
    | 'version.py'
    | 'test_doctests.py'
    | 'theme-main.html'
    | 'workflows/check-pr.yml'
    | 'workflows/release-new-version.yml'
    | 'workflows/create-github-release.yml'
    | 'workflows/publish-to-pypi.yml'
    | 'workflows/deploy-project-site.yml'
    | 'workflows/run-tests.yml'
    | 'workflows/update-pre-commit-hooks.yml'
    | 'scripts/commit_and_tag_version.py'
    | 'scripts/trigger_release.py'
    | 'scripts/release_new_version.py'
    | 'scripts/verify_pr_commits.py'
    | 'scripts/gen_site_usage_pages.py'
    | 'scripts/make_docs.py';

/** Substitution values, keyed by placeholder name. */
export type TemplateValues = Readonly<Record<string, string>>;

const TEMPLATE_ROOT = new URL('../../templates/', import.meta.url);

const cache = new Map<TemplateName, string>();

/** Read a template body (cached for the life of the process). */
export function loadTemplate(name: TemplateName): string {
    let body = cache.get(name);
    if (body === undefined) {
        body = readFileSync(new URL(`${name}.tpl`, TEMPLATE_ROOT), 'utf-8');
        cache.set(name, body);
    }
    return body;
}

// ── Substitution ─────────────────────────────────────────

const PLACEHOLDER = /\{\{([a-z_]+)\}\}/g;

/** Placeholder names used by `body`, in first-occurrence order. */
export function placeholdersOf(body: string): string[] {
    return [...new Set(Array.from(body.matchAll(PLACEHOLDER), m => m[1] ?? ''))];
}

/**
 * Substitute every placeholder in `body`.
 *
 * @throws AuthoringDefectError when a placeholder has no value or a
 *   value matches no placeholder
 */
export function renderTemplate(body: string, values: TemplateValues = {}, label = '<inline>'): string {
    const expected = placeholdersOf(body);

    const missing = expected.filter(name => !Object.hasOwn(values, name));
    if (missing.length > 0) {
        throw new AuthoringDefectError(`template '${label}': no value for placeholder(s) ${missing.join(', ')}`);
    }

    const extra = Object.keys(values).filter(name => !expected.includes(name));
    if (extra.length > 0) {
        throw new AuthoringDefectError(`template '${label}': unused substitution(s) ${extra.join(', ')}`);
    }

    return body.replace(PLACEHOLDER, (_match, name: string) => values[name] ?? '');
}

/** Load and render a named template. */
export function render(name: TemplateName, values: TemplateValues = {}): string {
    return renderTemplate(loadTemplate(name), values, name);
}

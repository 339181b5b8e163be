/**
 * Configuration Registry
 *
 * The closed, ordered set of configuration keys. Declaration order is
 * resolution order: `project` must precede `mainPackage`, whose
 * default is derived from it.
 *
 * @module
 */
import { BooleanKeySpec, type ConfigKeySpec, StringKeySpec } from './ConfigKeySpec.js';
import { MIN_PYTHON_MINOR_VERSION, optional, validateNonEmpty, validatePythonVersion, validateUrl } from './validators.js';

// ── Keys ─────────────────────────────────────────────────

/** Value type of every configuration key. */
export interface ConfigValues {
    barebones: boolean;
    project: string;
    description: string;
    url: string;
    mainPackage: string;
    mitLicense: boolean;
    authors: string;
    minPythonVersion: string;
    maxPythonVersion: string;
    pyTyped: boolean;
    scheduleHookUpdates: boolean;
    extraDeps: string;
    extraDevDeps: string;
    github: boolean;
    doctests: boolean;
}

export type ConfigKey = keyof ConfigValues;

/** All keys, in resolution order. */
export const CONFIG_KEYS = [
    'barebones',
    'project',
    'description',
    'url',
    'mainPackage',
    'mitLicense',
    'authors',
    'minPythonVersion',
    'maxPythonVersion',
    'pyTyped',
    'scheduleHookUpdates',
    'extraDeps',
    'extraDevDeps',
    'github',
    'doctests',
] as const satisfies readonly ConfigKey[];

/** A (partially) resolved configuration. */
export type Configuration = Partial<ConfigValues>;

/** Per-run default overrides, passed beside the immutable registry. */
export type DefaultOverrides = Partial<ConfigValues>;

export type ConfigRegistry = {
    readonly [K in ConfigKey]: ConfigKeySpec<ConfigValues[K]>;
};

// ── Construction ─────────────────────────────────────────

export interface RegistryOptions {
    /** Detected `Name <email>` of the git user, default for `authors` */
    readonly gitUser?: string | undefined;
}

/** Build the registry. Called once per run, after git user detection. */
export function createRegistry(options: RegistryOptions = {}): ConfigRegistry {
    return Object.freeze({
        barebones: new BooleanKeySpec({
            name: 'barebones',
            description: 'create barebones project',
            defaultValue: false,
        }),
        project: new StringKeySpec({
            name: 'path',
            description: 'project path',
            validator: validateNonEmpty,
        }),
        description: new StringKeySpec({
            name: 'desc',
            description: 'project description',
            defaultValue: '',
        }),
        url: new StringKeySpec({
            name: 'url',
            description: 'project docs site',
            defaultValue: '',
            validator: optional(validateUrl),
            modeIgnored: true,
        }),
        mainPackage: new StringKeySpec({
            name: 'pkg',
            description: 'main package name (same as project name if empty)',
            defaultValue: '',
        }),
        mitLicense: new BooleanKeySpec({
            name: 'mit',
            description: 'include mit license',
            defaultValue: true,
        }),
        authors: new StringKeySpec({
            name: 'authors',
            description: "authors (comma separated 'name <email>')",
            defaultValue: options.gitUser,
        }),
        minPythonVersion: new StringKeySpec({
            name: 'pym',
            description: 'minimum python3 version',
            defaultValue: `3.${MIN_PYTHON_MINOR_VERSION}`,
            validator: validatePythonVersion,
        }),
        maxPythonVersion: new StringKeySpec({
            name: 'pyM',
            description: 'maximum python3 version, for github actions',
            defaultValue: '3.12',
            validator: validatePythonVersion,
            modeIgnored: true,
        }),
        pyTyped: new BooleanKeySpec({
            name: 'py_typed',
            description: "add 'py.typed' file indicating typing support",
            defaultValue: true,
        }),
        scheduleHookUpdates: new BooleanKeySpec({
            name: 'pc_cron',
            description: 'add support for updating pre-commit hooks monthly',
            defaultValue: true,
            modeIgnored: true,
        }),
        extraDeps: new StringKeySpec({
            name: 'add_deps',
            description: 'additional python dependencies to install (semicolon separated)',
            defaultValue: '',
        }),
        extraDevDeps: new StringKeySpec({
            name: 'add_dev_deps',
            description: 'additional python dev dependencies to install (semicolon separated)',
            defaultValue: '',
        }),
        github: new BooleanKeySpec({
            name: 'github',
            description: 'add github support (ci workflows and related files)',
            defaultValue: true,
            modeIgnored: true,
        }),
        doctests: new BooleanKeySpec({
            name: 'doctests',
            description: 'include boilerplate code to load doctests',
            defaultValue: true,
            modeIgnored: true,
        }),
    });
}

/** Keys that are never resolved in barebones mode. */
export function modeIgnoredKeys(registry: ConfigRegistry): ConfigKey[] {
    return CONFIG_KEYS.filter(key => registry[key].modeIgnored);
}

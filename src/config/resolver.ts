/**
 * Configuration Resolver
 *
 * Turns raw invocation arguments into one resolved configuration:
 *
 * ```
 * argv ──▶ detectAcquisitionMode
 *            │
 *            ├─ non-interactive ─▶ parse (defaults + required) ──────────┐
 *            │                                                            ▼
 *            └─ interactive ─────▶ parse (explicit only) ─▶ prompt ─▶ derive mainPackage
 * ```
 *
 * Resolution is strictly sequential: keys are resolved in registry
 * order, and the package-name default is derived immediately after
 * the project path is known.
 *
 * @module
 */
import { basename } from 'node:path';
import { Command } from 'commander';
import type { Prompter } from '../prompt/Prompter.js';
import {
    CONFIG_KEYS,
    type ConfigKey,
    type ConfigRegistry,
    type ConfigValues,
    type Configuration,
    type DefaultOverrides,
    modeIgnoredKeys,
} from './registry.js';

// ── Types ────────────────────────────────────────────────

export type AcquisitionMode = 'interactive' | 'non-interactive';

/** Extra setup applied to the parser (tests install `exitOverride()` here). */
export type ParserSetup = (parser: Command) => void;

export interface ParsedArguments {
    readonly silent: boolean;
    /** Parsed key values; in interactive mode only the explicitly given ones */
    readonly seed: Configuration;
}

export interface ResolvedConfiguration {
    readonly mode: AcquisitionMode;
    readonly silent: boolean;
    readonly configuration: Configuration;
}

export interface ResolveOptions {
    readonly setupParser?: ParserSetup | undefined;
    readonly overrides?: DefaultOverrides | undefined;
}

// ============================================================================
// Acquisition mode
// ============================================================================

// Short flags may be bundled (`-i`, `-si`, `-is`). Any cluster holding
// an `i` counts, whatever the other letters mean.
const INTERACTIVE_CLUSTER = /^-[a-z]*i[a-z]*$/;

/** Decide, once, whether values come from prompts or from flags. */
export function detectAcquisitionMode(argv: readonly string[]): AcquisitionMode {
    if (argv.length === 0) return 'interactive';
    const interactive = argv.includes('--interactive')
        || argv.some(arg => INTERACTIVE_CLUSTER.test(arg));
    return interactive ? 'interactive' : 'non-interactive';
}

// ============================================================================
// Command line
// ============================================================================

/** Build the `seedbed` command with every registry key registered. */
export function createArgParser(
    registry: ConfigRegistry,
    noDefaultRequired: boolean,
    setup?: ParserSetup,
): Command {
    const parser = new Command('seedbed')
        .description('create a new python project')
        .option('-i, --interactive', 'configure project creation interactively')
        .option('-s, --silent', 'suppress output')
        .allowExcessArguments(false)
        .showHelpAfterError('(add --help for additional information)');

    for (const key of CONFIG_KEYS) {
        registry[key].register(parser, noDefaultRequired);
    }

    setup?.(parser);
    return parser;
}

/**
 * Parse `argv` (user arguments, without node and script path).
 *
 * Interactive mode registers keys with `noDefaultRequired` and keeps
 * only the values actually given on the command line.
 */
export function parseArguments(
    argv: readonly string[],
    registry: ConfigRegistry,
    mode: AcquisitionMode,
    setup?: ParserSetup,
): ParsedArguments {
    const interactive = mode === 'interactive';
    const parser = createArgParser(registry, interactive, setup);
    parser.parse([...argv], { from: 'user' });

    const seed: Configuration = {};
    for (const key of CONFIG_KEYS) {
        assign(seed, key, registry[key].read(parser, interactive));
    }

    return { silent: parser.getOptionValue('silent') === true, seed };
}

// ============================================================================
// Interactive resolution
// ============================================================================

/**
 * Prompt for every key missing from `seed`, in registry order.
 *
 * In barebones mode, mode-ignored keys are skipped and stay absent.
 * Right after `project` is known, the `mainPackage` default is derived
 * from it unless `overrides` already sets one.
 */
export async function resolveInteractively(
    registry: ConfigRegistry,
    prompter: Prompter,
    seed: Configuration = {},
    overrides: DefaultOverrides = {},
): Promise<Configuration> {
    const configuration: Configuration = { ...seed };
    const defaults: DefaultOverrides = { ...overrides };

    for (const key of CONFIG_KEYS) {
        if (configuration[key] === undefined) {
            if (configuration.barebones === true && registry[key].modeIgnored) continue;
            await promptKey(registry, key, prompter, configuration, defaults);
        }

        if (key === 'project' && configuration.project !== undefined) {
            defaults.mainPackage ??= derivePackageName(configuration.project);
        }
    }

    return configuration;
}

async function promptKey<K extends ConfigKey>(
    registry: ConfigRegistry,
    key: K,
    prompter: Prompter,
    configuration: Configuration,
    defaults: DefaultOverrides,
): Promise<void> {
    configuration[key] = await registry[key].prompt(prompter, defaults[key]);
}

function assign<K extends ConfigKey>(
    configuration: Configuration,
    key: K,
    value: ConfigValues[K] | undefined,
): void {
    if (value !== undefined) configuration[key] = value;
}

// ============================================================================
// Full resolution
// ============================================================================

/** Final path segment, lower-cased, hyphens turned into underscores. */
export function derivePackageName(projectPath: string): string {
    return basename(projectPath).toLowerCase().replace(/-/g, '_');
}

/**
 * Resolve the complete configuration for one run.
 *
 * On both paths an empty `mainPackage` is replaced by the name derived
 * from the project path, and in barebones mode the mode-ignored keys
 * are absent from the result.
 */
export async function resolveConfiguration(
    argv: readonly string[],
    registry: ConfigRegistry,
    prompter: Prompter,
    options: ResolveOptions = {},
): Promise<ResolvedConfiguration> {
    const mode = detectAcquisitionMode(argv);
    const { silent, seed } = parseArguments(argv, registry, mode, options.setupParser);

    const configuration = mode === 'interactive'
        ? await resolveInteractively(registry, prompter, seed, options.overrides)
        : { ...seed };

    if (configuration.mainPackage === '' && configuration.project !== undefined) {
        configuration.mainPackage = derivePackageName(configuration.project);
    }

    if (configuration.barebones === true) {
        for (const key of modeIgnoredKeys(registry)) delete configuration[key];
    }

    return { mode, silent, configuration };
}

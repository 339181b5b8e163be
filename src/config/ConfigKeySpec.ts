/**
 * ConfigKeySpec — one configuration field, three ways to fill it.
 *
 * A spec knows how to:
 *
 * 1. **prompt** for its value (with default hint and validation loop),
 * 2. **register** itself as one or more `commander` options,
 * 3. **read** its parsed value back from the command.
 *
 * Two conforming implementations exist: {@link StringKeySpec} and
 * {@link BooleanKeySpec}. Registry entries are constructed once and
 * never mutated; cross-field defaults are passed to `prompt()` as an
 * override instead.
 *
 * @module
 */
import { type Command, InvalidArgumentError, Option } from 'commander';
import { AuthoringDefectError } from '../errors.js';
import { type Prompter, promptInput, promptYesNo } from '../prompt/Prompter.js';
import type { Validator } from './validators.js';

// ============================================================================
// Contract
// ============================================================================

/** A resolved configuration value. */
export type ConfigValue = string | boolean;

export interface ConfigKeySpec<T extends ConfigValue> {
    readonly kind: T extends string ? 'string' : 'boolean';
    /** Command-line stem (`pkg`, `py_typed`, ...) */
    readonly name: string;
    readonly description: string;
    readonly defaultValue: T | undefined;
    /** Whether the key is skipped entirely in barebones mode */
    readonly modeIgnored: boolean;

    /** Ask for the value, using `defaultOverride` in place of the own default when given. */
    prompt(prompter: Prompter, defaultOverride?: T): Promise<T>;

    /**
     * Add this key's option(s) to `parser`.
     *
     * With `noDefaultRequired` the options carry no default and are
     * never mandatory, so that a partial command line can seed an
     * interactive session.
     */
    register(parser: Command, noDefaultRequired: boolean): void;

    /**
     * Read the parsed value. With `explicitOnly`, values that did not
     * come from the command line itself are reported as absent.
     */
    read(parser: Command, explicitOnly: boolean): T | undefined;
}

export interface KeySpecOptions<T extends ConfigValue> {
    readonly name: string;
    readonly description: string;
    readonly defaultValue?: T | undefined;
    readonly modeIgnored?: boolean;
}

// ── Shared helpers ───────────────────────────────────────

const MODE_IGNORED_SUFFIX = ' (ignored in barebones mode)';

function helpText(description: string, modeIgnored: boolean): string {
    return modeIgnored ? description + MODE_IGNORED_SUFFIX : description;
}

function longFlag(name: string): string {
    return `--${name.replace(/_/g, '-')}`;
}

function readSource(parser: Command, attribute: string, explicitOnly: boolean): unknown {
    if (explicitOnly && parser.getOptionValueSource(attribute) !== 'cli') return undefined;
    const value: unknown = parser.getOptionValue(attribute);
    return value;
}

// ============================================================================
// String keys
// ============================================================================

export interface StringKeySpecOptions extends KeySpecOptions<string> {
    readonly validator?: Validator | undefined;
}

/**
 * A string-valued key.
 *
 * Registered as a single `<value>` option: `-x` for one-letter names,
 * `--long-name` otherwise. The validator runs inside commander's
 * argument parser, so a bad value fails with the same message the
 * prompt loop shows.
 */
export class StringKeySpec implements ConfigKeySpec<string> {
    readonly kind = 'string';
    readonly name: string;
    readonly description: string;
    readonly defaultValue: string | undefined;
    readonly modeIgnored: boolean;
    readonly validator: Validator | undefined;
    /** Flag as rendered on the command line */
    readonly flag: string;
    private readonly attribute: string;

    constructor(options: StringKeySpecOptions) {
        this.name = options.name;
        this.description = options.description;
        this.defaultValue = options.defaultValue;
        this.modeIgnored = options.modeIgnored ?? false;
        this.validator = options.validator;
        this.flag = options.name.length === 1 ? `-${options.name}` : longFlag(options.name);
        this.attribute = new Option(this.flag).attributeName();
    }

    prompt(prompter: Prompter, defaultOverride?: string): Promise<string> {
        return promptInput(prompter, this.description, {
            defaultValue: defaultOverride ?? this.defaultValue,
            validator: this.validator,
        });
    }

    register(parser: Command, noDefaultRequired: boolean): void {
        const option = new Option(`${this.flag} <value>`, helpText(this.description, this.modeIgnored))
            .argParser((value: string) => {
                const error = this.validator?.(value);
                if (error !== undefined) throw new InvalidArgumentError(error);
                return value;
            });

        if (!noDefaultRequired) {
            if (this.defaultValue !== undefined) option.default(this.defaultValue);
            else option.makeOptionMandatory();
        }

        parser.addOption(option);
    }

    read(parser: Command, explicitOnly: boolean): string | undefined {
        const value = readSource(parser, this.attribute, explicitOnly);
        return typeof value === 'string' ? value : undefined;
    }
}

// ============================================================================
// Boolean keys
// ============================================================================

/**
 * A boolean key. Its command-line shape depends on the default:
 *
 * | default     | options                                   |
 * |-------------|-------------------------------------------|
 * | `false`     | `--name` (sets true)                      |
 * | `true`      | `--no-name` (sets false)                  |
 * | none        | `--name` / `--no-name`, exclusive, required |
 */
export class BooleanKeySpec implements ConfigKeySpec<boolean> {
    readonly kind = 'boolean';
    readonly name: string;
    readonly description: string;
    readonly defaultValue: boolean | undefined;
    readonly modeIgnored: boolean;
    readonly flag: string;
    readonly negatedFlag: string;
    private readonly attribute: string;

    constructor(options: KeySpecOptions<boolean>) {
        this.name = options.name;
        this.description = options.description;
        this.defaultValue = options.defaultValue;
        this.modeIgnored = options.modeIgnored ?? false;
        this.flag = longFlag(options.name);
        this.negatedFlag = longFlag(`no_${options.name}`);
        this.attribute = new Option(this.flag).attributeName();
    }

    prompt(prompter: Prompter, defaultOverride?: boolean): Promise<boolean> {
        return promptYesNo(prompter, this.description, defaultOverride ?? this.defaultValue);
    }

    register(parser: Command, noDefaultRequired: boolean): void {
        const help = helpText(this.description, this.modeIgnored);
        const negatedHelp = `do not ${help}`;

        switch (this.defaultValue) {
            case false: {
                const option = new Option(this.flag, help);
                if (!noDefaultRequired) option.default(false);
                parser.addOption(option);
                break;
            }

            case true:
                // commander presets a lone `--no-x` to true with source 'default'
                parser.addOption(new Option(this.negatedFlag, negatedHelp));
                break;

            case undefined: {
                const positive = new Option(this.flag, help);
                if (!noDefaultRequired) positive.makeOptionMandatory();
                parser.addOption(positive);
                parser.addOption(new Option(this.negatedFlag, negatedHelp));
                this.enforceExclusive(parser);
                break;
            }

            default:
                throw new AuthoringDefectError(
                    `key '${this.name}': expected boolean default, got ${JSON.stringify(this.defaultValue)}`,
                );
        }
    }

    read(parser: Command, explicitOnly: boolean): boolean | undefined {
        const value = readSource(parser, this.attribute, explicitOnly);
        return typeof value === 'boolean' ? value : undefined;
    }

    private enforceExclusive(parser: Command): void {
        const seen = new Set<string>();
        const onFlag = (flag: string) => (): void => {
            seen.add(flag);
            if (seen.size > 1) {
                parser.error(
                    `error: option '${this.flag}' cannot be used with option '${this.negatedFlag}'`,
                    { code: 'commander.conflictingOption' },
                );
            }
        };
        const name = this.flag.slice(2);
        parser.on(`option:${name}`, onFlag(this.flag));
        parser.on(`option:no-${name}`, onFlag(this.negatedFlag));
    }
}

/**
 * seedbed — programmatic API.
 *
 * @module
 */

// ── Configuration ────────────────────────────────────────
export {
    type Validator,
    MIN_PYTHON_MINOR_VERSION,
    validateNonEmpty,
    validatePythonVersion,
    validateUrl,
    optional,
} from './config/validators.js';
export {
    type ConfigValue,
    type ConfigKeySpec,
    StringKeySpec,
    BooleanKeySpec,
} from './config/ConfigKeySpec.js';
export {
    type ConfigKey,
    type ConfigValues,
    type Configuration,
    type ConfigRegistry,
    type DefaultOverrides,
    CONFIG_KEYS,
    createRegistry,
    modeIgnoredKeys,
} from './config/registry.js';
export {
    type AcquisitionMode,
    type ResolvedConfiguration,
    detectAcquisitionMode,
    createArgParser,
    parseArguments,
    resolveInteractively,
    resolveConfiguration,
    derivePackageName,
} from './config/resolver.js';
export {
    type ProjectConfig,
    type FullProjectConfig,
    type BarebonesProjectConfig,
    ProjectConfigSchema,
    toProjectConfig,
} from './config/projectConfig.js';

// ── Prompting ────────────────────────────────────────────
export { type Prompter, promptInput, promptYesNo } from './prompt/Prompter.js';
export { createClackPrompter } from './prompt/ClackPrompter.js';

// ── Materialization ──────────────────────────────────────
export { type TemplateName, render, renderTemplate } from './templates/index.js';
export { type AuthorList, parseAuthors, displayName } from './scaffold/authors.js';
export { type MaterializeOptions, materialize } from './scaffold/materialize.js';

// ── Collaborators ────────────────────────────────────────
export { type CommandRunner, type CommandResult, createCommandRunner } from './external/CommandRunner.js';
export {
    type HostingApi,
    type CreatedRepository,
    type ActionsPublicKey,
    GitHubApi,
    createGitHubApi,
} from './external/GitHubApi.js';
export { type SecretEncryptor, createSecretEncryptor } from './external/SecretEncryptor.js';
export { createProject } from './setup/createProject.js';
export { setupGitHub } from './setup/setupGitHub.js';

// ── Orchestration ────────────────────────────────────────
export { type RunOptions, type ExitCode, run } from './cli/run.js';

// ── Observability & errors ───────────────────────────────
export {
    type ScaffoldEvent,
    type ScaffoldObserverFn,
    createScaffoldObserver,
    SILENT_OBSERVER,
} from './observability/ScaffoldObserver.js';
export { AuthoringDefectError, CollaboratorError, type CollaboratorKind } from './errors.js';

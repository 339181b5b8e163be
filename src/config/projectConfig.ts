/**
 * ProjectConfig — the typed, resolved configuration.
 *
 * The barebones variant is `strict()`: a mode-ignored key surviving
 * resolution is a defect, not something to carry along silently.
 *
 * @module
 */
import { z } from 'zod';
import { AuthoringDefectError } from '../errors.js';
import type { Configuration } from './registry.js';

const sharedKeys = {
    project: z.string(),
    description: z.string(),
    mainPackage: z.string(),
    mitLicense: z.boolean(),
    authors: z.string(),
    minPythonVersion: z.string(),
    pyTyped: z.boolean(),
    extraDeps: z.string(),
    extraDevDeps: z.string(),
};

export const BarebonesProjectConfigSchema = z.object({
    barebones: z.literal(true),
    ...sharedKeys,
}).strict();

export const FullProjectConfigSchema = z.object({
    barebones: z.literal(false),
    ...sharedKeys,
    url: z.string(),
    maxPythonVersion: z.string(),
    scheduleHookUpdates: z.boolean(),
    github: z.boolean(),
    doctests: z.boolean(),
});

export const ProjectConfigSchema = z.discriminatedUnion('barebones', [
    BarebonesProjectConfigSchema,
    FullProjectConfigSchema,
]);

export type BarebonesProjectConfig = z.infer<typeof BarebonesProjectConfigSchema>;
export type FullProjectConfig = z.infer<typeof FullProjectConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Check that `configuration` is fully resolved for its project mode.
 *
 * @throws AuthoringDefectError when a key is missing, mistyped, or
 *   present although ignored in barebones mode
 */
export function toProjectConfig(configuration: Configuration): ProjectConfig {
    const result = ProjectConfigSchema.safeParse(configuration);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new AuthoringDefectError(`resolved configuration is invalid: ${issues}`);
    }
    return result.data;
}

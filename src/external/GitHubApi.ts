/**
 * Hosting API client (GitHub REST).
 *
 * The core only needs "call this endpoint with this payload". The
 * production transport is `@octokit/rest`; tests inject a fake
 * {@link RequestFn}. Responses the caller reads fields from are
 * validated with the zod schemas below.
 *
 * @module
 */
import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import { CollaboratorError } from '../errors.js';
import type { ScaffoldObserverFn } from '../observability/ScaffoldObserver.js';

// ── Types ────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RequestPayload = Readonly<Record<string, unknown>>;

/** Octokit-style request: `route` is `"<METHOD> /<endpoint>"`. */
export type RequestFn = (
    route: string,
    parameters: { data?: RequestPayload },
) => Promise<{ data: unknown }>;

export interface HostingApi {
    /**
     * Call `endpoint` (relative to the API root, no leading slash).
     *
     * @throws CollaboratorError (`hosting-api`) on any transport or HTTP failure
     */
    call(endpoint: string, method?: HttpMethod, data?: RequestPayload): Promise<unknown>;
}

export const GITHUB_API_ROOT = 'https://api.github.com';

// ── Response schemas ─────────────────────────────────────

export const CreatedRepositorySchema = z.object({
    owner: z.object({ login: z.string() }),
    html_url: z.string(),
    ssh_url: z.string(),
});

export const ActionsPublicKeySchema = z.object({
    key_id: z.string(),
    key: z.string(),
});

export type CreatedRepository = z.infer<typeof CreatedRepositorySchema>;
export type ActionsPublicKey = z.infer<typeof ActionsPublicKeySchema>;

/**
 * Validate an API response body.
 *
 * @throws CollaboratorError (`hosting-api`) when `body` does not match
 */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new CollaboratorError('hosting-api', `unexpected ${what} response from GitHub`, {
            cause: result.error,
        });
    }
    return result.data;
}

// ── Client ───────────────────────────────────────────────

export class GitHubApi implements HostingApi {
    private readonly request: RequestFn;
    private readonly observer: ScaffoldObserverFn;

    constructor(request: RequestFn, observer: ScaffoldObserverFn) {
        this.request = request;
        this.observer = observer;
    }

    async call(endpoint: string, method: HttpMethod = 'GET', data?: RequestPayload): Promise<unknown> {
        this.observer({ type: 'call', method, endpoint: `${GITHUB_API_ROOT}/${endpoint}` });
        try {
            const response = await this.request(`${method} /${endpoint}`, data !== undefined ? { data } : {});
            return response.data;
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new CollaboratorError('hosting-api', `${method} /${endpoint} failed: ${reason}`, { cause: err });
        }
    }
}

/** GitHub client authenticated with a personal access token. */
export function createGitHubApi(token: string, observer: ScaffoldObserverFn): GitHubApi {
    const octokit = new Octokit({ auth: token });
    return new GitHubApi((route, parameters) => octokit.request(route, parameters), observer);
}

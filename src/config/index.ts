/**
 * CLIENT CONFIGURATION
 *
 * Reads the Wallex connection settings from the environment:
 * - WALLEX_BASE_URL (default https://api.wallex.ir)
 * - WALLEX_API_VERSION, forces a version segment on every endpoint
 * - WALLEX_API_KEY, needed for account endpoints only
 * - WALLEX_TIMEOUT_MS (default 10000, 0 disables)
 *
 * Settings are fixed once the client is constructed.
 */

import { z } from 'zod';
import { ConfigurationError } from '../http/errors.js';
import { BASE_URL } from '../http/wallexClient.js';
import type { ClientOptions } from '../http/wallexClient.js';

export type ClientConfig = Required<Pick<ClientOptions, 'baseUrl' | 'timeoutMs' | 'apiKey'>> & Pick<ClientOptions, 'version'>;

const EnvSchema = z.object({
    WALLEX_BASE_URL: z.string().url().default(BASE_URL),
    WALLEX_API_VERSION: z.string().regex(/^v\d+$/, 'expected a version like v1').optional(),
    WALLEX_API_KEY: z.string().default(''),
    WALLEX_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10_000)
});

// blank entries in .env files behave like unset ones
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(env)) {
        if (v !== undefined && v.trim() !== '') out[k] = v.trim();
    }
    return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
    const parsed = EnvSchema.safeParse(dropBlank(env));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError(`invalid configuration: ${issues}`);
    }
    const cfg = parsed.data;
    return {
        baseUrl: cfg.WALLEX_BASE_URL,
        version: cfg.WALLEX_API_VERSION,
        apiKey: cfg.WALLEX_API_KEY,
        timeoutMs: cfg.WALLEX_TIMEOUT_MS
    };
}

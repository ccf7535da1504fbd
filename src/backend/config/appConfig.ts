/**
 * Application configuration
 *
 * Reads settings from the environment (the entry point loads `.env` into
 * it first) and validates them in one place. Any problem is reported as a
 * single ConfigurationError listing every offending variable, before a
 * network client is constructed.
 */

import { z } from 'zod';
import { SourceConfig } from '../../shared/types';
import { ConfigurationError } from '../errors';

export interface AppConfig {
    port: number;
    corsOrigin: string;
    generation: {
        apiKey: string;
        baseUrl: string;
        model: string;
        embeddingModel: string;
        temperature: number;
        maxTokens?: number;
        requestTimeoutMs: number;
    };
    retrieval: {
        indexRoot: string;
        sources: SourceConfig[];
        perSourceLimit: number;
        perSnippetCharBudget: number;
        backendTimeoutMs: number;
    };
    cycleTimeoutMs: number;
}

/**
 * Default data sources and where their indexes live.
 */
export const DEFAULT_SOURCES: SourceConfig[] = [
    { name: 'youtube', location: 'youtube' },
    { name: 'website', location: 'website' },
    { name: 'pdf', location: 'PDF' },
    { name: 'pptx', location: 'pptx' },
];

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
    OPENAI_API_KEY: z.preprocess(
        blankToUndefined,
        z.string({ required_error: 'is required' })
    ),
    OPENAI_BASE_URL: z.preprocess(
        blankToUndefined,
        z.string().url().default('https://api.openai.com/v1')
    ),
    QA_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4o')),
    QA_TEMPERATURE: z.preprocess(
        blankToUndefined,
        z.coerce.number().min(0).max(2).default(0)
    ),
    QA_MAX_TOKENS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
    QA_EMBEDDING_MODEL: z.preprocess(
        blankToUndefined,
        z.string().default('text-embedding-ada-002')
    ),
    QA_INDEX_ROOT: z.preprocess(blankToUndefined, z.string().optional()),
    QA_SOURCES: z.preprocess(blankToUndefined, z.string().optional()),
    QA_PER_SOURCE_LIMIT: positiveInt(4),
    QA_SNIPPET_CHAR_BUDGET: positiveInt(2000),
    QA_BACKEND_TIMEOUT_MS: positiveInt(15000),
    QA_CYCLE_TIMEOUT_MS: positiveInt(60000),
    QA_REQUEST_TIMEOUT_MS: positiveInt(30000),
    PORT: positiveInt(3001),
    QA_CORS_ORIGIN: z.preprocess(blankToUndefined, z.string().default('*')),
});

/**
 * Parse `name=location,name=location`.
 *
 * A bare `name` uses the name as its location. Order is preserved; it is
 * the order sources appear in the assembled context.
 *
 * @throws ConfigurationError on empty entries or duplicate names
 */
export function parseSourceList(value: string): SourceConfig[] {
    const sources: SourceConfig[] = [];
    const seen = new Set<string>();

    for (const rawEntry of value.split(',')) {
        const entry = rawEntry.trim();
        if (entry.length === 0) {
            continue;
        }

        const separator = entry.indexOf('=');
        const name = (separator === -1 ? entry : entry.slice(0, separator)).trim();
        const location = (separator === -1 ? entry : entry.slice(separator + 1)).trim();

        if (name.length === 0 || location.length === 0) {
            throw new ConfigurationError(`Invalid source entry "${entry}" in QA_SOURCES`, [
                `QA_SOURCES: invalid entry "${entry}"`,
            ]);
        }
        if (seen.has(name)) {
            throw new ConfigurationError(`Duplicate source name "${name}" in QA_SOURCES`, [
                `QA_SOURCES: duplicate name "${name}"`,
            ]);
        }

        seen.add(name);
        sources.push({ name, location });
    }

    if (sources.length === 0) {
        throw new ConfigurationError('QA_SOURCES does not name any source', [
            'QA_SOURCES: no sources',
        ]);
    }

    return sources;
}

/**
 * Build the application configuration from environment variables.
 *
 * @throws ConfigurationError if a credential is missing or a value is invalid
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`
        );
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const vars = parsed.data;

    return {
        port: vars.PORT,
        corsOrigin: vars.QA_CORS_ORIGIN,
        generation: {
            apiKey: vars.OPENAI_API_KEY,
            baseUrl: vars.OPENAI_BASE_URL,
            model: vars.QA_MODEL,
            embeddingModel: vars.QA_EMBEDDING_MODEL,
            temperature: vars.QA_TEMPERATURE,
            maxTokens: vars.QA_MAX_TOKENS,
            requestTimeoutMs: vars.QA_REQUEST_TIMEOUT_MS,
        },
        retrieval: {
            indexRoot: vars.QA_INDEX_ROOT ?? process.cwd(),
            sources: vars.QA_SOURCES ? parseSourceList(vars.QA_SOURCES) : DEFAULT_SOURCES.map((s) => ({ ...s })),
            perSourceLimit: vars.QA_PER_SOURCE_LIMIT,
            perSnippetCharBudget: vars.QA_SNIPPET_CHAR_BUDGET,
            backendTimeoutMs: vars.QA_BACKEND_TIMEOUT_MS,
        },
        cycleTimeoutMs: vars.QA_CYCLE_TIMEOUT_MS,
    };
}

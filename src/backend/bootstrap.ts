/**
 * Process-start wiring.
 *
 * Builds every long-lived dependency exactly once (completion client,
 * backend registry, answer generator) and hands out controllers bound to
 * them. Nothing here is module-level state: callers own what is returned.
 */

import { AppConfig } from './config/appConfig';
import { ICompletionClient, createCompletionClient } from './clients/completionClient';
import { ConfigurationError } from './errors';
import { Logger } from './logging';
import { IAnswerGenerator, createAnswerGenerator } from './services/answerGenerator';
import { BackendRegistry, RegistryBuildResult, RegistryHolder } from './services/backendRegistry';
import {
    QASessionController,
    QASessionConfig,
    createQASessionController,
} from './services/qaSessionController';
import { missingPromptSlots } from './services/queryProcessor';
import { BackendOpener, createVectorIndexOpener } from './services/retrievalBackend';

export interface QAApplication {
    config: AppConfig;
    completionClient: ICompletionClient;
    generator: IAnswerGenerator;
    registry: RegistryHolder;
    /** New controller sharing this application's registry and generator */
    createController(): QASessionController;
    /** Re-open every configured source and publish the new registry */
    reloadSources(): Promise<RegistryBuildResult>;
}

export interface BootstrapOptions {
    logger?: Logger;
    /** Overrides for tests: a fake client, a fake index opener */
    completionClient?: ICompletionClient;
    openBackend?: BackendOpener;
    promptTemplate?: string;
}

/**
 * Wire the application from its configuration.
 *
 * @throws ConfigurationError when the credential is missing or the prompt template lacks a slot
 */
export async function bootstrap(
    config: AppConfig,
    options: BootstrapOptions = {}
): Promise<QAApplication> {
    const logger = options.logger ?? console;

    if (!options.completionClient && config.generation.apiKey.trim().length === 0) {
        throw new ConfigurationError('OPENAI_API_KEY is required', ['OPENAI_API_KEY: is required']);
    }

    if (options.promptTemplate !== undefined) {
        const missing = missingPromptSlots(options.promptTemplate);
        if (missing.length > 0) {
            throw new ConfigurationError(
                `Prompt template is missing slot(s): ${missing.map((slot) => `{${slot}}`).join(', ')}`
            );
        }
    }

    const completionClient =
        options.completionClient ??
        createCompletionClient({
            apiKey: config.generation.apiKey,
            baseUrl: config.generation.baseUrl,
            defaultModel: config.generation.model,
            embeddingModel: config.generation.embeddingModel,
            temperature: config.generation.temperature,
            maxTokens: config.generation.maxTokens,
            timeoutMs: config.generation.requestTimeoutMs,
        });

    const openBackend =
        options.openBackend ??
        createVectorIndexOpener(completionClient, config.retrieval.indexRoot);

    const buildRegistry = () =>
        BackendRegistry.build(config.retrieval.sources, openBackend, logger);

    const registry = new RegistryHolder(await buildRegistry());
    if (registry.current().size === 0) {
        logger.warn('No index could be loaded; every question will report no relevant context.');
    }

    const generator = createAnswerGenerator(completionClient, {
        model: config.generation.model,
        temperature: config.generation.temperature,
        maxTokens: config.generation.maxTokens,
    });

    const sessionConfig: Partial<QASessionConfig> = {
        perSourceLimit: config.retrieval.perSourceLimit,
        perSnippetCharBudget: config.retrieval.perSnippetCharBudget,
        backendTimeoutMs: config.retrieval.backendTimeoutMs,
        cycleTimeoutMs: config.cycleTimeoutMs,
        ...(options.promptTemplate !== undefined ? { promptTemplate: options.promptTemplate } : {}),
    };

    return {
        config,
        completionClient,
        generator,
        registry,
        createController: () =>
            createQASessionController({ registry, generator, config: sessionConfig, logger }),
        reloadSources: async () => {
            const next = await buildRegistry();
            registry.swap(next);
            return next;
        },
    };
}

/**
 * Answer Generator
 *
 * One completion call per question: render the prompt, send it, return the
 * text. No retries here; a failure comes back as a GenerationError value
 * with the client error as its cause, and the caller decides what to show.
 */

import { ICompletionClient } from '../clients/completionClient';
import { GenerationError, Result, toError } from '../errors';
import { renderPrompt } from './queryProcessor';

export interface AnswerGeneratorConfig {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

export interface IAnswerGenerator {
    generate(
        promptTemplate: string,
        context: string,
        question: string,
        signal?: AbortSignal
    ): Promise<Result<string, GenerationError>>;
}

export class AnswerGenerator implements IAnswerGenerator {
    constructor(
        private readonly client: ICompletionClient,
        private readonly config: AnswerGeneratorConfig = {}
    ) {}

    async generate(
        promptTemplate: string,
        context: string,
        question: string,
        signal?: AbortSignal
    ): Promise<Result<string, GenerationError>> {
        const prompt = renderPrompt(promptTemplate, { context, question });

        try {
            const text = await this.client.generateCompletion(prompt, {
                model: this.config.model,
                temperature: this.config.temperature,
                maxTokens: this.config.maxTokens,
                signal,
            });

            if (text.trim().length === 0) {
                return {
                    ok: false,
                    error: new GenerationError('The model returned an empty answer'),
                };
            }

            return { ok: true, value: text };
        } catch (error) {
            const cause = toError(error);
            return {
                ok: false,
                error: new GenerationError(cause.message, cause),
            };
        }
    }
}

export function createAnswerGenerator(
    client: ICompletionClient,
    config?: AnswerGeneratorConfig
): AnswerGenerator {
    return new AnswerGenerator(client, config);
}

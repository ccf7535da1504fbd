/**
 * Query Processor Service
 *
 * Input gate and prompt rendering for one question/answer cycle.
 *
 * Key responsibilities:
 * - Validate user questions before any backend work (reject empty/whitespace)
 * - Fill the prompt template's two slots: {context} and {question}
 * - Hold the fixed user-facing messages of the cycle
 */

/**
 * Result of question validation.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

/**
 * Default prompt template. It has exactly two slots.
 */
export const DEFAULT_PROMPT_TEMPLATE =
    'Please answer the questions based on the following content and your own judgment:\n' +
    '{context}\n' +
    'Question: {question}';

export const PROMPT_FOR_INPUT_MESSAGE = 'Please enter a question.';

export const NO_CONTEXT_MESSAGE = 'No relevant context found for your question.';

/**
 * Render a failure for display.
 */
export function formatErrorMessage(message: string): string {
    return `Error during retrieval or processing: ${message}`;
}

/**
 * Slots the template may use. Anything else in braces is left alone.
 */
export interface PromptSlots {
    context: string;
    question: string;
}

const SLOT_PATTERN = /\{(context|question)\}/g;

/**
 * Validates a user question before processing.
 *
 * Runs before the aggregator is touched.
 *
 * @param query - The raw input string
 * @returns ValidationResult indicating if the question is valid
 */
export function validateQuery(query: string | null | undefined): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    // trim() covers spaces, tabs, newlines and the Unicode whitespace set
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

/**
 * Fill `{context}` and `{question}` in a single pass.
 *
 * Substituted text is never rescanned, so a snippet that happens to contain
 * "{question}" stays literal.
 */
export function renderPrompt(template: string, slots: PromptSlots): string {
    return template.replace(SLOT_PATTERN, (_match, slot: keyof PromptSlots) => slots[slot]);
}

/**
 * Check a template names both slots.
 *
 * @returns the missing slot names (empty when the template is usable)
 */
export function missingPromptSlots(template: string): Array<keyof PromptSlots> {
    const missing: Array<keyof PromptSlots> = [];
    if (!template.includes('{context}')) {
        missing.push('context');
    }
    if (!template.includes('{question}')) {
        missing.push('question');
    }
    return missing;
}

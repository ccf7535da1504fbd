/**
 * Unit tests for Query Processor
 *
 * validateQuery must:
 * - Accept any question with visible content
 * - Reject empty and whitespace-only input
 *
 * renderPrompt must fill exactly the {context} and {question} slots.
 */

import {
    validateQuery,
    renderPrompt,
    missingPromptSlots,
    formatErrorMessage,
    DEFAULT_PROMPT_TEMPLATE,
} from '../queryProcessor';
import * as fc from 'fast-check';

describe('validateQuery', () => {
    describe('valid queries', () => {
        it('should accept a simple text query', () => {
            const result = validateQuery('What is a neural net?');
            expect(result.valid).toBe(true);
            expect(result.error).toBeUndefined();
        });

        it('should accept a query with leading/trailing spaces (content exists)', () => {
            const result = validateQuery('  How are slides indexed?  ');
            expect(result.valid).toBe(true);
        });

        it('should accept a single character query', () => {
            const result = validateQuery('?');
            expect(result.valid).toBe(true);
        });
    });

    describe('invalid queries', () => {
        it('should reject an empty string', () => {
            const result = validateQuery('');
            expect(result.valid).toBe(false);
            expect(result.error).toBe('Query cannot be empty or contain only whitespace');
        });

        it('should reject a missing value', () => {
            expect(validateQuery(undefined)).toEqual({ valid: false, error: 'Query is required' });
            expect(validateQuery(null)).toEqual({ valid: false, error: 'Query is required' });
        });

        it.each([
            ['spaces', '   '],
            ['tabs', '\t\t'],
            ['newlines', '\n\n'],
            ['mixed whitespace', ' \t \n '],
            ['non-breaking space', '\u00a0'],
        ])('should reject a string of %s', (_label, input) => {
            const result = validateQuery(input);
            expect(result.valid).toBe(false);
            expect(result.error).toBeDefined();
        });
    });

    describe('properties', () => {
        const whitespaceOnlyString = fc
            .array(fc.constantFrom(' ', '\t', '\n', '\r', '\f', '\v', '\u00a0', '\u2003'))
            .map((chars) => chars.join(''));

        it('should reject any string composed entirely of whitespace', () => {
            fc.assert(
                fc.property(whitespaceOnlyString, (whitespaceQuery) => {
                    const result = validateQuery(whitespaceQuery);
                    expect(result.valid).toBe(false);
                    expect(result.error).toBeDefined();
                }),
                { numRuns: 100 }
            );
        });

        it('should accept any string that contains at least one non-whitespace character', () => {
            const nonEmptyQuery = fc
                .string({ minLength: 1 })
                .filter((s) => s.trim().length > 0);

            fc.assert(
                fc.property(nonEmptyQuery, (validQuery) => {
                    const result = validateQuery(validQuery);
                    expect(result.valid).toBe(true);
                    expect(result.error).toBeUndefined();
                }),
                { numRuns: 100 }
            );
        });
    });
});

describe('renderPrompt', () => {
    it('should fill the default template', () => {
        const prompt = renderPrompt(DEFAULT_PROMPT_TEMPLATE, {
            context: 'Source: pdf\nBackpropagation adjusts weights.',
            question: 'How do nets learn?',
        });

        expect(prompt).toBe(
            'Please answer the questions based on the following content and your own judgment:\n' +
                'Source: pdf\nBackpropagation adjusts weights.\n' +
                'Question: How do nets learn?'
        );
    });

    it('should not expand slot names that appear inside substituted text', () => {
        const prompt = renderPrompt('{context}|{question}', {
            context: 'a {question} b',
            question: 'Q',
        });

        expect(prompt).toBe('a {question} b|Q');
    });

    it('should leave unknown placeholders untouched', () => {
        expect(renderPrompt('{other} {context}', { context: 'c', question: 'q' })).toBe(
            '{other} c'
        );
    });

    it('should keep replacement patterns in the context literal', () => {
        expect(renderPrompt('{context}', { context: 'costs $& more', question: 'q' })).toBe(
            'costs $& more'
        );
    });

    it('should fill every occurrence of a slot', () => {
        expect(renderPrompt('{question} / {question}', { context: '', question: 'why' })).toBe(
            'why / why'
        );
    });
});

describe('missingPromptSlots', () => {
    it('should report nothing for the default template', () => {
        expect(missingPromptSlots(DEFAULT_PROMPT_TEMPLATE)).toEqual([]);
    });

    it('should report each missing slot', () => {
        expect(missingPromptSlots('Question: {question}')).toEqual(['context']);
        expect(missingPromptSlots('')).toEqual(['context', 'question']);
    });
});

describe('formatErrorMessage', () => {
    it('should prefix the failure', () => {
        expect(formatErrorMessage('Rate limited')).toBe(
            'Error during retrieval or processing: Rate limited'
        );
    });
});

/**
 * Server Tests
 *
 * Each test wires a real application around a fake completion client and
 * fake index opener, listens on an ephemeral local port and talks to it
 * with fetch.
 */

import { Server } from 'http';
import { Express } from 'express';
import { bootstrap } from '../../bootstrap';
import { ICompletionClient } from '../../clients/completionClient';
import { loadAppConfig } from '../../config/appConfig';
import { silentLogger } from '../../logging';
import { QAOutcome } from '../../../shared/types';
import { BackendRegistry } from '../../services/backendRegistry';
import { QASessionController } from '../../services/qaSessionController';
import { BackendOpener, RetrievalBackend } from '../../services/retrievalBackend';
import { ClientControllers, createApp, statusForOutcome } from '../index';

const backend = (sourceName: string, texts: string[]): RetrievalBackend => ({
    sourceName,
    retrieve: jest
        .fn()
        .mockResolvedValue(texts.map((text) => ({ sourceName, text, metadata: {} }))),
});

const fakeClient = (overrides: Partial<ICompletionClient> = {}): ICompletionClient => ({
    isAvailable: jest.fn().mockResolvedValue(true),
    generateEmbedding: jest.fn().mockResolvedValue([1]),
    generateCompletion: jest.fn().mockResolvedValue('An answer.'),
    ...overrides,
});

const listen = (app: Express): Promise<Server> =>
    new Promise((resolve) => {
        const server = app.listen(0, '127.0.0.1', () => resolve(server));
    });

describe('server', () => {
    let server: Server | undefined;
    let baseUrl = '';

    const start = async (
        options: { client?: ICompletionClient; open?: BackendOpener } = {}
    ): Promise<void> => {
        const qa = await bootstrap(
            loadAppConfig({ OPENAI_API_KEY: 'test-key', QA_SOURCES: 'youtube,pdf=PDF' }),
            {
                completionClient: options.client ?? fakeClient(),
                openBackend:
                    options.open ?? (async (name) => backend(name, [`${name} snippet`])),
                logger: silentLogger,
            }
        );
        server = await listen(createApp(qa, { logger: silentLogger }));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server is not listening on a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    };

    const post = (path: string, body: unknown): Promise<Response> =>
        fetch(`${baseUrl}${path}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        });

    const readOutcome = async (response: Response): Promise<unknown> => {
        const body: unknown = await response.json();
        return typeof body === 'object' && body !== null && 'outcome' in body
            ? body.outcome
            : undefined;
    };

    const pdfMissing: BackendOpener = async (name) => {
        if (name === 'pdf') {
            throw new Error('missing');
        }
        return backend(name, [`${name} snippet`]);
    };

    afterEach(async () => {
        const running = server;
        server = undefined;
        if (!running) {
            return;
        }
        running.closeAllConnections();
        await new Promise<void>((resolve) => running.close(() => resolve()));
    });

    describe('GET /api/health', () => {
        it('should be ok when the API answers and every source loaded', async () => {
            await start();

            const response = await fetch(`${baseUrl}/api/health`);

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual({
                status: 'ok',
                generation: true,
                sources: { loaded: ['youtube', 'pdf'], failed: [] },
            });
        });

        it('should be degraded when a source failed to load', async () => {
            await start({ open: pdfMissing });

            const response = await fetch(`${baseUrl}/api/health`);

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual({
                status: 'degraded',
                generation: true,
                sources: {
                    loaded: ['youtube'],
                    failed: [{ sourceName: 'pdf', message: 'Error loading pdf index: missing' }],
                },
            });
        });

        it('should be an error when the API is unreachable', async () => {
            await start({ client: fakeClient({ isAvailable: jest.fn().mockResolvedValue(false) }) });

            const response = await fetch(`${baseUrl}/api/health`);

            expect(response.status).toBe(503);
            expect(await response.json()).toMatchObject({ status: 'error', generation: false });
        });

        it('should be an error when no source loaded', async () => {
            await start({ open: jest.fn().mockRejectedValue(new Error('missing')) });

            const response = await fetch(`${baseUrl}/api/health`);

            expect(response.status).toBe(503);
            expect(await response.json()).toMatchObject({ status: 'error', generation: true });
        });
    });

    describe('sources', () => {
        it('should list configured sources with their load status', async () => {
            await start({ open: pdfMissing });

            const response = await fetch(`${baseUrl}/api/sources`);

            expect(await response.json()).toEqual({
                sources: [
                    { name: 'youtube', location: 'youtube', loaded: true },
                    {
                        name: 'pdf',
                        location: 'PDF',
                        loaded: false,
                        error: 'Error loading pdf index: missing',
                    },
                ],
            });
        });

        it('should reopen sources on reload', async () => {
            let pdfReady = false;
            await start({
                open: async (name) => {
                    if (name === 'pdf' && !pdfReady) {
                        throw new Error('missing');
                    }
                    return backend(name, [`${name} snippet`]);
                },
            });
            pdfReady = true;

            const response = await post('/api/sources/reload', {});

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual({
                sources: [
                    { name: 'youtube', location: 'youtube', loaded: true },
                    { name: 'pdf', location: 'PDF', loaded: true },
                ],
            });
        });
    });

    describe('POST /api/ask', () => {
        it('should answer and assign a client id', async () => {
            await start();

            const response = await post('/api/ask', { question: 'What is in the slides?' });

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual({
                clientId: expect.stringMatching(/^[0-9a-f-]{36}$/),
                outcome: {
                    kind: 'answer',
                    text: 'An answer.',
                    sources: ['youtube', 'pdf'],
                    sourceFailures: [],
                },
            });
        });

        it('should echo the client id it was given', async () => {
            await start();

            const response = await post('/api/ask', { question: 'q', clientId: 'client-1' });

            expect(await response.json()).toMatchObject({ clientId: 'client-1' });
        });

        it.each([{ question: '   ' }, {}])('should ask for a question on %j', async (payload) => {
            await start();

            const response = await post('/api/ask', payload);

            expect(response.status).toBe(400);
            expect(await readOutcome(response)).toEqual({
                kind: 'invalid-input',
                message: 'Please enter a question.',
            });
        });

        it('should reject a question that is not a string', async () => {
            await start();

            const response = await post('/api/ask', { question: 42 });

            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: 'question must be a string',
                code: 'INVALID_QUERY',
            });
        });

        it('should reject a body that is not valid JSON', async () => {
            await start();

            const response = await fetch(`${baseUrl}/api/ask`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: '{"question":',
            });

            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: 'Request body is not valid JSON',
                code: 'INVALID_BODY',
            });
        });

        it('should reject a client id that is not a string', async () => {
            await start();

            const response = await post('/api/ask', { question: 'q', clientId: 7 });

            expect(response.status).toBe(400);
            expect(await response.json()).toEqual({
                error: 'clientId must be a string',
                code: 'INVALID_CLIENT_ID',
            });
        });

        it('should report no context without generating', async () => {
            const client = fakeClient();
            await start({ client, open: async (name) => backend(name, []) });

            const response = await post('/api/ask', { question: 'q' });

            expect(response.status).toBe(200);
            expect(await readOutcome(response)).toEqual({
                kind: 'no-context',
                message: 'No relevant context found for your question.',
                sourceFailures: [],
            });
            expect(client.generateCompletion).not.toHaveBeenCalled();
        });

        it('should report a generation failure as a bad gateway', async () => {
            await start({
                client: fakeClient({
                    generateCompletion: jest.fn().mockRejectedValue(new Error('Rate limited: slow down')),
                }),
            });

            const response = await post('/api/ask', { question: 'q' });

            expect(response.status).toBe(502);
            expect(await readOutcome(response)).toEqual({
                kind: 'error',
                message: 'Error during retrieval or processing: Rate limited: slow down',
                code: 'GENERATION_FAILED',
            });
        });
    });
});

describe('statusForOutcome', () => {
    const cases: Array<[QAOutcome, number]> = [
        [{ kind: 'answer', text: 'a', sources: [], sourceFailures: [] }, 200],
        [{ kind: 'no-context', message: 'm', sourceFailures: [] }, 200],
        [{ kind: 'invalid-input', message: 'm' }, 400],
        [{ kind: 'superseded' }, 409],
        [{ kind: 'error', message: 'm', code: 'GENERATION_FAILED' }, 502],
    ];

    it.each(cases)('should map %j to %i', (outcome, status) => {
        expect(statusForOutcome(outcome)).toBe(status);
    });
});

describe('ClientControllers', () => {
    const controller = (): QASessionController =>
        new QASessionController({
            registry: new BackendRegistry(),
            generator: { generate: jest.fn() },
            logger: silentLogger,
        });

    it('should reuse the controller of a known client', () => {
        const clients = new ClientControllers(controller, 10);

        expect(clients.get('a')).toBe(clients.get('a'));
        expect(clients.get('b')).not.toBe(clients.get('a'));
        expect(clients.size).toBe(2);
    });

    it('should drop the least recently used client past the limit', () => {
        const clients = new ClientControllers(controller, 2);
        const a = clients.get('a');
        clients.get('b');
        clients.get('a');
        clients.get('c');

        expect(clients.size).toBe(2);
        expect(clients.get('a')).toBe(a);
        expect(clients.size).toBe(2);
    });
});

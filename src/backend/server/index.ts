/**
 * Express Server Configuration and Routes
 *
 * HTTP surface of the Q&A service. It exposes REST endpoints for:
 * - Health checks (generation API reachability, loaded sources)
 * - Source status and reloading
 * - Asking a question
 *
 * Routes delegate to the application object built by bootstrap(); the
 * server holds no state of its own beyond one controller per client.
 */

import { Server } from 'http';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import {
    AskRequest,
    AskResponse,
    HealthResponse,
    QAOutcome,
    SourceFailure,
    SourceStatus,
} from '../../shared/types';
import { QAApplication } from '../bootstrap';
import { QAErrorCode } from '../errors';
import { Logger } from '../logging';
import { QASessionController } from '../services/qaSessionController';
import { RegistryBuildResult } from '../services/backendRegistry';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    /** Controllers kept for distinct clients before the oldest is dropped */
    maxClients: number;
    logger?: Logger;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
    maxClients: 1000,
};

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

/**
 * HTTP status for each cycle outcome.
 */
export function statusForOutcome(outcome: QAOutcome): number {
    switch (outcome.kind) {
        case 'answer':
        case 'no-context':
            return 200;
        case 'invalid-input':
            return 400;
        case 'superseded':
            return 409;
        case 'error':
            return 502;
    }
}

/**
 * One controller per client, oldest dropped first once `maxClients` is hit.
 *
 * Controllers keep no conversation history; a client needs its own only so
 * that its newer question supersedes its older one.
 */
export class ClientControllers {
    private readonly controllers = new Map<string, QASessionController>();

    constructor(
        private readonly create: () => QASessionController,
        private readonly maxClients: number
    ) {}

    get(clientId: string): QASessionController {
        let controller = this.controllers.get(clientId);
        if (controller) {
            // Re-insert to mark as most recently used
            this.controllers.delete(clientId);
        } else {
            controller = this.create();
        }
        this.controllers.set(clientId, controller);

        while (this.controllers.size > this.maxClients) {
            const oldest = this.controllers.keys().next();
            if (oldest.done) {
                break;
            }
            this.controllers.delete(oldest.value);
        }

        return controller;
    }

    get size(): number {
        return this.controllers.size;
    }
}

function describeSources(snapshot: RegistryBuildResult): SourceStatus[] {
    return snapshot.results.map(({ source, result }) =>
        result.ok
            ? { name: source.name, location: source.location, loaded: true }
            : {
                  name: source.name,
                  location: source.location,
                  loaded: false,
                  error: result.error.message,
              }
    );
}

function failedSources(snapshot: RegistryBuildResult): SourceFailure[] {
    return snapshot.loadFailures.map((error) => ({
        sourceName: error.sourceName,
        message: error.message,
    }));
}

/**
 * Creates and configures the Express application.
 *
 * @param qa - The wired application (registry, generator, controllers)
 * @param config - Server configuration options
 */
export function createApp(qa: QAApplication, config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const logger = mergedConfig.logger ?? console;
    const app = express();
    const clients = new ClientControllers(() => qa.createController(), mergedConfig.maxClients);

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '100kb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * - ok: generation API reachable and every source loaded
     * - degraded: reachable, some sources failed to load
     * - error (503): unreachable, or no source loaded at all
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        const snapshot = qa.registry.snapshot();
        const loaded = snapshot.registry.names();
        const failed = failedSources(snapshot);

        let generation = false;
        try {
            generation = await qa.completionClient.isAvailable();
        } catch (error) {
            logger.error('Health check error:', error);
        }

        let status: HealthResponse['status'];
        if (!generation || loaded.length === 0) {
            status = 'error';
        } else if (failed.length > 0) {
            status = 'degraded';
        } else {
            status = 'ok';
        }

        const response: HealthResponse = {
            status,
            generation,
            sources: { loaded, failed },
        };

        res.status(status === 'error' ? 503 : 200).json(response);
    });

    // =========================================================================
    // Source Endpoints
    // =========================================================================

    /**
     * GET /api/sources
     *
     * Configured sources in order, with their load status.
     */
    app.get('/api/sources', (_req: Request, res: Response) => {
        res.json({ sources: describeSources(qa.registry.snapshot()) });
    });

    /**
     * POST /api/sources/reload
     *
     * Re-open every configured index and publish the new registry.
     * Cycles already running keep the registry they started with.
     */
    app.post('/api/sources/reload', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const snapshot = await qa.reloadSources();
            res.json({ sources: describeSources(snapshot) });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Question Endpoint
    // =========================================================================

    /**
     * POST /api/ask
     *
     * Runs one question/answer cycle. A client without an id gets one,
     * echoed back so its next question can supersede this one.
     */
    app.post('/api/ask', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body: Partial<AskRequest> =
                typeof req.body === 'object' && req.body !== null ? req.body : {};

            if (body.question !== undefined && typeof body.question !== 'string') {
                throw new ApiError('question must be a string', 400, QAErrorCode.INVALID_QUERY);
            }
            if (body.clientId !== undefined && typeof body.clientId !== 'string') {
                throw new ApiError('clientId must be a string', 400, 'INVALID_CLIENT_ID');
            }

            const clientId = body.clientId || uuidv4();
            const outcome = await clients.get(clientId).ask(body.question ?? '');

            const response: AskResponse = { clientId, outcome };
            res.status(statusForOutcome(outcome)).json(response);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        // express.json() marks unparseable bodies with this type
        if ('type' in err && err.type === 'entity.parse.failed') {
            res.status(400).json({
                error: 'Request body is not valid JSON',
                code: 'INVALID_BODY',
            });
            return;
        }

        if (err instanceof ApiError) {
            res.status(err.statusCode).json({
                error: err.message,
                code: err.code,
            });
            return;
        }

        logger.error('Unhandled error:', err);

        // Generic error response (don't leak internal details)
        res.status(500).json({
            error: 'Internal server error',
        });
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @returns Promise that resolves with the listening server
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port,
    logger: Logger = console
): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            logger.log(`Q&A server running on port ${port}`);
            logger.log(`Health check: http://localhost:${port}/api/health`);
            resolve(server);
        });
        server.on('error', reject);
    });
}

/**
 * Create the app for `qa` and optionally start listening.
 */
export async function createServer(
    qa: QAApplication,
    config: Partial<ServerConfig> = {},
    autoStart: boolean = false
): Promise<Express> {
    const app = createApp(qa, config);

    if (autoStart) {
        await startServer(app, config.port ?? DEFAULT_SERVER_CONFIG.port, config.logger);
    }

    return app;
}

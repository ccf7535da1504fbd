/**
 * Backend module entry point
 *
 * - config/: environment configuration
 * - clients/: external service clients (completion + embeddings)
 * - services/: registry, aggregator, generator, session controller
 * - server/: Express app and route handlers
 *
 * When run directly, this file loads `.env`, wires the application once
 * and starts the server. When imported, it exports the building blocks.
 */

import dotenv from 'dotenv';
import { loadAppConfig } from './config/appConfig';
import { bootstrap } from './bootstrap';
import { createServer } from './server';

export {
    createApp,
    createServer,
    startServer,
    statusForOutcome,
    ApiError,
    ClientControllers,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig } from './server';

export * from './services';

export * from './clients';

export * from './errors';

export { loadAppConfig, parseSourceList, DEFAULT_SOURCES } from './config/appConfig';
export type { AppConfig } from './config/appConfig';

export { bootstrap } from './bootstrap';
export type { QAApplication, BootstrapOptions } from './bootstrap';

export { silentLogger } from './logging';
export type { Logger } from './logging';

async function main(): Promise<void> {
    dotenv.config();

    const config = loadAppConfig();
    const qa = await bootstrap(config);
    await createServer(qa, { port: config.port, corsOrigin: config.corsOrigin }, true);
}

if (require.main === module) {
    main()
        .then(() => {
            console.log('Server started successfully');
        })
        .catch((error: Error) => {
            console.error('Failed to start server:', error);
            process.exit(1);
        });
}

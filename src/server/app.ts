import express, { type Express, type Request, type Response } from 'express';
import { createArchitectureRoutes, type ArchitectureRouteDeps } from './routes/architectureRoutes.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { asyncHandler } from './utils/errorHandling.js';

export interface AppDeps extends ArchitectureRouteDeps {
    /** Ping result for /healthz; null when no database is configured */
    checkDatabase(): Promise<boolean | null>;
}

/**
 * Build the Express application. Kept free of process-level side effects so
 * index.ts owns startup and shutdown.
 */
export function createApp(deps: AppDeps): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: '100kb' }));

    app.get('/healthz', asyncHandler(async (_req: Request, res: Response) => {
        const mongo = await deps.checkDatabase();
        // Only a configured database that fails its ping makes the service unhealthy
        res.json({ ok: mongo !== false, mongo });
    }));

    app.use('/api', createArchitectureRoutes(deps));

    app.use(notFoundHandler);
    // Must be registered last
    app.use(errorHandler);
    return app;
}

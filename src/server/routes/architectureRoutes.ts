import { Router, type Request, type Response } from 'express';
import type { ArchitectureStore } from '../models/Architecture.js';
import type { ArchitectureScrapeService } from '../services/scraping/ArchitectureScrapeService.js';
import type { ArchitectureSink } from '../types/architecture.js';
import { BadRequestError } from '../types/errors.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { validateRequest } from '../middleware/validation.js';
import { architectureListQuerySchema, scrapeRequestSchema } from '../validation/architectureSchemas.js';
import { logger } from '../utils/logger.js';

export interface ArchitectureRouteDeps {
    /** Builds the pipeline for one pass; an undefined sink makes it a dry run */
    createScrapeService(sink: ArchitectureSink | undefined): ArchitectureScrapeService;
    /** The document store, or undefined when no database is configured */
    getStore(): ArchitectureStore | undefined;
    /** Sources used when a scrape request names none */
    defaultSources: readonly string[];
}

export function createArchitectureRoutes(deps: ArchitectureRouteDeps): Router {
    const router = Router();

    // Run one scrape pass and return its summary
    router.post('/scrape', asyncHandler(async (req: Request, res: Response) => {
        const body = validateRequest(scrapeRequestSchema, req.body ?? {}, 'body');
        const store = deps.getStore();
        if (body.save && !store) {
            throw new BadRequestError('save=true requires a configured database (MONGODB_URI)');
        }

        // Stop issuing upstream calls once the client has gone away
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) controller.abort();
        });

        const sources = body.sources ?? deps.defaultSources;
        const service = deps.createScrapeService(body.save ? store : undefined);
        const summary = await service.run({ sources, limit: body.limit, signal: controller.signal });

        logger.info(
            { sources: sources.length, written: summary.documentsWritten, errors: summary.errors.length },
            'Scrape request completed'
        );
        res.json({
            count: summary.documents.length,
            saved: body.save,
            ...summary,
        });
    }));

    // List stored architectures
    router.get('/architectures', asyncHandler(async (req: Request, res: Response) => {
        const query = validateRequest(architectureListQuerySchema, req.query, 'query');
        const store = deps.getStore();
        if (!store) {
            throw new BadRequestError('Listing architectures requires a configured database (MONGODB_URI)');
        }

        const [items, total] = await Promise.all([
            store.findAll(query),
            store.count({ q: query.q, minResources: query.minResources }),
        ]);
        res.json({
            items,
            total,
            skip: query.skip,
            limit: query.limit,
        });
    }));

    return router;
}

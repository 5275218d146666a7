import { z } from 'zod';
import { scraperConfig } from '../config/scraperConfig.js';

// Query strings arrive as text
const queryInt = (min: number, max: number = Number.MAX_SAFE_INTEGER) => z.coerce.number().int().min(min).max(max);

export const scrapeRequestSchema = z
    .object({
        sources: z.array(z.string().min(1)).min(1).optional(),
        limit: z.number().int().min(1).max(500).default(scraperConfig.defaultLimit),
        save: z.boolean().default(true),
    })
    .strict();

export const architectureListQuerySchema = z.object({
    skip: queryInt(0).default(0),
    limit: queryInt(1, 200).default(50),
    q: z.string().trim().max(200).optional(),
    minResources: queryInt(0).optional(),
    sortBy: z.enum(['name', 'resourceCount']).default('name'),
    sortDir: z.enum(['asc', 'desc']).default('asc'),
});

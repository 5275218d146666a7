/**
 * Run one scrape pass over the configured sources and print the summary
 *
 * Usage:
 *   tsx src/server/scripts/scrape-architectures.ts [--dry-run] [--limit N] [--sources Owner/Repo[:subdir],...]
 *
 * --dry-run normalizes templates without writing them to MongoDB.
 */

import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { closeDB, connectDB } from '../config/database.js';
import { closeHttpAgents } from '../config/httpClient.js';
import { Architecture } from '../models/Architecture.js';
import { createScrapePipeline } from '../services/scraping/scrapePipelineFactory.js';
import { parseSourceList } from '../services/templates/sourceSpec.js';
import type { ScrapeSummary } from '../types/architecture.js';
import { ConfigurationError } from '../types/errors.js';

export interface CliOptions {
    dryRun: boolean;
    limit?: number;
    sources?: string[];
}

/**
 * @throws ConfigurationError for unknown flags or a malformed value
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = { dryRun: false };
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--dry-run') {
            options.dryRun = true;
        } else if (arg === '--limit') {
            const value = Number(argv[++i]);
            if (!Number.isInteger(value) || value < 1) {
                throw new ConfigurationError(`--limit expects a positive integer, got "${argv[i]}"`);
            }
            options.limit = value;
        } else if (arg === '--sources') {
            const value = argv[++i];
            if (!value) {
                throw new ConfigurationError('--sources expects a comma-separated list');
            }
            options.sources = parseSourceList(value);
        } else {
            throw new ConfigurationError(`Unknown argument "${arg}"`);
        }
    }
    return options;
}

function printSummary(summary: ScrapeSummary, dryRun: boolean): void {
    console.log('\n📊 Scrape summary');
    console.log('='.repeat(60));
    console.log(`   Documents normalized: ${summary.documents.length}`);
    console.log(`   Documents written:    ${dryRun ? '(dry run)' : summary.documentsWritten}`);
    console.log(`   Documents failed:     ${summary.documentsFailed}`);
    console.log(`   Files skipped:        ${summary.filesSkipped}`);
    if (summary.cancelled) console.log('   ⚠️  Pass was cancelled before completion');
    if (summary.aborted) console.log('   ❌ Pass aborted: credential rejected');

    if (summary.errors.length > 0) {
        console.log(`\n⚠️  Errors (${summary.errors.length}):`);
        for (const error of summary.errors) {
            console.log(`   [${error.kind}] ${error.source}${error.path ? ` ${error.path}` : ''}: ${error.message}`);
        }
    }
}

async function scrapeArchitectures(argv: readonly string[]): Promise<ScrapeSummary> {
    const options = parseCliArgs(argv);
    const env = getEnv();
    const pipeline = createScrapePipeline(env);

    let store: Architecture | undefined;
    if (!options.dryRun) {
        if (!env.MONGODB_URI) {
            throw new ConfigurationError('MONGODB_URI is not set; use --dry-run to scrape without saving');
        }
        store = new Architecture(await connectDB(), env.MONGO_COLL_NAME);
        await store.ensureIndexes();
    }

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    try {
        const summary = await pipeline.createService(store).run({
            sources: options.sources ?? env.GITHUB_SOURCES,
            limit: options.limit,
            signal: controller.signal,
        });
        printSummary(summary, options.dryRun);
        return summary;
    } finally {
        closeHttpAgents();
        await closeDB();
    }
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    scrapeArchitectures(process.argv.slice(2))
        .then((summary) => {
            process.exit(summary.aborted ? 1 : 0);
        })
        .catch((error) => {
            console.error('\n❌ Script failed:', error);
            process.exit(1);
        });
}

export { scrapeArchitectures };

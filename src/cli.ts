#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { AppConfig, loadConfig, loadDotenv } from './config';
import { withClient } from './core/http/http_client';
import { RegistryClient } from './core/registry/registry_client';
import { ExportManager, timestampedBasename, toJsonRecord } from './export/export_manager';
import { DEFAULT_CATEGORY } from './pipeline/categories';
import { ProspectFinder } from './pipeline/prospect_finder';
import { Prospect } from './types';
import { ConfigurationError, toError } from './utils/errors';
import { Logger } from './utils/logger';

interface FindCommandOptions {
    category?: string;
    query?: string;
    max: string;
    enrich: boolean;
    dedupe?: boolean;
    out?: string;
}

function bootstrap(): { config: AppConfig; logger: Logger } {
    loadDotenv();
    const config = loadConfig();
    const logger = new Logger(config.logging);
    return { config, logger };
}

function parseMax(raw: string): number {
    const n = Number.parseInt(raw, 10);
    if (!Number.isFinite(n) || n < 1) {
        throw new ConfigurationError(`--max must be a positive integer, got "${raw}"`);
    }
    return n;
}

function summarize(logger: Logger, prospects: Prospect[]): void {
    logger.info('='.repeat(60));
    logger.info(`Found ${prospects.length} prospects`);
    logger.info('='.repeat(60));

    prospects.slice(0, 5).forEach((prospect, i) => {
        logger.info(`${i + 1}. ${prospect.name}`);
        logger.info(`   Address: ${prospect.address ?? '-'}`);
        logger.info(`   Phone: ${prospect.phone ?? '-'}`);
        if (prospect.registryId) logger.info(`   IČO: ${prospect.registryId}`);
        if (prospect.owners.length > 0) {
            logger.info(`   Owners: ${prospect.owners.map((o) => o.name).join(', ')}`);
        }
    });
}

async function runFind(options: FindCommandOptions): Promise<void> {
    const { config, logger } = bootstrap();
    const maxResults = parseMax(options.max);
    const finder = new ProspectFinder(config, { logger });
    const findOptions = { maxResults, enrich: options.enrich, dedupe: options.dedupe ?? false };

    const prospects = options.query
        ? await finder.findByQuery(options.query, findOptions)
        : await finder.findByCategory(options.category ?? DEFAULT_CATEGORY, findOptions);

    const outputDir = path.resolve(options.out ?? config.output.directory);
    const exporter = new ExportManager(logger);
    await exporter.exportAll(prospects, outputDir, timestampedBasename('prospects'));

    summarize(logger, prospects);
}

async function runCompany(id: string): Promise<void> {
    const { config, logger } = bootstrap();

    const result = await withClient(new RegistryClient(config.registry, { logger }), async (registry) => {
        const company = await registry.searchById(id);
        if (!company) return undefined;
        if (company.registryId) {
            company.owners = await registry.getOwners(company.registryId);
        }
        return company;
    });

    if (!result) {
        logger.warn(`No registry record found for "${id}"`);
        process.exitCode = 2;
        return;
    }
    console.log(JSON.stringify(toJsonRecord(result), null, 2));
}

function fail(e: unknown): never {
    const error = toError(e);
    console.error(`\n❌ ${error.message}`);
    if (error instanceof ConfigurationError) {
        error.issues.forEach((issue) => console.error(`  • ${issue}`));
        console.error('\nCheck your .env file and try again.\n');
    }
    process.exit(1);
}

const program = new Command();

program
    .name('prospect-finder')
    .description('Find Prague businesses and enrich them with Czech registry data')
    .version('1.0.0');

program
    .command('find')
    .description('Search places by category or free-text query and export CSV + JSON')
    .option('-c, --category <name>', `Business category (default: ${DEFAULT_CATEGORY})`)
    .option('-q, --query <text>', 'Free-text search query (overrides --category)')
    .option('-m, --max <n>', 'Maximum number of prospects', '20')
    .option('--no-enrich', 'Skip registry enrichment')
    .option('--dedupe', 'Drop repeats by normalized name + address')
    .option('-o, --out <dir>', 'Output directory (default: OUTPUT_DIR)')
    .action(async (options: FindCommandOptions) => {
        try {
            await runFind(options);
        } catch (e) {
            fail(e);
        }
    });

program
    .command('company')
    .description('Look up a company by IČO and list its owners')
    .argument('<id>', 'Company IČO (8 digits, separators allowed)')
    .action(async (id: string) => {
        try {
            await runCompany(id);
        } catch (e) {
            fail(e);
        }
    });

program.parseAsync(process.argv).catch(fail);

// src/cli/resolve.ts
import { Command } from 'commander';
import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { loadConfigTree } from '../loader/tree-loader.js';
import { ScopeResolver } from '../resolver/scope-resolver.js';
import { OBJECT_TYPES, isObjectType } from '../resolver/object-types.js';
import { RouterAggregator } from '../resolver/router-aggregator.js';
import { ObjectType } from '../resolver/types.js';
import { formatSummary, summarize, writeCatalogs } from '../output/catalog-writer.js';
import config from '../config/index.js';

const logger = createContextLogger('ResolveCmd');

interface ResolveOptions {
    outputDir?: string;
    types?: string; // Comma-separated object types
}

function parseTypes(value: string | undefined): ObjectType[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    const requested = value.split(',').map(type => type.trim()).filter(type => type.length > 0);
    const unknown = requested.filter(type => !isObjectType(type));
    if (unknown.length > 0) {
        throw new Error(`Unknown object type(s): ${unknown.join(', ')}`);
    }
    return requested.filter(isObjectType);
}

export function registerResolveCommand(program: Command): void {
    program
        .command('resolve <input>')
        .description('Resolve every named object of a configuration export into per-type JSON catalogs.')
        .option('-o, --output-dir <dir>', `Output directory (default: ${config.catalogOutputDir} next to the input file)`)
        .option('-t, --types <types>', `Comma-separated object types (default: all of ${OBJECT_TYPES.length})`)
        .action(async (input: string, options: ResolveOptions) => {
            logger.info(`Received resolve command for input: ${input}`);

            try {
                const types = parseTypes(options.types);
                const tree = await loadConfigTree(input);

                const catalogs = new ScopeResolver(tree).resolveAll(types);
                const routers = new RouterAggregator(tree).resolveRouters();

                for (const line of formatSummary(summarize(catalogs, routers))) {
                    logger.info(`  - ${line}`);
                }

                const outputDir = options.outputDir
                    ? path.resolve(options.outputDir)
                    : path.join(path.dirname(path.resolve(input)), config.catalogOutputDir);
                const written = await writeCatalogs(outputDir, catalogs, routers);
                logger.info(`Wrote ${written.length} files to ${outputDir}`);
            } catch (error: unknown) {
                logger.error(`Resolve command failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });
}

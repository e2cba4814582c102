// src/cli/split.ts
import { Command } from 'commander';
import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { loadConfigTree } from '../loader/tree-loader.js';
import { DeviceGroupExtractor } from '../extractor/device-group-extractor.js';
import { writeBundle } from '../output/bundle-writer.js';
import config from '../config/index.js';

const logger = createContextLogger('SplitCmd');

interface SplitOptions {
    outputDir?: string;
    groups?: string; // Comma-separated device-group names
}

export function registerSplitCommand(program: Command): void {
    program
        .command('split <input>')
        .description('Split a configuration export into one self-contained XML document per device group.')
        .option('-o, --output-dir <dir>', `Output directory (default: ${config.splitOutputDir} next to the input file)`)
        .option('-g, --groups <names>', 'Comma-separated device groups to extract (default: all)')
        .action(async (input: string, options: SplitOptions) => {
            logger.info(`Received split command for input: ${input}`);

            try {
                const tree = await loadConfigTree(input);
                const extractor = new DeviceGroupExtractor(tree);

                const available = extractor.listDeviceGroups();
                if (available.length === 0) {
                    logger.error('No device groups found. The input may be a single firewall export.');
                    process.exitCode = 1;
                    return;
                }
                logger.info(`Found ${available.length} device groups: ${available.join(', ')}`);

                const requested = options.groups
                    ? options.groups.split(',').map(name => name.trim()).filter(name => name.length > 0)
                    : available;

                const outputDir = options.outputDir
                    ? path.resolve(options.outputDir)
                    : path.join(path.dirname(path.resolve(input)), config.splitOutputDir);

                let written = 0;
                for (const result of extractor.extractAll(requested)) {
                    if (result.status === 'not-found') {
                        logger.warn(`Skipping ${result.groupName}: no such device group`);
                        continue;
                    }
                    const filePath = await writeBundle(outputDir, result.bundle);
                    logger.info(`Saved ${result.groupName} to ${filePath}`);
                    written++;
                }

                if (written === 0) {
                    logger.error('None of the requested device groups were found.');
                    process.exitCode = 1;
                    return;
                }
                logger.info(`Split ${written} of ${requested.length} device groups into ${outputDir}`);
            } catch (error: unknown) {
                logger.error(`Split command failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });
}

// src/output/catalog-writer.ts
import fs from 'fs/promises';
import path from 'path';
import { CatalogSet } from '../resolver/scope-resolver.js';
import { descriptorFor } from '../resolver/object-types.js';
import { ObjectType } from '../resolver/types.js';
import { RouterDescriptor } from '../resolver/router-aggregator.js';
import { FileSystemError, errorMessage } from '../utils/errors.js';
import { ensureDir } from './bundle-writer.js';

export interface CatalogCount {
    type: ObjectType;
    label: string;
    full: number;
    stub: number;
}

export interface ResolutionSummary {
    objects: CatalogCount[];
    routers: { legacy: number; advanced: number; total: number };
}

export function summarize(catalogs: CatalogSet, routers: readonly RouterDescriptor[]): ResolutionSummary {
    const objects: CatalogCount[] = [];
    for (const [type, catalog] of catalogs) {
        objects.push({
            type,
            label: descriptorFor(type)?.label ?? type,
            full: catalog.countBy('full'),
            stub: catalog.countBy('stub'),
        });
    }

    const legacy = routers.filter(router => router.kind === 'legacy').length;
    const advanced = routers.filter(router => router.kind === 'advanced').length;
    return { objects, routers: { legacy, advanced, total: legacy + advanced } };
}

/** One line per object type, plus router counts. */
export function formatSummary(summary: ResolutionSummary): string[] {
    const lines = summary.objects.map(count => {
        const unresolved = count.stub > 0 ? ` (${count.stub} unresolved references)` : '';
        return `${count.full + count.stub} ${count.label}${unresolved}`;
    });
    if (summary.routers.advanced > 0) {
        lines.push(`${summary.routers.legacy} virtual routers (legacy)`);
        lines.push(`${summary.routers.advanced} logical routers (advanced routing)`);
    } else {
        lines.push(`${summary.routers.legacy} virtual routers`);
    }
    return lines;
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
    try {
        await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    } catch (error: unknown) {
        throw new FileSystemError(`Cannot write ${filePath}: ${errorMessage(error)}`, { originalError: error });
    }
}

/**
 * Writes `<type>.json` for every non-empty catalog, `routers.json` and `summary.json`.
 * Returns the written paths.
 */
export async function writeCatalogs(
    dir: string,
    catalogs: CatalogSet,
    routers: readonly RouterDescriptor[],
): Promise<string[]> {
    await ensureDir(dir);
    const written: string[] = [];

    for (const [type, catalog] of catalogs) {
        if (catalog.size === 0) {
            continue;
        }
        const filePath = path.join(dir, `${type}.json`);
        await writeJson(filePath, catalog);
        written.push(filePath);
    }

    const routersPath = path.join(dir, 'routers.json');
    await writeJson(routersPath, routers);
    written.push(routersPath);

    const summaryPath = path.join(dir, 'summary.json');
    await writeJson(summaryPath, summarize(catalogs, routers));
    written.push(summaryPath);

    return written;
}

// src/output/bundle-writer.ts
import fs from 'fs/promises';
import path from 'path';
import { serializeConfigNode } from '../loader/xml-serializer.js';
import { DeviceGroupBundle } from '../extractor/device-group-extractor.js';
import { FileSystemError, errorMessage } from '../utils/errors.js';
import { createContextLogger } from '../utils/logger.js';

const logger = createContextLogger('BundleWriter');

/**
 * Turns a group name into a file name: path separators, whitespace and other
 * characters that are unsafe on common filesystems become `_`.
 */
export function sanitizeFileName(name: string): string {
    const sanitized = name.replace(/[\\/:*?"<>|\s\u0000-\u001f]/g, '_').replace(/^\.+/, '_');
    return sanitized.length > 0 ? sanitized : '_';
}

export async function ensureDir(dir: string): Promise<void> {
    try {
        await fs.mkdir(dir, { recursive: true });
    } catch (error: unknown) {
        throw new FileSystemError(`Cannot create output directory ${dir}: ${errorMessage(error)}`, {
            originalError: error,
        });
    }
}

/**
 * Writes one bundle as `<dir>/<sanitized group name>.xml` and returns the path.
 */
export async function writeBundle(dir: string, bundle: DeviceGroupBundle): Promise<string> {
    await ensureDir(dir);
    const filePath = path.join(dir, `${sanitizeFileName(bundle.groupName)}.xml`);
    try {
        await fs.writeFile(filePath, serializeConfigNode(bundle.document), 'utf-8');
    } catch (error: unknown) {
        throw new FileSystemError(`Cannot write bundle ${filePath}: ${errorMessage(error)}`, { originalError: error });
    }
    logger.debug(`Wrote ${bundle.groupName} to ${filePath}`);
    return filePath;
}

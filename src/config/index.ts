// src/config/index.ts
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const commaList = (fallback: string[]) =>
    z
        .string()
        .optional()
        .transform(value =>
            value === undefined
                ? fallback
                : value.split(',').map(item => item.trim()).filter(item => item.length > 0)
        );

const EnvSchema = z.object({
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
    TEMPLATE_NAME_PREFIXES: commaList(['DG-', 'dg-']),
    ROUTER_SIGNATURE_SIZE: z.coerce.number().int().positive().default(5),
    BUNDLE_DEVICE_NAME: z.string().min(1).default('localhost.localdomain'),
    DEFAULT_CONFIG_VERSION: z.string().min(1).default('10.0.0'),
    CATALOG_OUTPUT_DIR: z.string().min(1).default('catalog_output'),
    SPLIT_OUTPUT_DIR: z.string().min(1).default('split_configs'),
});

export interface AppConfig {
    logLevel: string;
    /** Naming-convention prefixes stripped from a device-group name before the exact template lookup. */
    templatePrefixes: string[];
    /** How many interface names take part in a router identity signature. */
    routerSignatureSize: number;
    /** Device entry name under which extracted bundles are placed. */
    bundleDeviceName: string;
    defaultConfigVersion: string;
    catalogOutputDir: string;
    splitOutputDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid environment configuration: ${details}`);
    }

    const values = parsed.data;
    return {
        logLevel: values.LOG_LEVEL,
        templatePrefixes: values.TEMPLATE_NAME_PREFIXES,
        routerSignatureSize: values.ROUTER_SIGNATURE_SIZE,
        bundleDeviceName: values.BUNDLE_DEVICE_NAME,
        defaultConfigVersion: values.DEFAULT_CONFIG_VERSION,
        catalogOutputDir: values.CATALOG_OUTPUT_DIR,
        splitOutputDir: values.SPLIT_OUTPUT_DIR,
    };
}

const config: AppConfig = loadConfig();

export default config;

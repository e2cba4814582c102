// src/config/index.spec.ts
import { describe, it, expect } from 'vitest';
import { loadConfig } from './index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            logLevel: 'info',
            templatePrefixes: ['DG-', 'dg-'],
            routerSignatureSize: 5,
            bundleDeviceName: 'localhost.localdomain',
            defaultConfigVersion: '10.0.0',
            catalogOutputDir: 'catalog_output',
            splitOutputDir: 'split_configs',
        });
    });

    it('should read overrides from the environment', () => {
        const config = loadConfig({
            LOG_LEVEL: 'debug',
            TEMPLATE_NAME_PREFIXES: 'SITE-, REGION- ,',
            ROUTER_SIGNATURE_SIZE: '3',
        });

        expect(config.logLevel).toBe('debug');
        expect(config.templatePrefixes).toEqual(['SITE-', 'REGION-']);
        expect(config.routerSignatureSize).toBe(3);
    });

    it('should reject invalid values with a ConfigError', () => {
        expect(() => loadConfig({ ROUTER_SIGNATURE_SIZE: 'many' })).toThrow(ConfigError);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});

describe('errorMessage', () => {
    it('should read messages from errors and stringify anything else', () => {
        expect(errorMessage(new ConfigError('bad'))).toBe('bad');
        expect(errorMessage('plain')).toBe('plain');
    });

    it('should keep the cause on wrapped errors', () => {
        const cause = new Error('disk full');
        const error = new ConfigError('cannot save', { originalError: cause });

        expect(error.name).toBe('ConfigError');
        expect(error.context.originalError).toBe(cause);
        expect(error.stack).toContain('Caused by: Error: disk full');
    });
});

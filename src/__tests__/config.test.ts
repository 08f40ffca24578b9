import { describe, it, expect, beforeEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { makeTempDir } from './fakes.js';

describe('resolveConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    function writeConfig(content: unknown): void {
        writeFileSync(join(dir, 'citegeo.config.json'), typeof content === 'string' ? content : JSON.stringify(content));
    }

    it('should fall back to defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: dir, env: {} });

        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should apply CLI flags over env vars over the config file', async () => {
        writeConfig({
            cache: 'file-cache.json',
            format: 'csv',
            column: 3,
            geocoder: { email: 'file@example.com', retry: { maxAttempts: 5 } },
        });

        const config = await resolveConfig(
            { format: 'geojson', geocoder: { provider: 'locationiq' } },
            { searchFrom: dir, env: { CITEGEO_GEOCODER_EMAIL: 'env@example.com', LOCATIONIQ_API_KEY: 'test-secret' } }
        );

        expect(config.cache).toBe('file-cache.json');
        expect(config.format).toBe('geojson');
        expect(config.column).toBe('3');
        expect(config.geocoder).toEqual({
            provider: 'locationiq',
            email: 'env@example.com',
            apiKey: 'test-secret',
            timeoutMs: 10000,
            retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000, jitter: 0.5 },
        });
    });

    it('should prefer a CLI email over the environment', async () => {
        const config = await resolveConfig(
            { geocoder: { email: 'cli@example.com' } },
            { searchFrom: dir, env: { CITEGEO_GEOCODER_EMAIL: 'env@example.com' } }
        );

        expect(config.geocoder.email).toBe('cli@example.com');
    });

    it('should reject invalid values', async () => {
        writeConfig({ format: 'xml' });
        await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(ConfigError);
    });

    it('should reject unknown keys', async () => {
        writeConfig({ outputDir: './out' });
        await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(ConfigError);
    });

    it('should reject malformed JSON', async () => {
        writeConfig('{ "cache": ');
        await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(ConfigError);
    });
});

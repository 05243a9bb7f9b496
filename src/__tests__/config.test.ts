import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG, DEFAULT_NAMESPACES, NAME_LANGUAGES } from '../types/index.js';

describe('DEFAULT_CONFIG', () => {
    it('should match at 0.85 by default', () => {
        expect(DEFAULT_CONFIG.threshold).toBe(0.85);
    });

    it('should read names from schema:name', () => {
        expect(DEFAULT_CONFIG.namePredicates).toEqual(['http://schema.org/name']);
    });

    it('should mint cards under the card namespace', () => {
        expect(DEFAULT_CONFIG.namespaces.card).toBe('http://metw.org/card/');
    });

    it('should resolve names in English, Spanish, French order', () => {
        expect(NAME_LANGUAGES).toEqual(['en', 'es', 'fr']);
    });
});

describe('resolveConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cardlink-config-'));
        vi.stubEnv('CARDLINK_LOG_LEVEL', '');
        vi.stubEnv('CARDLINK_CATALOG_URL', '');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function writeConfigFile(content: object): void {
        fs.writeFileSync(path.join(tmpDir, 'cardlink.config.json'), JSON.stringify(content), 'utf-8');
    }

    it('should fall back to defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir });
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should merge a config file over the defaults', async () => {
        writeConfigFile({ threshold: 0.9, namespaces: { card: 'http://example.org/card/' } });

        const config = await resolveConfig({}, { searchFrom: tmpDir });

        expect(config.threshold).toBe(0.9);
        expect(config.namespaces).toEqual({ ...DEFAULT_NAMESPACES, card: 'http://example.org/card/' });
    });

    it('should let CLI flags win over the config file', async () => {
        writeConfigFile({ threshold: 0.9 });

        const config = await resolveConfig({ threshold: 0.7 }, { searchFrom: tmpDir });
        expect(config.threshold).toBe(0.7);
    });

    it('should ignore flags that were not given', async () => {
        writeConfigFile({ threshold: 0.9, out: './out/kg.ttl' });

        const config = await resolveConfig({ threshold: undefined, out: undefined }, { searchFrom: tmpDir });

        expect(config.threshold).toBe(0.9);
        expect(config.out).toBe('./out/kg.ttl');
    });

    it('should read the log level and catalog URL from the environment', async () => {
        vi.stubEnv('CARDLINK_LOG_LEVEL', 'debug');
        vi.stubEnv('CARDLINK_CATALOG_URL', 'https://catalog.example.com/cards.json');

        const config = await resolveConfig({}, { searchFrom: tmpDir });

        expect(config.logLevel).toBe('debug');
        expect(config.catalogUrl).toBe('https://catalog.example.com/cards.json');
    });

    it('should reject an unknown log level in the environment', async () => {
        vi.stubEnv('CARDLINK_LOG_LEVEL', 'verbose');

        await expect(resolveConfig({}, { searchFrom: tmpDir })).rejects.toThrow(ConfigError);
    });

    it('should ignore an empty log level in the environment when a config file is present', async () => {
        writeConfigFile({ threshold: 0.9 });

        const config = await resolveConfig({}, { searchFrom: tmpDir });

        expect(config.threshold).toBe(0.9);
        expect(config.logLevel).toBe('info');
    });

    it('should reject an unknown log level in the environment when a config file is present', async () => {
        vi.stubEnv('CARDLINK_LOG_LEVEL', 'verbose');
        writeConfigFile({ threshold: 0.9 });

        await expect(resolveConfig({}, { searchFrom: tmpDir })).rejects.toThrow(ConfigError);
    });

    describe('command defaults', () => {
        it('should apply over the built-in defaults', async () => {
            const config = await resolveConfig({}, { searchFrom: tmpDir, defaults: { logLevel: 'warn' } });
            expect(config.logLevel).toBe('warn');
        });

        it('should lose to the config file', async () => {
            writeConfigFile({ logLevel: 'debug' });

            const config = await resolveConfig({}, { searchFrom: tmpDir, defaults: { logLevel: 'warn' } });
            expect(config.logLevel).toBe('debug');
        });

        it('should lose to the environment', async () => {
            vi.stubEnv('CARDLINK_LOG_LEVEL', 'info');

            const config = await resolveConfig({}, { searchFrom: tmpDir, defaults: { logLevel: 'warn' } });
            expect(config.logLevel).toBe('info');
        });

        it('should lose to CLI flags', async () => {
            const config = await resolveConfig(
                { logLevel: 'error' },
                { searchFrom: tmpDir, defaults: { logLevel: 'warn' } }
            );
            expect(config.logLevel).toBe('error');
        });
    });

    it('should reject a threshold outside [0, 1]', async () => {
        await expect(resolveConfig({ threshold: 1.5 }, { searchFrom: tmpDir })).rejects.toThrow(ConfigError);
        await expect(resolveConfig({ threshold: Number.NaN }, { searchFrom: tmpDir })).rejects.toThrow(ConfigError);
    });

    it('should reject invalid values in the config file', async () => {
        writeConfigFile({ threshold: 'high' });

        await expect(resolveConfig({}, { searchFrom: tmpDir })).rejects.toThrow(/threshold/);
    });
});

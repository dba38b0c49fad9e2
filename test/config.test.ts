import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig, parseArgs, resolveAnalysisConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseArgs', () => {
    it('reads every flag', () => {
        expect(parseArgs([
            '--mods-path=/games/mods',
            '--ingest=dump.json',
            '--config=policy.json',
            '--server-name=harmonizer',
            '--server-version=2.0.0',
            '--log-level=debug'
        ], {})).toEqual({
            modsPath: '/games/mods',
            ingestFile: 'dump.json',
            configFile: 'policy.json',
            serverName: 'harmonizer',
            serverVersion: '2.0.0',
            logLevel: 'debug',
            showHelp: false
        });
    });

    it('falls back to LOG_LEVEL and defaults', () => {
        const config = parseArgs(['-h', '--unknown=1'], { LOG_LEVEL: 'warn' });
        expect(config.logLevel).toBe('warn');
        expect(config.showHelp).toBe(true);
        expect(config.serverName).toBe('mod-harmonizer');
        expect(config.modsPath).toBe('');
    });
});

describe('resolveAnalysisConfig', () => {
    it('overlays given fields on the defaults', () => {
        const config = resolveAnalysisConfig({ essentialRecipes: ['pipe'], referenceContext: 'moon' });
        expect(config.essentialRecipes).toEqual(['pipe']);
        expect(config.referenceContext).toBe('moon');
        expect(config.basePackages).toEqual(DEFAULT_ANALYSIS_CONFIG.basePackages);
        expect(config.contexts).toBeUndefined();
    });
});

describe('loadAnalysisConfig', () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), 'config-test-'));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    it('loads the bundled policy', async () => {
        const config = await loadAnalysisConfig(fileURLToPath(new URL('../config/default.json', import.meta.url)));
        expect(config.referenceContext).toBe('lignumis');
        expect(config.contexts?.map(context => context.id)).toEqual(['nauvis', 'vulcanus', 'fulgora', 'gleba', 'aquilo', 'lignumis']);
        expect(config.patchFile).toBe('data-final-fixes.lua');
    });

    it('rejects out-of-range values with their path', async () => {
        const path = join(testDir, 'policy.json');
        await writeFile(path, JSON.stringify({ wideAvailabilityThreshold: 2 }));
        await expect(loadAnalysisConfig(path)).rejects.toBeInstanceOf(ConfigError);
        await expect(loadAnalysisConfig(path)).rejects.toThrow(`${path}: wideAvailabilityThreshold:`);
    });

    it('wraps unreadable files', async () => {
        await expect(loadAnalysisConfig(join(testDir, 'missing.json'))).rejects.toBeInstanceOf(ConfigError);
    });
});

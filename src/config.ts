import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface ContextConfig {
    id: string;
    resources: string[];
    technologies?: string[];
    machines?: string[];
}

export interface FallbackTier {
    tier: string;
    prerequisites: string[];
}

export interface AnalysisConfig {
    essentialRecipes: string[];
    referenceContext?: string;
    wideAvailabilityThreshold: number;
    builtInCategoryKinds: string[];
    defaultCraftingCategory: string;
    basePackages: string[];
    contexts?: ContextConfig[];
    contextKinds: string[];
    patchPackage: string;
    patchFile: string;
    technologyFallbackLadder: FallbackTier[];
    genericVariantFactors: {
        costMultiplier: number;
        sizeMultiplier: number;
    };
}

export const WIDE_AVAILABILITY_THRESHOLD = 0.75;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
    essentialRecipes: ['burner-inserter', 'inserter', 'transport-belt'],
    wideAvailabilityThreshold: WIDE_AVAILABILITY_THRESHOLD,
    builtInCategoryKinds: ['recipe-category', 'fuel-category', 'resource-category'],
    defaultCraftingCategory: 'crafting',
    basePackages: ['base', 'core'],
    contextKinds: ['planet'],
    patchPackage: 'mod-harmonizer-patch',
    patchFile: 'data-final-fixes.lua',
    technologyFallbackLadder: [
        { tier: 'basic', prerequisites: [] },
        { tier: 'advanced', prerequisites: ['automation'] },
        { tier: 'higher', prerequisites: ['electronics', 'steel-processing'] }
    ],
    genericVariantFactors: {
        costMultiplier: 0.5,
        sizeMultiplier: 2
    }
};

const ContextConfigSchema = z.object({
    id: z.string().min(1),
    resources: z.array(z.string()),
    technologies: z.array(z.string()).optional(),
    machines: z.array(z.string()).optional()
}).strict();

export const AnalysisConfigSchema = z.object({
    essentialRecipes: z.array(z.string()).optional(),
    referenceContext: z.string().min(1).optional(),
    wideAvailabilityThreshold: z.number().min(0).max(1).optional(),
    builtInCategoryKinds: z.array(z.string()).optional(),
    defaultCraftingCategory: z.string().min(1).optional(),
    basePackages: z.array(z.string()).optional(),
    contexts: z.array(ContextConfigSchema).optional(),
    contextKinds: z.array(z.string()).optional(),
    patchPackage: z.string().min(1).optional(),
    patchFile: z.string().min(1).optional(),
    technologyFallbackLadder: z.array(z.object({
        tier: z.string().min(1),
        prerequisites: z.array(z.string())
    }).strict()).optional(),
    genericVariantFactors: z.object({
        costMultiplier: z.number().positive(),
        sizeMultiplier: z.number().positive()
    }).strict().optional()
}).strict();

export type AnalysisConfigInput = z.infer<typeof AnalysisConfigSchema>;

export function resolveAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
    const defaults = DEFAULT_ANALYSIS_CONFIG;
    return {
        essentialRecipes: input.essentialRecipes ?? defaults.essentialRecipes,
        referenceContext: input.referenceContext ?? defaults.referenceContext,
        wideAvailabilityThreshold: input.wideAvailabilityThreshold ?? defaults.wideAvailabilityThreshold,
        builtInCategoryKinds: input.builtInCategoryKinds ?? defaults.builtInCategoryKinds,
        defaultCraftingCategory: input.defaultCraftingCategory ?? defaults.defaultCraftingCategory,
        basePackages: input.basePackages ?? defaults.basePackages,
        contexts: input.contexts ?? defaults.contexts,
        contextKinds: input.contextKinds ?? defaults.contextKinds,
        patchPackage: input.patchPackage ?? defaults.patchPackage,
        patchFile: input.patchFile ?? defaults.patchFile,
        technologyFallbackLadder: input.technologyFallbackLadder ?? defaults.technologyFallbackLadder,
        genericVariantFactors: input.genericVariantFactors ?? defaults.genericVariantFactors
    };
}

export async function loadAnalysisConfig(path: string): Promise<AnalysisConfig> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error), path);
    }

    const parsed = AnalysisConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
        throw new ConfigError(details.join('; '), path);
    }
    return resolveAnalysisConfig(parsed.data);
}

export interface ServerConfig {
    modsPath: string;
    ingestFile: string;
    configFile: string;
    serverName: string;
    serverVersion: string;
    logLevel: string;
    showHelp: boolean;
}

export const USAGE = [
    'Mod Harmonizer MCP Server',
    '',
    'Usage: tsx src/index.ts [--mods-path=<path>] [--ingest=<file>] [options]',
    '',
    'Sources (at least one):',
    '  --mods-path=<path>        Directory of unpacked packages (each with info.json and prototypes.json)',
    '  --ingest=<file>           Extractor dump holding ordered package batches',
    '',
    'Optional:',
    '  --config=<file>           Analysis policy JSON (essential recipes, contexts, reference context)',
    '  --server-name=<name>      Server name (default: mod-harmonizer)',
    '  --server-version=<ver>    Server version (default: 1.0.0)',
    '  --log-level=<level>       Logging level: debug, info, warn, error (default: info)',
    '  --help, -h                Show this help message',
    '',
    'Examples:',
    '  tsx src/index.ts --mods-path="/path/to/mods" --config=config/default.json',
    '  tsx src/index.ts --ingest=dump.json --log-level=debug'
].join('\n');

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const config: ServerConfig = {
        modsPath: '',
        ingestFile: '',
        configFile: '',
        serverName: 'mod-harmonizer',
        serverVersion: '1.0.0',
        logLevel: env.LOG_LEVEL || 'info',
        showHelp: false
    };

    for (const arg of args) {
        if (arg.startsWith('--mods-path=')) {
            config.modsPath = arg.substring('--mods-path='.length);
        } else if (arg.startsWith('--ingest=')) {
            config.ingestFile = arg.substring('--ingest='.length);
        } else if (arg.startsWith('--config=')) {
            config.configFile = arg.substring('--config='.length);
        } else if (arg.startsWith('--server-name=')) {
            config.serverName = arg.substring('--server-name='.length);
        } else if (arg.startsWith('--server-version=')) {
            config.serverVersion = arg.substring('--server-version='.length);
        } else if (arg.startsWith('--log-level=')) {
            config.logLevel = arg.substring('--log-level='.length);
        } else if (arg === '--help' || arg === '-h') {
            config.showHelp = true;
        }
    }

    return config;
}

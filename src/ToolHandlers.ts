import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { AvailabilityAnalyzer } from './AvailabilityAnalyzer.js';
import { CompatibilityAnalyzer, criticalIssues, issuesByPackage } from './CompatibilityAnalyzer.js';
import { type AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from './config.js';
import { DependencyGraphBuilder } from './DependencyGraphBuilder.js';
import { buildGraphData } from './GraphExporter.js';
import { type Clock, HistoryStore } from './HistoryStore.js';
import { IngestionLoader, type IngestionStats } from './IngestionLoader.js';
import { logger } from './logger.js';
import { ModLoader } from './ModLoader.js';
import { formatPrototypeKey, parsePrototypeKey } from './PrototypeKey.js';
import { formatTextReport } from './ReportFormatter.js';
import { serializeDependency, serializeIssue, serializePatch, serializeReport } from './ReportSerializer.js';
import { type CompatibilityReport, type ConflictIssue, type PackageInfo, SEVERITY_ORDER } from './types.js';

const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info']);

const IngestArgs = z.object({
    modsPath: z.string().min(1).optional(),
    ingestFile: z.string().min(1).optional(),
    reset: z.boolean().default(true)
});
const EmptyArgs = z.object({});
const KeyArgs = z.object({ key: z.string().min(1) });
const ConflictArgs = z.object({ kind: z.string().optional() });
const PackageArgs = z.object({ package: z.string().min(1), limit: z.number().int().positive().optional() });
const DependencyArgs = z.object({
    key: z.string().min(1),
    direction: z.enum(['dependencies', 'dependents', 'both']).default('both')
});
const AvailabilityArgs = z.object({ item: z.string().min(1), context: z.string().optional() });
const AnalyzeArgs = z.object({ full: z.boolean().default(false) });
const IssueArgs = z.object({
    severity: SeveritySchema.optional(),
    package: z.string().optional(),
    key: z.string().optional(),
    limit: z.number().int().positive().optional()
});
const PatchArgs = z.object({ patchId: z.string().optional(), includeArtifact: z.boolean().default(true) });
const TextReportArgs = z.object({ includeArtifacts: z.boolean().default(false) });
const GraphArgs = z.object({ kinds: z.array(z.string()).optional(), conflictedOnly: z.boolean().default(false) });

export type IngestSource = Partial<Pick<z.infer<typeof IngestArgs>, 'modsPath' | 'ingestFile'>>;

export interface IngestResult {
    packages: number;
    loadOrder: string[];
    ingested: IngestionStats[];
    packageIssues: number;
    prototypes: number;
}

function parseToolArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, tool: string): z.infer<S> {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
        throw new Error(`Invalid arguments for ${tool}: ${details.join('; ')}`);
    }
    return parsed.data;
}

export class ToolHandlers {
    private report: CompatibilityReport | null = null;
    private packages: PackageInfo[] = [];
    private loadOrder: string[] = [];
    private packageIssues: ConflictIssue[] = [];
    private readonly modLoader: ModLoader;

    constructor(
        private readonly store: HistoryStore,
        private readonly config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
        private readonly clock: Clock = () => new Date()
    ) {
        this.modLoader = new ModLoader(config.basePackages);
    }

    setupTools(server: Server): void {
        server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: [
                {
                    name: 'ingestPackages',
                    description: 'Load packages from a mods directory and/or an extractor dump into the history store',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            modsPath: { type: 'string', description: 'Directory of unpacked packages' },
                            ingestFile: { type: 'string', description: 'Extractor dump with package batches' },
                            reset: { type: 'boolean', description: 'Clear previously ingested data first (default: true)' }
                        }
                    }
                },
                {
                    name: 'resetAnalysis',
                    description: 'Clear all ingested history and cached analysis',
                    inputSchema: { type: 'object', properties: {} }
                },
                {
                    name: 'getPackageList',
                    description: 'List loaded packages in load order',
                    inputSchema: { type: 'object', properties: {} }
                },
                {
                    name: 'getPrototypeHistory',
                    description: 'Get the modification history of a prototype',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            key: { type: 'string', description: 'Prototype key as kind.name, e.g. recipe.inserter' }
                        },
                        required: ['key']
                    }
                },
                {
                    name: 'getHistoryConflicts',
                    description: 'List prototypes modified by more than one package',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            kind: { type: 'string', description: 'Only prototypes of this kind' }
                        }
                    }
                },
                {
                    name: 'getModificationsByPackage',
                    description: 'List every modification made by a package',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            package: { type: 'string', description: 'Package name' },
                            limit: { type: 'number', description: 'Maximum records to return' }
                        },
                        required: ['package']
                    }
                },
                {
                    name: 'getHistorySummary',
                    description: 'Counts of prototypes, modifications and conflicts',
                    inputSchema: { type: 'object', properties: {} }
                },
                {
                    name: 'exportHistory',
                    description: 'Export the complete modification history',
                    inputSchema: { type: 'object', properties: {} }
                },
                {
                    name: 'getDependencies',
                    description: 'Get the dependencies and dependents of a prototype',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            key: { type: 'string', description: 'Prototype key as kind.name' },
                            direction: {
                                type: 'string',
                                enum: ['dependencies', 'dependents', 'both'],
                                description: 'Which edges to return (default: both)'
                            }
                        },
                        required: ['key']
                    }
                },
                {
                    name: 'checkAvailability',
                    description: 'Check whether an item can be obtained in each availability context',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            item: { type: 'string', description: 'Item name' },
                            context: { type: 'string', description: 'Only this context' }
                        },
                        required: ['item']
                    }
                },
                {
                    name: 'analyzeCompatibility',
                    description: 'Run the full compatibility analysis and return its summary',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            full: { type: 'boolean', description: 'Return the complete JSON report' }
                        }
                    }
                },
                {
                    name: 'getIssues',
                    description: 'List detected conflict issues',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            severity: { type: 'string', enum: [...SEVERITY_ORDER], description: 'Only this severity' },
                            package: { type: 'string', description: 'Only issues involving this package' },
                            key: { type: 'string', description: 'Only issues affecting this prototype key' },
                            limit: { type: 'number', description: 'Maximum issues to return' }
                        }
                    }
                },
                {
                    name: 'getPatches',
                    description: 'List generated compatibility patches',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            patchId: { type: 'string', description: 'Only this patch' },
                            includeArtifact: { type: 'boolean', description: 'Include generated Lua (default: true)' }
                        }
                    }
                },
                {
                    name: 'getTextReport',
                    description: 'Human-readable compatibility report',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            includeArtifacts: { type: 'boolean', description: 'Append generated patch code' }
                        }
                    }
                },
                {
                    name: 'getGraphData',
                    description: 'Dependency graph nodes and edges with conflict flags',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            kinds: { type: 'array', items: { type: 'string' }, description: 'Only these prototype kinds' },
                            conflictedOnly: { type: 'boolean', description: 'Only conflicted prototypes' }
                        }
                    }
                }
            ]
        }));

        server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;

            try {
                const result = await this.handleTool(name, args);
                return {
                    content: [{ type: 'text', text: typeof result === 'string' ? result : JSON.stringify(result, null, 2) }]
                };
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                logger.warn(`Tool ${name} failed: ${message}`);
                return {
                    content: [{ type: 'text', text: `Error: ${message}` }],
                    isError: true
                };
            }
        });
    }

    async handleTool(name: string, args: unknown): Promise<unknown> {
        switch (name) {
            case 'ingestPackages':
                return this.handleIngest(parseToolArgs(IngestArgs, args, name));
            case 'resetAnalysis':
                parseToolArgs(EmptyArgs, args, name);
                this.reset();
                return { reset: true };
            case 'getPackageList':
                parseToolArgs(EmptyArgs, args, name);
                return this.handleGetPackageList();
            case 'getPrototypeHistory':
                return this.handleGetPrototypeHistory(parseToolArgs(KeyArgs, args, name));
            case 'getHistoryConflicts':
                return this.handleGetHistoryConflicts(parseToolArgs(ConflictArgs, args, name));
            case 'getModificationsByPackage':
                return this.handleGetModificationsByPackage(parseToolArgs(PackageArgs, args, name));
            case 'getHistorySummary':
                parseToolArgs(EmptyArgs, args, name);
                return this.store.summary();
            case 'exportHistory':
                parseToolArgs(EmptyArgs, args, name);
                return this.store.exportHistory();
            case 'getDependencies':
                return this.handleGetDependencies(parseToolArgs(DependencyArgs, args, name));
            case 'checkAvailability':
                return this.handleCheckAvailability(parseToolArgs(AvailabilityArgs, args, name));
            case 'analyzeCompatibility':
                return this.handleAnalyze(parseToolArgs(AnalyzeArgs, args, name));
            case 'getIssues':
                return this.handleGetIssues(parseToolArgs(IssueArgs, args, name));
            case 'getPatches':
                return this.handleGetPatches(parseToolArgs(PatchArgs, args, name));
            case 'getTextReport':
                return formatTextReport(this.currentReport(), parseToolArgs(TextReportArgs, args, name).includeArtifacts);
            case 'getGraphData':
                return buildGraphData(this.currentReport(), parseToolArgs(GraphArgs, args, name));
            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    }

    /** Discovers and replays packages; package order follows the resolved load order. */
    async ingest(source: IngestSource): Promise<IngestResult> {
        if (!source.modsPath && !source.ingestFile) {
            throw new Error('Provide modsPath or ingestFile');
        }

        const loader = new IngestionLoader(this.store);
        const ingested: IngestionStats[] = [];

        if (source.modsPath) {
            this.packages = await this.modLoader.loadPackages(source.modsPath);
            this.loadOrder = this.modLoader.resolveLoadOrder(this.packages);
            this.packageIssues = this.modLoader.validatePackages(this.packages);
            ingested.push(...await loader.ingestPackages(this.packages, this.loadOrder));
        }

        if (source.ingestFile) {
            ingested.push(...await loader.ingestFile(source.ingestFile));
        }

        for (const name of this.store.packages()) {
            if (!this.loadOrder.includes(name)) this.loadOrder.push(name);
        }

        this.report = null;
        return {
            packages: this.packages.length,
            loadOrder: [...this.loadOrder],
            ingested,
            packageIssues: this.packageIssues.length,
            prototypes: this.store.size
        };
    }

    reset(): void {
        this.store.reset();
        this.packages = [];
        this.loadOrder = [];
        this.packageIssues = [];
        this.report = null;
        logger.info('Analysis state reset');
    }

    currentReport(): CompatibilityReport {
        if (!this.report) {
            this.report = new CompatibilityAnalyzer(this.config, this.clock).analyze(this.store, {
                packageIssues: this.packageIssues,
                loadOrder: this.loadOrder,
                packageDependencies: this.modLoader.dependencyMap(this.packages)
            });
        }
        return this.report;
    }

    private async handleIngest(args: z.infer<typeof IngestArgs>): Promise<IngestResult> {
        if (args.reset) this.reset();
        return this.ingest({ modsPath: args.modsPath, ingestFile: args.ingestFile });
    }

    private handleGetPackageList() {
        if (this.packages.length === 0) {
            return { loadOrder: [...this.loadOrder], packages: this.store.packages().map(name => ({ name })) };
        }

        return {
            loadOrder: [...this.loadOrder],
            packages: this.packages.map(info => ({
                name: info.name,
                version: info.version,
                title: info.title,
                author: info.author,
                isBase: info.isBase,
                loadIndex: this.loadOrder.indexOf(info.name),
                dependencies: info.dependencies.map(dependency => ({ ...dependency }))
            }))
        };
    }

    private handleGetPrototypeHistory({ key }: z.infer<typeof KeyArgs>) {
        const history = this.store.historyForKey(key);
        if (!history) {
            throw new Error(`No history for ${key}`);
        }
        const packages = this.store.modificationChain(history.kind, history.name);
        return {
            key: history.key,
            kind: history.kind,
            name: history.name,
            packages,
            isConflicted: packages.length > 1,
            currentValue: history.currentValue,
            modifications: history.modifications
        };
    }

    private handleGetHistoryConflicts({ kind }: z.infer<typeof ConflictArgs>) {
        const conflicts = this.store.conflicts()
            .filter(conflict => !kind || parsePrototypeKey(conflict.key).kind === kind);
        return { count: conflicts.length, conflicts };
    }

    private handleGetModificationsByPackage(args: z.infer<typeof PackageArgs>) {
        const modifications = this.store.modificationsBy(args.package);
        return {
            package: args.package,
            total: modifications.length,
            modifications: args.limit ? modifications.slice(0, args.limit) : modifications
        };
    }

    private handleGetDependencies({ key, direction }: z.infer<typeof DependencyArgs>) {
        const { kind, name } = parsePrototypeKey(key);
        const analysis = this.currentReport().analyses.get(formatPrototypeKey(kind, name));
        if (!analysis) {
            throw new Error(`No history for ${key}`);
        }

        return {
            key: analysis.key,
            dependencies: direction === 'dependents' ? undefined : analysis.dependencies.map(serializeDependency),
            dependents: direction === 'dependencies' ? undefined : analysis.dependents.map(dependency => ({
                source: formatPrototypeKey(dependency.sourceKind, dependency.sourceName),
                ...serializeDependency(dependency)
            })),
            missing: analysis.missingDependencies.map(dependency => formatPrototypeKey(dependency.targetKind, dependency.targetName))
        };
    }

    private handleCheckAvailability({ item, context }: z.infer<typeof AvailabilityArgs>) {
        const graph = new DependencyGraphBuilder(this.config).build(this.store);
        const availability = AvailabilityAnalyzer.fromConfig(this.store, graph, this.config);

        if (context) {
            const target = availability.context(context);
            if (!target) {
                throw new Error(`Unknown context: ${context}. Known: ${availability.contexts.map(c => c.id).join(', ') || '(none)'}`);
            }
            return { item, context, available: availability.isItemAvailable(item, target), producer: availability.producerOf(item) ?? null };
        }

        return {
            item,
            producer: availability.producerOf(item) ?? null,
            widelyAvailable: availability.isWidelyAvailable(item),
            contexts: availability.availabilityMatrix(item)
        };
    }

    private handleAnalyze({ full }: z.infer<typeof AnalyzeArgs>) {
        this.report = null;
        const report = this.currentReport();
        if (full) {
            return serializeReport(report);
        }

        const byPackage: Record<string, number> = {};
        for (const [packageName, issues] of issuesByPackage(report)) {
            byPackage[packageName] = issues.length;
        }

        return {
            analyzedPackages: report.analyzedPackages,
            analysisTimestamp: report.analysisTimestamp,
            summary: report.summary,
            contexts: report.contexts.map(context => context.id),
            issueCount: report.issues.length,
            patchCount: report.patches.length,
            criticalIssues: criticalIssues(report).map(issue => issue.issueId),
            issuesByPackage: byPackage
        };
    }

    private handleGetIssues(args: z.infer<typeof IssueArgs>) {
        const issues = this.currentReport().issues.filter(issue =>
            (!args.severity || issue.severity === args.severity) &&
            (!args.package || issue.contributingPackages.includes(args.package)) &&
            (!args.key || issue.affectedKeys.includes(args.key))
        );
        return {
            total: issues.length,
            issues: (args.limit ? issues.slice(0, args.limit) : issues).map(serializeIssue)
        };
    }

    private handleGetPatches({ patchId, includeArtifact }: z.infer<typeof PatchArgs>) {
        const patches = this.currentReport().patches.filter(patch => !patchId || patch.patchId === patchId);
        if (patchId && patches.length === 0) {
            throw new Error(`Patch not found: ${patchId}`);
        }
        return {
            total: patches.length,
            patches: patches.map(patch => {
                const serialized = serializePatch(patch);
                if (!includeArtifact) delete serialized.generated_artifact;
                return serialized;
            })
        };
    }
}

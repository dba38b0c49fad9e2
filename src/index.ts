#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { type AnalysisConfig, DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig, parseArgs, type ServerConfig, USAGE } from './config.js';
import { HistoryStore } from './HistoryStore.js';
import { logger, setLogLevel } from './logger.js';
import { ToolHandlers } from './ToolHandlers.js';

class ModHarmonizerServer {
    private readonly server: Server;
    private readonly store = new HistoryStore();
    private readonly toolHandlers: ToolHandlers;

    constructor(private readonly config: ServerConfig, analysisConfig: AnalysisConfig) {
        this.toolHandlers = new ToolHandlers(this.store, analysisConfig);

        this.server = new Server(
            {
                name: config.serverName,
                version: config.serverVersion
            },
            {
                capabilities: {
                    tools: {}
                }
            }
        );

        this.toolHandlers.setupTools(this.server);
    }

    async start(): Promise<void> {
        logger.info('='.repeat(60));
        logger.info(`${this.config.serverName.toUpperCase()} v${this.config.serverVersion}`);
        logger.info('='.repeat(60));

        if (this.config.modsPath || this.config.ingestFile) {
            logger.info('Loading packages...');
            const result = await this.toolHandlers.ingest({
                modsPath: this.config.modsPath || undefined,
                ingestFile: this.config.ingestFile || undefined
            });

            const summary = this.store.summary();
            logger.info('Summary:');
            logger.info(`  • Packages: ${result.loadOrder.length}`);
            logger.info(`  • Load order: ${result.loadOrder.join(', ') || '(none)'}`);
            logger.info(`  • Prototypes: ${summary.totalPrototypes}`);
            logger.info(`  • Modifications: ${summary.totalModifications}`);
            logger.info(`  • Conflicted prototypes: ${summary.totalConflicts}`);
            logger.info(`  • Package issues: ${result.packageIssues}`);
        } else {
            logger.info('No sources given; use the ingestPackages tool to load packages');
        }

        logger.info('Starting MCP server...');
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        logger.info('Server ready');
    }
}

async function main(): Promise<void> {
    const config = parseArgs(process.argv.slice(2));
    setLogLevel(config.logLevel);

    if (config.showHelp) {
        process.stderr.write(`${USAGE}\n`);
        process.exit(0);
    }

    const analysisConfig = config.configFile
        ? await loadAnalysisConfig(config.configFile)
        : DEFAULT_ANALYSIS_CONFIG;

    const server = new ModHarmonizerServer(config, analysisConfig);
    await server.start();
}

process.on('SIGINT', () => {
    logger.info('Shutting down server...');
    process.exit(0);
});

process.on('SIGTERM', () => {
    logger.info('Shutting down server...');
    process.exit(0);
});

main().catch(error => {
    logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});

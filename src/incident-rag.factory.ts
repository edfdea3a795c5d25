import { IncidentRAG } from './incident-rag.js';
import type { IncidentRAGConfig, ResolvedConfig } from './types/config.types.js';
import {
    configSchema,
    DEFAULT_DATABASE_CONFIG,
    DEFAULT_DEPLOYMENT_CONFIG,
    DEFAULT_GENERATION_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_QUERY_CONFIG,
    DEFAULT_RETRY_CONFIG,
    DEFAULT_SEARCH_CONFIG,
} from './types/config.types.js';
import type { ISpreadsheetReader } from './types/loader.types.js';
import type { ISearchGateway } from './types/gateway.types.js';
import type { IGenerationService } from './types/generation.types.js';
import type { IRecordRepository } from './types/repository.types.js';
import { ConfigurationError } from './errors/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { createPool, describeDatabaseEndpoint, RecordRepository } from './database/index.js';
import { LoaderEngine } from './engines/loader.engine.js';
import { RetrievalEngine } from './engines/retrieval.engine.js';
import { QueryEngine } from './engines/query.engine.js';
import { SpreadsheetReader } from './services/spreadsheet.reader.js';
import { ElasticsearchGateway, createSearchClient } from './services/elasticsearch.gateway.js';
import { OllamaGenerationService } from './services/ollama.service.js';
import { StackInspector } from './services/stack-inspector.service.js';

/**
 * Replacements for the default clients, mainly for tests and embedding
 */
export interface IncidentRAGOverrides {
    logger?: Logger;
    reader?: ISpreadsheetReader;
    repository?: IRecordRepository;
    gateway?: ISearchGateway;
    generation?: IGenerationService;
}

/**
 * Factory for creating IncidentRAG instances with dependency injection
 *
 * All clients are wired here and injected into the engines. No connection
 * is opened until an operation needs one.
 */
export class IncidentRAGFactory {
    /**
     * Create a new IncidentRAG instance with all dependencies wired
     * @throws ConfigurationError when the configuration is invalid
     */
    static create(userConfig: IncidentRAGConfig = {}, overrides: IncidentRAGOverrides = {}): IncidentRAG {
        const config = IncidentRAGFactory.resolveConfig(userConfig);
        const logger = overrides.logger ?? createLogger(config.logging);

        // Core services (implementing interfaces)
        const reader = overrides.reader ?? new SpreadsheetReader(logger);
        const repository = overrides.repository ?? new RecordRepository(
            createPool(config.database, logger),
            config.database.table,
            describeDatabaseEndpoint(config.database)
        );
        const gateway = overrides.gateway ?? new ElasticsearchGateway(
            createSearchClient(config.search),
            config.search.node,
            logger
        );
        const generation = overrides.generation ?? new OllamaGenerationService(config.generation, logger);

        // Engines with injected dependencies
        const loaderEngine = new LoaderEngine(config, { reader, repository }, logger);
        const retrievalEngine = new RetrievalEngine(config, gateway, logger);
        const queryEngine = new QueryEngine(config, retrievalEngine, generation, logger);
        const stackInspector = new StackInspector(config, { gateway, generation, repository }, logger);

        logger.debug('incident-rag initialized', {
            index: config.search.index,
            queryMode: config.search.queryMode,
            table: config.database.table,
            model: config.generation.model,
        });

        return new IncidentRAG(config, {
            logger,
            loaderEngine,
            retrievalEngine,
            queryEngine,
            stackInspector,
            gateway,
            repository,
        });
    }

    /**
     * Validate user config and merge it over the defaults
     * @throws ConfigurationError listing each invalid setting
     */
    static resolveConfig(userConfig: IncidentRAGConfig): ResolvedConfig {
        const validation = configSchema.safeParse(userConfig);
        if (!validation.success) {
            const issues = validation.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
        }

        return {
            database: { ...DEFAULT_DATABASE_CONFIG, ...userConfig.database },
            search: { ...DEFAULT_SEARCH_CONFIG, ...userConfig.search },
            generation: { ...DEFAULT_GENERATION_CONFIG, ...userConfig.generation },
            query: { ...DEFAULT_QUERY_CONFIG, ...userConfig.query },
            retry: { ...DEFAULT_RETRY_CONFIG, ...userConfig.retry },
            deployment: { ...DEFAULT_DEPLOYMENT_CONFIG, ...userConfig.deployment },
            logging: {
                ...DEFAULT_LOG_CONFIG,
                ...userConfig.logging,
                level: userConfig.logging?.level ?? DEFAULT_LOG_CONFIG.level,
            },
        };
    }
}

/**
 * Create a new IncidentRAG instance
 *
 * @example
 * ```typescript
 * import { createIncidentRAG, envToConfig, parseEnv } from 'incident-rag';
 *
 * const rag = createIncidentRAG(envToConfig(parseEnv()));
 * ```
 */
export function createIncidentRAG(
    config: IncidentRAGConfig = {},
    overrides: IncidentRAGOverrides = {}
): IncidentRAG {
    return IncidentRAGFactory.create(config, overrides);
}

/**
 * incident-rag: spreadsheet loader and ELSER query tool for incident records
 *
 * @packageDocumentation
 */

// Main class and factory
export { IncidentRAG, type IncidentRAGDependencies, type ReindexOptions } from './incident-rag.js';
export {
    IncidentRAGFactory,
    createIncidentRAG,
    type IncidentRAGOverrides,
} from './incident-rag.factory.js';

// Service interfaces
export type { IRecordRepository, UpsertOutcome } from './types/repository.types.js';
export type {
    ISearchGateway,
    ClusterInfo,
    IndexDefinition,
    PipelineDefinition,
    ReindexRequest,
    ReindexSummary,
    TokenFieldType,
} from './types/gateway.types.js';
export type { IGenerationService, ChatMessage, GenerationResult } from './types/generation.types.js';
export type { ISpreadsheetReader } from './types/loader.types.js';

export type {
    IncidentRAGConfig,
    ResolvedConfig,
    DatabaseConfig,
    SearchConfig,
    GenerationConfig,
    QueryConfig,
    RetryConfig,
    DeploymentConfig,
    LogConfig,
} from './types/config.types.js';

export type { IncidentRecord } from './types/record.types.js';

export type {
    CellValue,
    RawRow,
    SheetData,
    SheetSelector,
    ColumnMapping,
    ResolvedColumns,
    RowIssue,
    RecordFailure,
    LoadProgress,
    LoadOptions,
    LoadResult,
} from './types/loader.types.js';

export type {
    QueryMode,
    RetrievedDocument,
    SearchOptions,
    SearchResponse,
} from './types/search.types.js';

export type { QueryOptions, QueryOutcome, AnswerState } from './types/query.types.js';
export type { CheckStatus, StackCheck, StackReport, InspectOptions } from './types/stack.types.js';

// Enums
export {
    QueryModeEnum,
    RowIssueEnum,
    AnswerStatusEnum,
    CheckStatusEnum,
} from './types/enums.js';

// Errors
export {
    IncidentRAGError,
    ConfigurationError,
    ValidationError,
    SpreadsheetError,
    DatabaseError,
    SearchError,
    GenerationError,
    generateCorrelationId,
    getCorrelationId,
    setCorrelationId,
    clearCorrelationId,
} from './errors/index.js';

// Configuration
export { parseEnv, envToConfig, type Env } from './config/env.js';

// Implementations
export {
    SpreadsheetReader,
    ElasticsearchGateway,
    OllamaGenerationService,
    StackInspector,
    buildSearchQuery,
} from './services/index.js';
export { RecordRepository, createPool } from './database/index.js';

// Utilities
export { createLogger, type Logger } from './utils/logger.js';
export { buildContext, buildAnswerMessages } from './utils/context-builder.js';

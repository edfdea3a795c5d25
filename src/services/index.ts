export { SpreadsheetReader } from './spreadsheet.reader.js';
export { pickColumn, resolveColumns, mapRowsToRecords } from './record.mapper.js';
export type { MappedRecords } from './record.mapper.js';

export {
    ElasticsearchGateway,
    createSearchClient,
    buildSearchQuery,
    buildIndexMappings,
    parseFieldType,
    redactEndpoint,
    toSearchError,
} from './elasticsearch.gateway.js';

export { OllamaGenerationService } from './ollama.service.js';

export { StackInspector, STACK_CHECKS } from './stack-inspector.service.js';
export type { StackInspectorDependencies } from './stack-inspector.service.js';

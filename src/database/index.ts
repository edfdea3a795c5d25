export { RecordRepository } from './repositories/index.js';
export { createPool } from './pool.js';
export { quoteTableName, describeDatabaseEndpoint } from './utils.js';
export type { Queryable } from './utils.js';

// Repository implementations
export { RecordRepository } from './record.repository.js';

export { runLoadCommand, type LoadCommandOptions } from './load.command.js';
export { runSearchCommand, type SearchCommandOptions } from './search.command.js';
export { runDoctorCommand, type DoctorCommandOptions } from './doctor.command.js';
export { runReindexCommand } from './reindex.command.js';
export {
    consoleIO,
    reportError,
    formatLoadResult,
    formatQueryOutcome,
    formatStackReport,
    formatReindexSummary,
    type CommandIO,
} from './output.js';

export { SaveSyncCLI } from './cli.js';
export type { SaveSyncCLIOptions } from './cli.js';
export { OutputFormatter, formatTimestamp, red } from './formatter.js';
export { ConsoleReporter, oraSpinner } from './progress.js';
export type { ConsoleReporterOptions, Spinner, SpinnerFactory } from './progress.js';

/**
 * @chartlane/cli - command registry, executor and handlers behind the `chartlane` binary
 */

export { CommandRegistry, commandRegistry } from './core/command-registry.js';
export { CommandContext } from './core/command-context.js';
export type { CommandContextOptions, LoaderOptions } from './core/command-context.js';
export { execute, executeValidated, reportFailure } from './core/execute.js';
export type { ExecuteOptions } from './core/execute.js';
export { formatOutput, formatTable, formatJSON } from './core/output-formatter.js';
export { formatError, handleError } from './core/error-handler.js';
export type { CommandDefinition, PackageCommandModule, OutputFormat } from './types/index.js';

export { chartModule, registerChartCommands } from './commands/charts.js';
export { integrityModule, registerIntegrityCommands } from './commands/integrity.js';

export { createProgram, describeCacheConfig, run } from './program.js';
export type { CliDependencies } from './program.js';
export { formatCsv, formatJson, formatOutput, OUTPUT_FORMATS } from './output.js';
export type { OutputFormat } from './output.js';

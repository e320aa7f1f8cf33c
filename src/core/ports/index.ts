export type { OutputPort, UnifiedSpinner } from './output.js';
export { consoleOutput, createConsoleOutput, silentOutput, stderrOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';

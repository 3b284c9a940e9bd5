/**
 * docdrift step executor
 *
 * Parses annotated Markdown tutorials and runs their steps, in order, in a
 * workspace directory.
 */

export * from './attributes/index.js';
export * from './dsl/index.js';
export * from './parser/index.js';
export * from './variables/index.js';
export * from './validator/index.js';
export * from './executor/index.js';
export * from './sandbox/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export { runCli } from './cli/run.js';

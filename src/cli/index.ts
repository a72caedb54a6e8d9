/**
 * CLI Commands Index
 */

export { createProgram } from './program.js';
export { registerConfigCommands } from './config.js';
export { registerContextCommands } from './context.js';
export { registerShmCommands } from './shm.js';
export { registerSreCommands } from './sre.js';
export { registerUsersCommands } from './users.js';
export { projectManagerFor, requireProject, withErrorContext } from './common.js';

export * from './schema.js';
export * from './sections.js';
export * from './serialisable.js';
export { SHMConfig } from './shm-config.js';
export { SREConfig } from './sre-config.js';
export { DSHPulumiConfig } from './pulumi-config.js';

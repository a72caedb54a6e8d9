/**
 * Data Safe Haven
 * Main entry point for programmatic usage
 */

// Configuration
export * from './config/index.js';
export { Context, PULUMI_ENCRYPTION_KEY_NAME } from './context/context.js';
export { ContextManager } from './context/context-manager.js';

// Azure and Microsoft Graph
export { AzureApi, type KeyVaultAccess } from './external/azure-api.js';
export { AzureSdkCredential, GraphApiCredential, decodeToken, type AccountInformation } from './external/credentials.js';
export { GraphApi, type GraphApiOptions, type HttpFetcher, type TokenSource } from './external/graph-api.js';
export type { BlobLocation, BlobStore, DirectoryGroup, DirectoryUser, UserDirectory } from './external/interfaces.js';

// Infrastructure
export { ContextInfrastructure } from './infrastructure/context-infrastructure.js';
export { ProjectManager, type ProjectManagerOptions } from './infrastructure/project-manager.js';
export { allocateSreIndex, recordedSreIndex } from './infrastructure/sre-index.js';
export { SHMIpRanges, SREIpRanges } from './infrastructure/common/ip-ranges.js';
export { shmProgram } from './infrastructure/programs/shm/index.js';
export { sreProgram } from './infrastructure/programs/sre/index.js';

// Users
export * from './administration/users/index.js';

// CLI
export { type CommandServices } from './cli/common.js';
export { createProgram, runProgram } from './cli/program.js';

export * from './utils/errors.js';
export { getLogger, resetLogger, type LogLevel } from './utils/logger.js';

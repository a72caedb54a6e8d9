export { ResearchUser, type ResearchUserFields } from './research-user.js';
export { parseResearchUsersCsv, readResearchUsersCsv, REQUIRED_COLUMNS, usernameFor } from './csv-import.js';
export { SRE_GROUP_ROLES, sreGroupName, UserHandler } from './user-handler.js';

/**
 * Interfaces to external services
 *
 * Commands talk to Azure storage and Microsoft Graph through these so
 * that the clients can be swapped for in-memory versions.
 */

/**
 * Where a blob lives inside the context storage account
 */
export interface BlobLocation {
  resourceGroupName: string;
  storageAccountName: string;
  containerName: string;
}

export interface BlobStore {
  uploadBlob(content: string, blobName: string, location: BlobLocation): Promise<void>;
  downloadBlob(blobName: string, location: BlobLocation): Promise<string>;
  blobExists(blobName: string, location: BlobLocation): Promise<boolean>;
  removeBlob(blobName: string, location: BlobLocation): Promise<void>;
}

export interface DirectoryUser {
  id: string;
  accountEnabled: boolean;
  displayName: string;
  givenName: string;
  surname: string;
  mail: string | null;
  userPrincipalName: string;
  mobilePhone: string | null;
  usageLocation: string | null;
  /** Username for users this tool creates */
  mailNickname: string;
}

export interface NewDirectoryUser {
  accountEnabled: boolean;
  displayName: string;
  givenName: string;
  surname: string;
  mail: string | null;
  mailNickname: string;
  userPrincipalName: string;
  usageLocation: string | null;
  password: string;
}

export interface DirectoryGroup {
  id: string;
  displayName: string;
}

/**
 * The Entra ID operations that user management needs
 */
export interface UserDirectory {
  defaultDomain(): Promise<string>;
  listUsers(): Promise<DirectoryUser[]>;
  createUser(user: NewDirectoryUser): Promise<DirectoryUser>;
  deleteUser(userId: string): Promise<void>;
  addAuthenticationPhone(userId: string, phoneNumber: string): Promise<void>;
  addAuthenticationEmail(userId: string, emailAddress: string): Promise<void>;
  ensureGroup(displayName: string): Promise<DirectoryGroup>;
  listGroups(): Promise<DirectoryGroup[]>;
  listGroupMembers(groupId: string): Promise<DirectoryUser[]>;
  addGroupMember(groupId: string, userId: string): Promise<void>;
  removeGroupMember(groupId: string, userId: string): Promise<void>;
}

import type { BlobLocation, BlobStore } from '../src/external/interfaces';

/**
 * Blob storage held in a map, keyed by account, container and blob name
 */
export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, string>();

  private key(blobName: string, location: BlobLocation): string {
    return `${location.storageAccountName}/${location.containerName}/${blobName}`;
  }

  async uploadBlob(content: string, blobName: string, location: BlobLocation): Promise<void> {
    this.blobs.set(this.key(blobName, location), content);
  }

  async downloadBlob(blobName: string, location: BlobLocation): Promise<string> {
    const content = this.blobs.get(this.key(blobName, location));
    if (content === undefined) {
      throw new Error(`No blob named '${blobName}'.`);
    }
    return content;
  }

  async blobExists(blobName: string, location: BlobLocation): Promise<boolean> {
    return this.blobs.has(this.key(blobName, location));
  }

  async removeBlob(blobName: string, location: BlobLocation): Promise<void> {
    this.blobs.delete(this.key(blobName, location));
  }
}

/**
 * Silence console output from the process-wide logger for the current test file
 */
export function quietConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}

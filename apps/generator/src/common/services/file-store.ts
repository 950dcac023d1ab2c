import type { FolderHandle, StoredFile } from '@certgen/shared';

/** Injection token for the remote file store */
export const FILE_STORE = Symbol('FILE_STORE');

/**
 * Remote file store the pipeline writes certificates into.
 * Every method may reject with a StoreRequestError.
 */
export interface FileStore {
  /** Who the credentials belong to; fails when the token is rejected */
  describeAccount(): Promise<string>;
  getFile(fileId: string): Promise<Buffer>;
  listFolders(parentId: string): Promise<FolderHandle[]>;
  createFolder(parentId: string, name: string): Promise<FolderHandle>;
  /** Replaces a file with the same name in the folder */
  uploadFile(folderId: string, bytes: Buffer, name: string): Promise<StoredFile>;
  /** Writes values into one range of a workbook stored remotely */
  updateRange(fileId: string, sheetName: string, address: string, values: string[][]): Promise<void>;
}

import ExcelJS from 'exceljs';
import type { FolderHandle, StoredFile } from '@certgen/shared';
import { StoreRequestError } from '../common/errors/certificate-errors';
import type { FileStore } from '../common/services/file-store';

export interface UploadRecord {
  folderId: string;
  name: string;
  bytes: Buffer;
}

export interface RangeUpdate {
  fileId: string;
  sheetName: string;
  address: string;
  values: string[][];
}

/** Return an error to make the matching call reject with it */
export interface StoreFaults {
  describeAccount?: () => Error | undefined;
  createFolder?: (name: string) => Error | undefined;
  uploadFile?: (name: string) => Error | undefined;
  updateRange?: (address: string) => Error | undefined;
}

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/**
 * In-process stand-in for the drive.
 * Range updates are applied to stored workbooks, so a second run sees the
 * statuses the first run wrote.
 */
export class InMemoryFileStore implements FileStore {
  readonly files = new Map<string, Buffer>();
  readonly folders = new Map<string, FolderHandle[]>();
  readonly uploads: UploadRecord[] = [];
  readonly rangeUpdates: RangeUpdate[] = [];
  faults: StoreFaults = {};
  onUpload?: (record: UploadRecord) => void;
  createFolderCalls = 0;
  listFolderCalls = 0;
  account = 'Test User <test.user@example.test>';
  private nextId = 1;

  async describeAccount(): Promise<string> {
    await nextTick();
    const fault = this.faults.describeAccount?.();
    if (fault) throw fault;
    return this.account;
  }

  async getFile(fileId: string): Promise<Buffer> {
    await nextTick();
    const bytes = this.files.get(fileId);
    if (!bytes) throw new StoreRequestError('getFile', 'HTTP 404', 404, false);
    return bytes;
  }

  async listFolders(parentId: string): Promise<FolderHandle[]> {
    await nextTick();
    this.listFolderCalls += 1;
    return [...(this.folders.get(parentId) ?? [])];
  }

  async createFolder(parentId: string, name: string): Promise<FolderHandle> {
    this.createFolderCalls += 1;
    await nextTick();
    const fault = this.faults.createFolder?.(name);
    if (fault) throw fault;

    const siblings = this.folders.get(parentId) ?? [];
    if (siblings.some((f) => f.name.toLowerCase() === name.toLowerCase())) {
      throw new StoreRequestError('createFolder', 'HTTP 409 — nameAlreadyExists', 409, false);
    }
    const handle = { id: `folder-${this.nextId++}`, name };
    this.folders.set(parentId, [...siblings, handle]);
    return handle;
  }

  async uploadFile(folderId: string, bytes: Buffer, name: string): Promise<StoredFile> {
    await nextTick();
    const fault = this.faults.uploadFile?.(name);
    if (fault) throw fault;

    const record = { folderId, name, bytes };
    this.uploads.push(record);
    this.onUpload?.(record);
    return { id: `file-${this.nextId++}`, name, size: bytes.length };
  }

  async updateRange(fileId: string, sheetName: string, address: string, values: string[][]): Promise<void> {
    await nextTick();
    const fault = this.faults.updateRange?.(address);
    if (fault) throw fault;

    const bytes = this.files.get(fileId);
    if (!bytes) throw new StoreRequestError('updateRange', 'HTTP 404', 404, false);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(bytes as unknown as ExcelJS.Buffer);
    const ws = workbook.getWorksheet(sheetName);
    if (!ws) throw new StoreRequestError('updateRange', `HTTP 404 — no sheet ${sheetName}`, 404, false);
    ws.getCell(address).value = values[0]?.[0] ?? null;
    this.files.set(fileId, Buffer.from(await workbook.xlsx.writeBuffer()));

    this.rangeUpdates.push({ fileId, sheetName, address, values });
  }

  /** Uploaded file names, in upload order */
  uploadedNames(): string[] {
    return this.uploads.map((u) => u.name);
  }
}

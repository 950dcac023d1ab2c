import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { PDF_MIME_TYPE, STORE_LIMITS, type FolderHandle, type StoredFile } from '@certgen/shared';
import { StoreRequestError } from '../errors/certificate-errors';
import type { FileStore } from './file-store';

const driveItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  size: z.number().optional(),
  folder: z.object({ childCount: z.number().optional() }).optional(),
});

const accountSchema = z.object({
  displayName: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
});

const driveItemPageSchema = z.object({
  value: z.array(driveItemSchema).default([]),
  '@odata.nextLink': z.string().url().optional(),
});

interface DriveRequestInit {
  method: 'GET' | 'POST' | 'PUT' | 'PATCH';
  headers?: Record<string, string>;
  body?: string | Buffer;
}

/**
 * OneDrive client over Microsoft Graph (`/me/drive`).
 * Every call is bounded by STORE_TIMEOUT_MS; nothing is retried here.
 */
@Injectable()
export class DriveService implements FileStore, OnModuleInit {
  private readonly logger = new Logger(DriveService.name);
  private baseUrl!: string;
  private token!: string;
  private timeoutMs!: number;

  constructor(@Inject(ConfigService) private readonly config: ConfigService) {}

  onModuleInit(): void {
    this.token = this.config.getOrThrow<string>('GRAPH_ACCESS_TOKEN');
    this.baseUrl = (this.config.get<string>('GRAPH_BASE_URL') ?? 'https://graph.microsoft.com/v1.0').replace(/\/+$/, '');
    this.timeoutMs = this.config.get<number>('STORE_TIMEOUT_MS') ?? STORE_LIMITS.DEFAULT_TIMEOUT_MS;

    this.logger.log(`Drive client initialized — ${this.baseUrl}, timeout ${this.timeoutMs}ms`);
  }

  async describeAccount(): Promise<string> {
    const response = await this.request('describeAccount', '/me?$select=displayName,userPrincipalName', {
      method: 'GET',
    });
    const account = await this.parseBody('describeAccount', response, accountSchema);
    const name = account.displayName ?? 'unnamed account';
    return account.userPrincipalName ? `${name} <${account.userPrincipalName}>` : name;
  }

  /** Download a file's content */
  async getFile(fileId: string): Promise<Buffer> {
    const response = await this.request('getFile', `/me/drive/items/${encodeURIComponent(fileId)}/content`, {
      method: 'GET',
    });
    const bytes = Buffer.from(await response.arrayBuffer());
    this.logger.debug(`Downloaded item ${fileId} (${bytes.length} bytes)`);
    return bytes;
  }

  /** List the folders directly under a parent, following pagination */
  async listFolders(parentId: string): Promise<FolderHandle[]> {
    const folders: FolderHandle[] = [];
    let next: string | undefined =
      `/me/drive/items/${encodeURIComponent(parentId)}/children?$select=id,name,folder&$top=200`;

    while (next) {
      const response = await this.request('listFolders', next, { method: 'GET' });
      const page = await this.parseBody('listFolders', response, driveItemPageSchema);
      for (const item of page.value) {
        if (item.folder) folders.push({ id: item.id, name: item.name });
      }
      next = page['@odata.nextLink'];
    }

    return folders;
  }

  /** Create a folder. Fails with 409 when the name is taken, never renames. */
  async createFolder(parentId: string, name: string): Promise<FolderHandle> {
    const response = await this.request('createFolder', `/me/drive/items/${encodeURIComponent(parentId)}/children`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        name,
        folder: {},
        '@microsoft.graph.conflictBehavior': 'fail',
      }),
    });
    const item = await this.parseBody('createFolder', response, driveItemSchema);
    this.logger.log(`Created folder "${item.name}" (${item.id})`);
    return { id: item.id, name: item.name };
  }

  /** Simple upload; an existing file with the same name is replaced */
  async uploadFile(folderId: string, bytes: Buffer, name: string): Promise<StoredFile> {
    if (bytes.length > STORE_LIMITS.MAX_SIMPLE_UPLOAD_BYTES) {
      throw new StoreRequestError('uploadFile', `${name} exceeds the simple upload limit`, undefined, false);
    }
    const path =
      `/me/drive/items/${encodeURIComponent(folderId)}:/${encodeURIComponent(name)}:/content` +
      '?@microsoft.graph.conflictBehavior=replace';
    const response = await this.request('uploadFile', path, {
      method: 'PUT',
      headers: { 'Content-Type': PDF_MIME_TYPE },
      body: bytes,
    });
    const item = await this.parseBody('uploadFile', response, driveItemSchema);
    this.logger.debug(`Uploaded ${name} to ${folderId} (${bytes.length} bytes)`);
    return { id: item.id, name: item.name, size: item.size ?? bytes.length };
  }

  /** Patch the values of a single range through the Excel workbook API */
  async updateRange(fileId: string, sheetName: string, address: string, values: string[][]): Promise<void> {
    const sheet = encodeURIComponent(sheetName.replace(/'/g, "''"));
    const path =
      `/me/drive/items/${encodeURIComponent(fileId)}/workbook/worksheets('${sheet}')` +
      `/range(address='${encodeURIComponent(address)}')`;
    await this.request('updateRange', path, {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ values }),
    });
    this.logger.debug(`Updated ${sheetName}!${address}`);
  }

  private async request(operation: string, pathOrUrl: string, init: DriveRequestInit): Promise<Response> {
    const url = pathOrUrl.startsWith('http') ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: { ...init.headers, Authorization: `Bearer ${this.token}` },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new StoreRequestError(operation, `timed out after ${this.timeoutMs}ms`, undefined, true, { cause: err });
      }
      const message = err instanceof Error ? err.message : 'network error';
      throw new StoreRequestError(operation, message, undefined, true, { cause: err });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      const transient = response.status === 429 || response.status >= 500;
      throw new StoreRequestError(
        operation,
        `HTTP ${response.status}${body ? ` — ${body.slice(0, 300)}` : ''}`,
        response.status,
        transient,
      );
    }

    return response;
  }

  private async parseBody<T extends z.ZodTypeAny>(
    operation: string,
    response: Response,
    schema: T,
  ): Promise<z.output<T>> {
    const result = schema.safeParse(await response.json());
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new StoreRequestError(operation, `unexpected response body (${issues})`, response.status, false);
    }
    return result.data;
  }
}

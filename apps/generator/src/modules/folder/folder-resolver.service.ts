import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { companyKey, sanitizeFolderName, type FolderHandle } from '@certgen/shared';
import { FolderCreationError, StoreRequestError } from '../../common/errors/certificate-errors';
import { FILE_STORE, type FileStore } from '../../common/services/file-store';
import { KeyedLockService } from '../../common/services/keyed-lock.service';
import type { FolderCache } from './folder-cache';

/**
 * Maps a company name to its certificates folder, creating it at most once.
 *
 * Lookup order: run cache, folders already in the store, then create.
 * Names are compared after sanitizing, trimming and lower-casing, so
 * "Acme", "acme " and "ACME" share one folder.
 */
@Injectable()
export class FolderResolverService {
  private readonly logger = new Logger(FolderResolverService.name);

  constructor(
    @Inject(FILE_STORE) private readonly store: FileStore,
    @Inject(KeyedLockService) private readonly locks: KeyedLockService,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {}

  async resolve(companyName: string, cache: FolderCache): Promise<FolderHandle> {
    const folderName = sanitizeFolderName(companyName);
    const key = companyKey(folderName);

    const cached = cache.get(key);
    if (cached) return cached;

    // Single writer per company: a concurrent row waits and then hits the cache
    return this.locks.withLock(`folder:${key}`, async () => {
      const settled = cache.get(key);
      if (settled) return settled;

      try {
        const handle = (await this.findExisting(key)) ?? (await this.create(folderName, key));
        cache.set(key, handle);
        return handle;
      } catch (err) {
        throw new FolderCreationError(companyName, err);
      }
    });
  }

  private get parentId(): string {
    return this.config.getOrThrow<string>('CERTIFICATES_FOLDER_ID');
  }

  private async findExisting(key: string): Promise<FolderHandle | undefined> {
    const folders = await this.store.listFolders(this.parentId);
    // Existing names may still carry punctuation: "Acme S.A." is the folder for "acme s.a."
    const match = folders.find((f) => companyKey(f.name) === key || companyKey(sanitizeFolderName(f.name)) === key);
    if (match) this.logger.debug(`Found existing folder "${match.name}" for "${key}"`);
    return match;
  }

  private async create(folderName: string, key: string): Promise<FolderHandle> {
    try {
      const handle = await this.store.createFolder(this.parentId, folderName);
      this.logger.log(`Created folder "${handle.name}"`);
      return handle;
    } catch (err) {
      // Someone created it between our listing and our create call
      if (err instanceof StoreRequestError && err.status === 409) {
        const existing = await this.findExisting(key);
        if (existing) return existing;
      }
      throw err;
    }
  }
}

import type { FolderHandle } from '@certgen/shared';

/**
 * Company key → folder handle for one run.
 * Created by the pipeline per run and never shared between runs.
 */
export class FolderCache {
  private readonly entries = new Map<string, FolderHandle>();

  get(key: string): FolderHandle | undefined {
    return this.entries.get(key);
  }

  set(key: string, handle: FolderHandle): void {
    this.entries.set(key, handle);
  }

  get size(): number {
    return this.entries.size;
  }
}

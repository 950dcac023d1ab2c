import { Global, Module } from '@nestjs/common';
import { DriveService } from './drive.service';
import { FILE_STORE } from './file-store';
import { KeyedLockService } from './keyed-lock.service';

/**
 * Global store module: one Graph client and one lock table for the whole run.
 */
@Global()
@Module({
  providers: [
    DriveService,
    KeyedLockService,
    { provide: FILE_STORE, useExisting: DriveService },
  ],
  exports: [FILE_STORE, KeyedLockService],
})
export class DriveModule {}

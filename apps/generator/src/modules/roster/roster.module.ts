import { Module } from '@nestjs/common';
import { DriveRosterSource } from './drive-roster-source';
import { RosterReaderService } from './roster-reader.service';
import { ROSTER_SOURCE } from './roster-source';

@Module({
  providers: [
    RosterReaderService,
    DriveRosterSource,
    { provide: ROSTER_SOURCE, useExisting: DriveRosterSource },
  ],
  exports: [ROSTER_SOURCE, RosterReaderService],
})
export class RosterModule {}

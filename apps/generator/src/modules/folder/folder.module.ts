import { Module } from '@nestjs/common';
import { FolderResolverService } from './folder-resolver.service';

@Module({
  providers: [FolderResolverService],
  exports: [FolderResolverService],
})
export class FolderModule {}

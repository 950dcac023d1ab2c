import { Module } from '@nestjs/common';
import { FolderModule } from '../folder/folder.module';
import { RenderModule } from '../render/render.module';
import { RosterModule } from '../roster/roster.module';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [RosterModule, FolderModule, RenderModule],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}

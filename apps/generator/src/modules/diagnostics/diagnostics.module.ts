import { Module } from '@nestjs/common';
import { RenderModule } from '../render/render.module';
import { RosterModule } from '../roster/roster.module';
import { DiagnosticsService } from './diagnostics.service';

@Module({
  imports: [RosterModule, RenderModule],
  providers: [DiagnosticsService],
  exports: [DiagnosticsService],
})
export class DiagnosticsModule {}

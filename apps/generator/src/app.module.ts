import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DriveModule } from './common/services/drive.module';
import { validateEnv } from './config/env.config';
import { DiagnosticsModule } from './modules/diagnostics/diagnostics.module';
import { FolderModule } from './modules/folder/folder.module';
import { PipelineModule } from './modules/pipeline/pipeline.module';
import { RenderModule } from './modules/render/render.module';
import { RosterModule } from './modules/roster/roster.module';

@Module({
  imports: [
    // Variables come from the process environment only
    ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate: validateEnv }),
    DriveModule,
    RosterModule,
    FolderModule,
    RenderModule,
    PipelineModule,
    DiagnosticsModule,
  ],
})
export class AppModule {}

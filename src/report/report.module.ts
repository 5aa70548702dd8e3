import { Module } from '@nestjs/common';
import { ReportBuilderService } from './report-builder.service';
import { ReportEmitterService } from './report-emitter.service';

@Module({
  providers: [ReportBuilderService, ReportEmitterService],
  exports: [ReportBuilderService, ReportEmitterService],
})
export class ReportModule {}

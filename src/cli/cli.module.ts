import { Module } from '@nestjs/common';
import { AggregationModule } from '../aggregation/aggregation.module';
import { ReportModule } from '../report/report.module';
import { SheetsModule } from '../sheets/sheets.module';
import { WorkbookModule } from '../workbook/workbook.module';
import { ReportCommandService } from './report-command.service';

@Module({
  imports: [WorkbookModule, SheetsModule, AggregationModule, ReportModule],
  providers: [ReportCommandService],
  exports: [ReportCommandService],
})
export class CliModule {}

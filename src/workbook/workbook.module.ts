import { Module } from '@nestjs/common';
import { WorkbookReaderService } from './workbook-reader.service';

@Module({
  providers: [WorkbookReaderService],
  exports: [WorkbookReaderService],
})
export class WorkbookModule {}

import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { SheetReaderService } from './sheet-reader.service';
import { TickerLookupService } from './ticker-lookup.service';

@Module({
  imports: [
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 3,
    }),
  ],
  providers: [SheetReaderService, TickerLookupService],
  exports: [SheetReaderService],
})
export class SheetsModule {}

import { Injectable, Logger } from '@nestjs/common';
import { NoRecognizedSheetsError } from '../common/errors/report.errors';
import { yearEnd } from '../common/utils/date.util';
import { AggregationService } from '../aggregation/aggregation.service';
import { ReportBuilderService } from '../report/report-builder.service';
import { ReportEmitterService } from '../report/report-emitter.service';
import { IrpfReport } from '../report/entities/irpf-report.entity';
import { SheetReaderService } from '../sheets/sheet-reader.service';
import { WorkbookReaderService } from '../workbook/workbook-reader.service';
import { CliOptionsDto } from './dto/cli-options.dto';

export interface RunResult {
  report: IrpfReport;
  recognizedSheets: string[];
}

// One report run: workbook → sheets → aggregates → report → output.
@Injectable()
export class ReportCommandService {
  private readonly logger = new Logger(ReportCommandService.name);

  constructor(
    private readonly workbookReader: WorkbookReaderService,
    private readonly sheetReader: SheetReaderService,
    private readonly aggregation: AggregationService,
    private readonly reportBuilder: ReportBuilderService,
    private readonly reportEmitter: ReportEmitterService,
  ) {}

  /**
   * Runs the whole pipeline. Any thrown error leaves the output untouched.
   * @param stdout - destination when no output path is given
   */
  async run(
    options: CliOptionsDto,
    stdout: Pick<NodeJS.WritableStream, 'write'> = process.stdout,
    today: Date = new Date(),
  ): Promise<RunResult> {
    const fallbackYear = options.year ?? today.getFullYear() - 1;

    const sheets = await this.workbookReader.readWorkbook(options.input);
    const { rows, recognized, warnings } = await this.sheetReader.readSheets(sheets, {
      referenceDate: yearEnd(fallbackYear - 1),
    });

    if (recognized.length === 0) {
      if (options.strict) {
        throw new NoRecognizedSheetsError(sheets.map((sheet) => sheet.name));
      }
      this.logger.warn(`No recognized sheets in ${options.input}; the report will be empty`);
    }

    const aggregates = this.aggregation.aggregate(rows);
    const year = options.year ?? this.reportBuilder.declarationYear(rows, fallbackYear);
    const report = this.reportBuilder.build(aggregates, year, warnings);

    const rendered = await this.reportEmitter.render(report, options.format);
    await this.reportEmitter.write(rendered, options.output, stdout);

    this.logger.log(
      `Declared ${report.entries.length} asset(s) for ${year}, ${report.inventory.length} still held`,
    );
    return { report, recognizedSheets: recognized };
  }
}

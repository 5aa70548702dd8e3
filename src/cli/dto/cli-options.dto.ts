import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { OutputFormat } from '../../report/report-emitter.service';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'xlsx'];

// Command line of a report run, validated before anything is read.
export class CliOptionsDto {
  @IsString()
  @IsNotEmpty()
  input!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  output?: string;

  @IsIn(OUTPUT_FORMATS)
  format!: OutputFormat;

  @IsOptional()
  @IsInt()
  @Min(2000)
  @Max(2100)
  year?: number;

  @IsBoolean()
  strict!: boolean;

  @IsBoolean()
  verbose!: boolean;
}

import { validateSync } from 'class-validator';
import { parseArgs } from 'util';
import { UsageError } from '../common/errors/report.errors';
import { formatForPath } from '../report/report-emitter.service';
import { CliOptionsDto, OUTPUT_FORMATS } from './dto/cli-options.dto';

export const USAGE = `Usage: irpf-report <input-file> [options]

Generates IRPF "Bens e Direitos" data from a B3 investor report (.xlsx).

Options:
  -o, --output <path>    write the report to <path> instead of standard output
  -f, --format <format>  json | xlsx (default: xlsx for .xlsx outputs, else json)
  -y, --year <yyyy>      declaration year (default: year of the latest row)
      --strict           fail when the workbook has no recognized sheet
  -v, --verbose          debug logging on stderr
  -h, --help             show this help
`;

export type ParsedCommand = { help: true } | { help: false; options: CliOptionsDto };

/**
 * Parses and validates argv (without the node and script entries).
 * @throws UsageError on unknown flags, missing input or invalid values
 */
export function parseCliArgs(argv: readonly string[]): ParsedCommand {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { help: true };
  }
  if (positionals.length !== 1) {
    throw new UsageError(
      positionals.length === 0 ? 'Missing <input-file> argument' : `Unexpected arguments: ${positionals.slice(1).join(' ')}`,
    );
  }

  const format = values.format ?? formatForPath(values.output);
  const options = Object.assign(new CliOptionsDto(), {
    input: positionals[0],
    output: values.output,
    format,
    year: values.year === undefined ? undefined : Number(values.year),
    strict: values.strict ?? false,
    verbose: values.verbose ?? false,
  });

  const errors = validateSync(options);
  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new UsageError(`Invalid options: ${messages.join('; ')}`);
  }
  if (options.format === 'xlsx' && options.output === undefined) {
    throw new UsageError(`Format xlsx needs --output <path> (available formats: ${OUTPUT_FORMATS.join(', ')})`);
  }

  return { help: false, options };
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      year: { type: 'string', short: 'y' },
      strict: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

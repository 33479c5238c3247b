import path from 'path';
import { promises as fsPromises } from 'fs';
import { parseArgs } from 'util';
import { ZodError } from 'zod';
import { RangeCheckError } from '../lib/errors';
import { RangeCheckOptionsSchema, runRangeCheck } from '../services/rangeCheck/service';
import { readWorkbook } from '../services/rangeCheck/workbookReader';
import { processedFileName, writeCheckedWorkbook } from '../services/rangeCheck/workbookWriter';

export const USAGE = `Usage: range-check <input.xlsx> [options]

  --out <file>            output path (default: processed<timestamp>.xlsx next to the input)
  --strategy <name>       offset | identifier (default: offset)
  --header-rows <n>       header rows before the first number (default: 3)
  --header-cols <n>       header columns before the first number (default: 2)
  --identifier-row <n>    row holding the sensor identifiers (default: 1)
  -h, --help              show this message`;

export interface CliIo {
  log: (message: string) => void;
  error: (message: string) => void;
  now?: () => Date;
}

const consoleIo: CliIo = {
  log: message => console.log(message),
  error: message => console.error(message),
};

const FLAG_NAMES: Record<string, string> = {
  strategy: 'strategy',
  headerRows: 'header-rows',
  headerCols: 'header-cols',
  identifierRow: 'identifier-row',
};

const optionName = (issuePath: Array<string | number>) => FLAG_NAMES[String(issuePath[0])] ?? String(issuePath[0]);

// parseArgs reports unknown or malformed flags as TypeErrors carrying an ERR_PARSE_ARGS_* code
const isParseArgsError = (err: unknown): err is TypeError =>
  err instanceof TypeError && 'code' in err && typeof err.code === 'string' && err.code.startsWith('ERR_PARSE_ARGS_');

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv.filter(arg => arg !== '--'),
    options: {
      out: { type: 'string' },
      strategy: { type: 'string' },
      'header-rows': { type: 'string' },
      'header-cols': { type: 'string' },
      'identifier-row': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
}

/** Returns the process exit code. */
export async function runRangeCheckCli(argv: string[], io: CliIo = consoleIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    if (!isParseArgsError(err)) throw err;
    io.error(err.message);
    io.error(USAGE);
    return 2;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.log(USAGE);
    return 0;
  }
  const input = positionals[0];
  if (!input || positionals.length > 1) {
    io.error(USAGE);
    return 2;
  }

  try {
    const options = RangeCheckOptionsSchema.parse({
      strategy: values.strategy,
      headerRows: values['header-rows'],
      headerCols: values['header-cols'],
      identifierRow: values['identifier-row'],
    });
    const outcome = runRangeCheck(readWorkbook(input), options);
    outcome.diagnostics
      .filter(d => d.level === 'warning')
      .forEach(d => io.error(`warning: ${d.message}`));
    const { summary } = outcome.result;
    io.log(`low: ${summary.low}, ok: ${summary.ok}, high: ${summary.high}, unclassified: ${summary.unclassified}`);

    const target = values.out ?? path.join(path.dirname(input), processedFileName(io.now?.()));
    await fsPromises.writeFile(target, await writeCheckedWorkbook({ path: input, name: input }, outcome));
    io.log(`Written ${target}`);
    return 0;
  } catch (err) {
    if (err instanceof ZodError) {
      err.issues.forEach(issue => io.error(`invalid --${optionName(issue.path)}: ${issue.message}`));
      return 2;
    }
    if (err instanceof RangeCheckError) {
      io.error(err.message);
      return 1;
    }
    throw err;
  }
}

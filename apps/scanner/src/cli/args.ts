import { parseArgs } from 'node:util';
import { DEFAULT_DATA_DIR, formatZodIssues } from '@ces/config';
import { ConfigError, toError } from '@ces/domain';
import { APP_NAME, DEFAULT_ENABLE_THRESHOLD } from '@ces/scanner/infrastructure/constants';
import { z } from 'zod';

const countSchema = z.coerce.number().int().min(0);

const argsSchema = z.object({
  addressFile: z.string().trim().min(1, '--address-file is required'),
  rangeCount: countSchema.default(0),
  noCache: z.boolean().default(false),
  dataDir: z.string().trim().min(1).default(DEFAULT_DATA_DIR),
  configPath: z.string().trim().min(1).optional(),
  autoSkip: z.boolean().default(false),
  enableThreshold: countSchema.default(DEFAULT_ENABLE_THRESHOLD),
  ignoreBodyWarning: z.boolean().default(false),
});

export type ScannerOptions = z.infer<typeof argsSchema>;

export type CliCommand = { kind: 'help' } | { kind: 'scan'; options: ScannerOptions };

export const USAGE = `Usage: ${APP_NAME} --address-file <path> [options]

Options:
  --address-file <path>      file containing address ranges (a.b.c.d/n, h::h/n)
  --range-count <n>          only scan the first n ranges (0 = all)
  --no-cache                 ignore persisted results and cursor
  --data-dir <dir>           data directory (default: ${DEFAULT_DATA_DIR})
  --config <path>            configuration file (default: <data-dir>/scanner.json)
  --auto-skip                after warm-up, only scan ranges that produced a result
  --enable-threshold <n>     warm-up offsets before auto-skip applies (default: ${DEFAULT_ENABLE_THRESHOLD})
  --ignore-body-warning      do not warn about unexpected response bodies
  -h, --help                 show this help`;

export function parseCliArgs(argv: readonly string[]): CliCommand {
  let values: ReturnType<typeof parseRaw>['values'];
  try {
    values = parseRaw(argv).values;
  } catch (error) {
    throw new ConfigError(`${toError(error).message}\n\n${USAGE}`, { cause: error });
  }

  if (values.help) {
    return { kind: 'help' };
  }

  const result = argsSchema.safeParse({
    addressFile: values['address-file'] ?? '',
    rangeCount: values['range-count'],
    noCache: values['no-cache'],
    dataDir: values['data-dir'],
    configPath: values.config,
    autoSkip: values['auto-skip'],
    enableThreshold: values['enable-threshold'],
    ignoreBodyWarning: values['ignore-body-warning'],
  });
  if (!result.success) {
    throw new ConfigError(`Invalid arguments:\n${formatZodIssues(result.error.issues)}\n\n${USAGE}`);
  }
  return { kind: 'scan', options: result.data };
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      'address-file': { type: 'string' },
      'range-count': { type: 'string' },
      'no-cache': { type: 'boolean' },
      'data-dir': { type: 'string' },
      config: { type: 'string' },
      'auto-skip': { type: 'boolean' },
      'enable-threshold': { type: 'string' },
      'ignore-body-warning': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

import { SETUP_TYPES, SetupType } from '../client/setup.js';
import { criteriaLabel, FILTER_CRITERIA, FilterCriteria, toFilterCriteria } from '../report/analyzer.js';
import { DateFormat, DATE_FORMATS, DEFAULT_DATE_FORMAT, isDateFormat } from '../report/date-format.js';
import { REPORT_FORMATS, ReportFormat } from '../report/exporters.js';
import { PatcherError, PatcherErrorOptions } from '../utils/errors.js';

export class UsageError extends PatcherError {
  constructor(message: string, options: PatcherErrorOptions = {}) {
    super(message, {
      errorCode: 'USAGE_ERROR',
      suggestions: ['Run `patcher --help` for usage'],
      ...options,
    });
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  path?: string;
  sort?: string;
  omit: boolean;
  ios: boolean;
  dateFormat: DateFormat;
  formats: ReportFormat[];
  concurrency?: number;
  disableCache: boolean;
  debug: boolean;
  setup: boolean;
  setupType: SetupType;
  analyze?: FilterCriteria;
  threshold?: number;
  top?: number;
  reset: boolean;
  help: boolean;
  version: boolean;
}

export const USAGE = `Usage: patcher [options]

Generate patch compliance reports from Jamf Pro.

Options:
  -p, --path <dir>          Directory to save reports in (a Patch-Reports folder is created)
  -s, --sort <column>       Sort rows by column, e.g. "completion_percent"
  -o, --omit                Omit titles released in the last 48 hours
  -m, --ios                 Include iOS version compliance rows
  -d, --date-format <name>  ${DATE_FORMATS.join(', ')} (default: ${DEFAULT_DATE_FORMAT})
  -f, --format <list>       Comma-separated report formats: ${REPORT_FORMATS.join(', ')} (default: all)
      --concurrency <n>     Maximum concurrent API requests
      --disable-cache       Do not keep a local snapshot of the report
  -x, --debug               Write debug output to the log file
      --setup               Store and verify API credentials from PATCHER_URL,
                            PATCHER_CLIENT_ID and PATCHER_CLIENT_SECRET
      --setup-type <type>   ${SETUP_TYPES.join(', ')} (default: sso). "standard" signs in with
                            PATCHER_USERNAME and PATCHER_PASSWORD and creates the API client
  -a, --analyze <criteria>  Analyze the latest cached report: ${FILTER_CRITERIA.map(criteriaLabel).join(', ')}
      --threshold <n>       Completion percent for below-threshold (default: 70)
      --top <n>             Show only the first n results
  -r, --reset               Remove stored credentials and token
  -h, --help                Show this help
  -v, --version             Show version`;

type ValueName =
  | 'path'
  | 'sort'
  | 'dateFormat'
  | 'formats'
  | 'concurrency'
  | 'setupType'
  | 'analyze'
  | 'threshold'
  | 'top';
type FlagName = keyof Omit<CliOptions, ValueName>;

const FLAGS = new Map<string, FlagName>([
  ['--omit', 'omit'],
  ['-o', 'omit'],
  ['--ios', 'ios'],
  ['-m', 'ios'],
  ['--disable-cache', 'disableCache'],
  ['--debug', 'debug'],
  ['-x', 'debug'],
  ['--setup', 'setup'],
  ['--reset', 'reset'],
  ['-r', 'reset'],
  ['--help', 'help'],
  ['-h', 'help'],
  ['--version', 'version'],
  ['-v', 'version'],
]);

const VALUES = new Map<string, ValueName>([
  ['--path', 'path'],
  ['-p', 'path'],
  ['--sort', 'sort'],
  ['-s', 'sort'],
  ['--date-format', 'dateFormat'],
  ['-d', 'dateFormat'],
  ['--format', 'formats'],
  ['-f', 'formats'],
  ['--concurrency', 'concurrency'],
  ['--setup-type', 'setupType'],
  ['--analyze', 'analyze'],
  ['-a', 'analyze'],
  ['--threshold', 'threshold'],
  ['--top', 'top'],
]);

function parseFormats(value: string): ReportFormat[] {
  const formats: ReportFormat[] = [];
  for (const raw of value.split(',')) {
    const name = raw.trim().toLowerCase();
    const format = REPORT_FORMATS.find((candidate) => candidate === name);
    if (!format) {
      throw new UsageError(`Unknown report format "${raw.trim()}"`, {
        context: { allowed: REPORT_FORMATS.join(', ') },
      });
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new UsageError(`${name} must be a positive integer`, { context: { value } });
  }
  return parsed;
}

function parseThreshold(value: string): number {
  const parsed = /^\d+(\.\d+)?$/.test(value) ? Number(value) : Number.NaN;
  if (Number.isNaN(parsed) || parsed > 100) {
    throw new UsageError('--threshold must be a percentage between 0 and 100', { context: { value } });
  }
  return parsed;
}

function parseSetupType(value: string): SetupType {
  const type = SETUP_TYPES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!type) {
    throw new UsageError(`Unknown setup type "${value}"`, { context: { allowed: SETUP_TYPES.join(', ') } });
  }
  return type;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    omit: false,
    ios: false,
    dateFormat: DEFAULT_DATE_FORMAT,
    formats: [...REPORT_FORMATS],
    disableCache: false,
    debug: false,
    setup: false,
    setupType: 'sso',
    reset: false,
    help: false,
    version: false,
  };

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);

    const flag = FLAGS.get(name);
    if (flag) {
      if (eq !== -1) throw new UsageError(`${name} does not take a value`);
      options[flag] = true;
      continue;
    }

    const target = VALUES.get(name);
    if (!target) {
      throw new UsageError(`Unknown option "${arg}"`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`${name} requires a value`);
      }
      value = next;
      index++;
    }

    switch (target) {
      case 'path':
      case 'sort':
        if (value.trim() === '') throw new UsageError(`${name} requires a value`);
        options[target] = value;
        break;
      case 'dateFormat':
        if (!isDateFormat(value)) {
          throw new UsageError(`Unknown date format "${value}"`, { context: { allowed: DATE_FORMATS.join(', ') } });
        }
        options.dateFormat = value;
        break;
      case 'formats':
        options.formats = parseFormats(value);
        break;
      case 'concurrency':
        options.concurrency = parsePositiveInt(name, value);
        break;
      case 'setupType':
        options.setupType = parseSetupType(value);
        options.setup = true;
        break;
      case 'analyze': {
        const criteria = toFilterCriteria(value);
        if (!criteria) {
          throw new UsageError(`Unknown analysis criteria "${value}"`, {
            context: { allowed: FILTER_CRITERIA.map(criteriaLabel).join(', ') },
          });
        }
        options.analyze = criteria;
        break;
      }
      case 'threshold':
        options.threshold = parseThreshold(value);
        break;
      case 'top':
        options.top = parsePositiveInt(name, value);
        break;
    }
  }

  return options;
}

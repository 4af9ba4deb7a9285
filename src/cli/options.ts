import { readFileSync } from 'fs';
import { z } from 'zod';
import { parseExpression, type Expression } from '../check/Expression.js';
import { listModes } from '../check/Modes.js';
import { parseRuleTriples, type RuleTriple } from '../check/RuleTriple.js';
import { ProbeUsageError } from '../check/errors.js';

const MULTI_OPTIONS = ['host', 'warnstr', 'critstr', 'override'] as const;
const SINGLE_OPTIONS = [
  'password',
  'username',
  'port',
  'realm',
  'mode',
  'filter',
  'config',
  'timeout',
] as const;
const FLAG_OPTIONS = ['insecure', 'help', 'debug', 'verbose'] as const;

const MULTI_NAMES: ReadonlySet<string> = new Set<string>(MULTI_OPTIONS);
const SINGLE_NAMES: ReadonlySet<string> = new Set<string>(SINGLE_OPTIONS);
const FLAG_NAMES: ReadonlySet<string> = new Set<string>(FLAG_OPTIONS);

type MultiOption = (typeof MULTI_OPTIONS)[number];
type SingleOption = (typeof SINGLE_OPTIONS)[number];
type FlagOption = (typeof FLAG_OPTIONS)[number];
type OptionName = MultiOption | SingleOption | FlagOption;

const SHORT_OPTIONS: Readonly<Record<string, OptionName>> = {
  H: 'host',
  p: 'password',
  u: 'username',
  P: 'port',
  r: 'realm',
  m: 'mode',
  w: 'warnstr',
  c: 'critstr',
  o: 'override',
  f: 'filter',
  k: 'insecure',
  h: 'help',
  d: 'debug',
  v: 'verbose',
};

const FALSE_WORDS = new Set(['0', 'false', 'no', 'off']);

/**
 * Options as typed by the user, before defaults and validation
 */
export type RawOptions = Record<MultiOption, string[]> &
  Partial<Record<SingleOption, string>> &
  Partial<Record<FlagOption, boolean>>;

export const ProbeOptionsSchema = z.object({
  host: z.array(z.string().min(1)).min(1, 'at least one --host is required'),
  password: z
    .string({ required_error: '--password is required' })
    .min(1, '--password must not be empty'),
  username: z.string().min(1).default('root'),
  port: z.coerce.number().int().min(1).max(65535).default(8006),
  realm: z.string().min(1).default('pam'),
  mode: z.string().default(''),
  warnstr: z.array(z.string()).default([]),
  critstr: z.array(z.string()).default([]),
  override: z.array(z.string()).default([]),
  filter: z.string().default(''),
  timeout: z.coerce.number().positive().default(10),
  insecure: z.boolean().default(false),
  debug: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

type ValidatedOptions = z.infer<typeof ProbeOptionsSchema>;

/**
 * Fully parsed options: rule triples and the filter are already compiled
 */
export interface ProbeOptions
  extends Omit<ValidatedOptions, 'warnstr' | 'critstr' | 'override' | 'filter'> {
  warnstr: RuleTriple[];
  critstr: RuleTriple[];
  override: RuleTriple[];
  filter: Expression;
}

export type LoadedOptions = { kind: 'help' } | { kind: 'run'; options: ProbeOptions };

export function emptyRawOptions(): RawOptions {
  return { host: [], warnstr: [], critstr: [], override: [] };
}

function isMulti(name: string): name is MultiOption {
  return MULTI_NAMES.has(name);
}

function isSingle(name: string): name is SingleOption {
  return SINGLE_NAMES.has(name);
}

function isFlag(name: string): name is FlagOption {
  return FLAG_NAMES.has(name);
}

function setOption(raw: RawOptions, name: OptionName, value: string | undefined): void {
  if (isFlag(name)) {
    raw[name] = value === undefined || !FALSE_WORDS.has(value.toLowerCase());
  } else if (value === undefined) {
    throw new ProbeUsageError(`Option --${name} requires a value`, { option: name });
  } else if (isMulti(name)) {
    raw[name].push(value);
  } else {
    raw[name] = value;
  }
}

function resolveName(name: string, shown: string): OptionName {
  if (isMulti(name) || isSingle(name) || isFlag(name)) {
    return name;
  }
  throw new ProbeUsageError(`Unknown option ${shown}`, { option: shown });
}

/**
 * Parse command-line arguments. Accepts `--name value`, `--name=value` and
 * single-letter aliases (`-H host`).
 */
export function parseArgs(argv: readonly string[]): RawOptions {
  const raw = emptyRawOptions();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let name: OptionName;
    let inline: string | undefined;

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      inline = eq === -1 ? undefined : arg.slice(eq + 1);
      name = resolveName(key, arg);
    } else if (arg.length === 2 && arg.startsWith('-') && SHORT_OPTIONS[arg[1]]) {
      name = SHORT_OPTIONS[arg[1]];
    } else {
      throw new ProbeUsageError(`Unexpected argument '${arg}'`, { argument: arg });
    }

    if (inline === undefined && !isFlag(name)) {
      inline = argv[++i];
    }
    setOption(raw, name, inline);
  }

  return raw;
}

/**
 * Parse a config file: one `option value` pair per line, `#` comments and
 * blank lines ignored. Flags may appear without a value.
 */
export function parseConfigFile(content: string, source = 'config'): RawOptions {
  const raw = emptyRawOptions();

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) return;

    const match = /^(?:--)?(\S+)(?:\s+(.*))?$/.exec(trimmed);
    if (!match) return;
    const [, key, value] = match;
    const name = resolveName(key, `'${key}' at ${source}:${index + 1}`);
    setOption(raw, name, value === undefined ? undefined : value.trim());
  });

  return raw;
}

/**
 * Merge config-file options under command-line ones. Repeatable options keep
 * file entries first, so command-line overrides apply last.
 */
export function mergeOptions(file: RawOptions, cli: RawOptions): RawOptions {
  const merged: RawOptions = { ...file, ...definedOnly(cli) };
  for (const name of MULTI_OPTIONS) {
    merged[name] = [...file[name], ...cli[name]];
  }
  return merged;
}

function definedOnly(raw: RawOptions): Partial<RawOptions> {
  const result: Partial<RawOptions> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Validate merged options and compile filter and rule triples.
 *
 * @throws ProbeUsageError on any invalid value
 */
export function validateOptions(raw: RawOptions): ProbeOptions {
  const parsed = ProbeOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new ProbeUsageError(`Invalid options: ${message}`, { issues: parsed.error.issues });
  }

  const options = parsed.data;
  return {
    ...options,
    warnstr: parseRuleTriples(options.warnstr, 'warnstr'),
    critstr: parseRuleTriples(options.critstr, 'critstr'),
    override: parseRuleTriples(options.override, 'override'),
    filter: parseExpression(options.filter),
  };
}

/**
 * Build the options for one run from argv, an optional config file and the
 * environment (CHECK_PROXMOX_PASSWORD).
 */
export function loadOptions(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  readFile: (path: string) => string = (path) => readFileSync(path, 'utf-8'),
): LoadedOptions {
  const cli = parseArgs(argv);
  if (cli.help) {
    return { kind: 'help' };
  }

  let raw = cli;
  if (cli.config) {
    let content: string;
    try {
      content = readFile(cli.config);
    } catch (error) {
      throw new ProbeUsageError(
        `Cannot read config file ${cli.config}: ${error instanceof Error ? error.message : String(error)}`,
        { config: cli.config },
      );
    }
    raw = mergeOptions(parseConfigFile(content, cli.config), cli);
  }

  if (raw.password === undefined && env.CHECK_PROXMOX_PASSWORD) {
    raw = { ...raw, password: env.CHECK_PROXMOX_PASSWORD };
  }

  return { kind: 'run', options: validateOptions(raw) };
}

export function renderHelp(): string {
  const modes = listModes()
    .map((mode) => `  ${mode.name.padEnd(10)} ${mode.help}`)
    .join('\n');

  return `Usage: check-proxmox -H <host> [-H <host> ...] -p <password> -m <mode> [options]

Check Proxmox VE cluster objects against thresholds and print one monitoring verdict.

Options:
  -H, --host <host>          Cluster host to try, in order (repeatable)
  -p, --password <password>  Password (or CHECK_PROXMOX_PASSWORD)
  -u, --username <user>      Username (default: root)
  -r, --realm <realm>        Authentication realm (default: pam)
  -P, --port <port>          API port (default: 8006)
  -m, --mode <mode>          What to check (see below)
  -f, --filter <expr>        Only check objects matching expr, e.g. 'node=pve1 name!=test-*'
  -o, --override <rule>      pattern^field^value: force a field, e.g. 'id=qemu/*^critdisk^80'
  -w, --warnstr <rule>       pattern^label^message: warn for every matching object
  -c, --critstr <rule>       pattern^label^message: critical for every matching object
  --config <file>            Read 'option value' lines from file
  --timeout <seconds>        Per-request timeout (default: 10)
  -k, --insecure             Do not verify the server certificate
  -d, --debug                Debug logging on stderr
  -v, --verbose              Verbose logging on stderr
  -h, --help                 Show this help message

Modes:
${modes}
`;
}

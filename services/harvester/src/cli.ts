import { parseArgs } from 'node:util';
import type { CatalogueListRecord, FilterMode, LayersMode, Protocol } from '@geoharvest/shared';
import { PROTOCOLS, PROTOCOL_CODES, isProtocol } from './constants.js';
import { loadSettings, type Settings } from './config/settings.js';
import { CatalogueError, ConfigError, UnsupportedModeError, errorMessage } from './errors.js';
import { Harvester } from './harvest.js';
import { createLogger, type Logger } from './logger.js';
import { loadSortRules } from './lib/aggregate/sort-rules.js';
import { CatalogueClient } from './lib/csw/client.js';
import { protocolQuery } from './lib/csw/query.js';
import { HttpClient, type FetchLike } from './lib/http.js';
import { contentType, renderOutput, type OutputFormat } from './lib/output/format.js';
import { S3ObjectStore, writeOutput, type ObjectStore } from './lib/output/sink.js';
import { FetchPool } from './lib/pool.js';
import { ServiceResolver } from './lib/protocols/resolver.js';
import { RetryPolicy } from './lib/retry.js';

export const USAGE = `Usage: geoharvest <services|layers|records> [options] <output>

Harvest geospatial service metadata from a CSW catalogue. <output> is a file
path, s3://bucket/key, or - for stdout.

Commands:
  services                  resolved services (grouped by dataset with --dataset-md)
  layers                    services, datasets or one row per layer (see --mode)
  records                   catalogue summary records of the matching services

Options:
  -n, --number <n>          max catalogue records per protocol, 0 for all (default 0)
  -p, --protocols <list>    comma-separated protocols or codes (${PROTOCOLS.join(', ')})
      --owner <name>        organisation owning the services
      --csw-url <url>       catalogue endpoint
      --pretty              indented JSON
      --yaml                YAML output
      --snake-case          snake_case keys instead of camelCase
      --no-updated          omit the updated timestamp
      --no-filter           keep records without URL, unknown protocols and duplicates
      --concurrency <n>     parallel requests per batch
      --log-level <level>   fatal, error, warn, info, debug, trace or silent
      --dataset-md          (services) group services by dataset metadata record
  -m, --mode <mode>         (layers) services, datasets or flat (default services)
  -i, --id <metadata id>    (layers) harvest a single service record
  -s, --sort <rules.json>   (layers, flat mode) sort rules file
  -h, --help                show this help
`;

export type Command = 'services' | 'layers' | 'records';

export interface CliOptions {
  command: Command;
  output: string;
  number: number;
  protocols: Protocol[];
  owner?: string;
  cswUrl?: string;
  format: OutputFormat;
  pretty: boolean;
  snakeCase: boolean;
  updated: boolean;
  filterMode: FilterMode;
  concurrency?: number;
  logLevel?: string;
  mode: LayersMode;
  id?: string;
  sort?: string;
}

const COMMANDS: readonly string[] = ['services', 'layers', 'records'];
const MODES: readonly string[] = ['services', 'datasets', 'flat'];
const LOG_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const isCommand = (v: string): v is Command => COMMANDS.includes(v);
const isMode = (v: string): v is LayersMode => MODES.includes(v);

function parseCount(flag: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) throw new ConfigError(`${flag} expects an integer >= ${min}, got "${raw}"`);
  return n;
}

/** Accepts full protocol names and their short codes. */
export function parseProtocols(raw: string | undefined): Protocol[] {
  if (!raw) return [...PROTOCOLS];
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => {
      if (isProtocol(p)) return p;
      const byCode = PROTOCOLS.find((full) => PROTOCOL_CODES[full] === p.toLowerCase());
      if (!byCode) throw new ConfigError(`invalid protocol: ${p}`);
      return byCode;
    });
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        number: { type: 'string', short: 'n' },
        protocols: { type: 'string', short: 'p' },
        owner: { type: 'string' },
        'csw-url': { type: 'string' },
        pretty: { type: 'boolean' },
        yaml: { type: 'boolean' },
        'snake-case': { type: 'boolean' },
        'no-updated': { type: 'boolean' },
        'no-filter': { type: 'boolean' },
        concurrency: { type: 'string' },
        'log-level': { type: 'string' },
        'dataset-md': { type: 'boolean' },
        mode: { type: 'string', short: 'm' },
        id: { type: 'string', short: 'i' },
        sort: { type: 'string', short: 's' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (e) {
    throw new ConfigError(errorMessage(e));
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions | { help: true } {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { help: true };

  const [command, output, ...extra] = positionals;
  if (command === undefined || !isCommand(command)) {
    throw new ConfigError(command === undefined ? 'missing command' : `unknown command: ${command}`);
  }
  if (output === undefined) throw new ConfigError('missing output target');
  if (extra.length > 0) throw new ConfigError(`unexpected arguments: ${extra.join(' ')}`);

  let mode: LayersMode = 'services';
  if (command === 'layers' && values.mode !== undefined) {
    if (!isMode(values.mode)) throw new ConfigError(`invalid mode: ${values.mode}`);
    mode = values.mode;
  } else if (command === 'services' && values['dataset-md']) {
    mode = 'datasets';
  }

  const logLevel = values['log-level'];
  if (logLevel !== undefined && !LOG_LEVELS.includes(logLevel)) {
    throw new ConfigError(`invalid log level: ${logLevel}`);
  }

  return {
    command,
    output,
    number: parseCount('--number', values.number, 0) ?? 0,
    protocols: parseProtocols(values.protocols),
    owner: values.owner,
    cswUrl: values['csw-url'],
    format: values.yaml ? 'yaml' : 'json',
    pretty: values.pretty ?? false,
    snakeCase: values['snake-case'] ?? false,
    updated: !values['no-updated'],
    filterMode: values['no-filter'] ? 'raw' : 'filtered',
    concurrency: parseCount('--concurrency', values.concurrency, 1),
    logLevel,
    mode,
    id: command === 'layers' ? values.id : undefined,
    sort: command === 'layers' ? values.sort : undefined,
  };
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  fetch?: FetchLike;
  store?: () => ObjectStore;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: Logger;
  stdout?: (chunk: string) => void;
  stderr?: (chunk: string) => void;
}

async function searchRecords(
  catalogue: CatalogueClient,
  opts: CliOptions,
  owner: string,
): Promise<CatalogueListRecord[]> {
  const records: CatalogueListRecord[] = [];
  for (const protocol of opts.protocols) {
    records.push(...(await catalogue.searchRecords(protocolQuery(protocol, owner), opts.number)));
  }
  return records;
}

/** Runs one command and returns the process exit status. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((s: string) => process.stdout.write(s));
  const stderr = deps.stderr ?? ((s: string) => process.stderr.write(s));

  let opts: CliOptions;
  let settings: Settings;
  try {
    const parsed = parseCliArgs(argv);
    if ('help' in parsed) {
      stdout(USAGE);
      return 0;
    }
    opts = parsed;
    settings = loadSettings(deps.env ?? process.env);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    stderr(`geoharvest: ${e.message}\n\n${USAGE}`);
    return 1;
  }

  const logger = deps.logger ?? createLogger({ level: opts.logLevel ?? settings.logLevel });
  const owner = opts.owner ?? settings.serviceOwner;
  const http = new HttpClient({ fetch: deps.fetch, userAgent: settings.userAgent, timeoutMs: settings.requestTimeoutMs });
  const retry = new RetryPolicy({
    maxAttempts: settings.maxAttempts,
    backoffMs: settings.retryDelayMs,
    sleep: deps.sleep,
    logger,
  });
  const catalogue = new CatalogueClient({ url: opts.cswUrl ?? settings.cswUrl, http, retry, logger });

  try {
    let output: Record<string, unknown>;
    if (opts.command === 'records') {
      output = { records: await searchRecords(catalogue, opts, owner) };
    } else {
      const harvester = new Harvester({
        catalogue,
        resolver: new ServiceResolver({ http, retry, logger }),
        pool: new FetchPool({ concurrency: opts.concurrency ?? settings.concurrency, logger }),
        logger,
      });
      const result = await harvester.harvest({
        mode: opts.mode,
        protocols: opts.protocols,
        owner,
        maxResults: opts.number,
        filterMode: opts.filterMode,
        id: opts.id,
        sortRules: opts.sort ? await loadSortRules(opts.sort) : undefined,
      });
      output = result.output;
    }

    const content = renderOutput(output, {
      format: opts.format,
      pretty: opts.pretty,
      keyStyle: opts.snakeCase ? 'snake' : 'camel',
      updated: opts.updated,
    });
    await writeOutput(opts.output, content, {
      contentType: contentType(opts.format),
      store: deps.store ?? (() => new S3ObjectStore({ region: settings.awsRegion })),
      stdout,
      logger,
    });
    logger.info({ msg: 'output written', target: opts.output });
    return 0;
  } catch (e) {
    if (e instanceof UnsupportedModeError || e instanceof ConfigError || e instanceof CatalogueError) {
      logger.error({ msg: e.message, err: e.name });
      stderr(`geoharvest: ${e.message}\n`);
      return 1;
    }
    throw e;
  }
}

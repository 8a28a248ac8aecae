import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_LATENCY_PROBES_PER_CYCLE,
  DEFAULT_PING_TARGET,
  DEFAULT_PROBE_INTERVAL_MS,
  createMeasurementConfig,
  type MeasurementConfig,
} from '@linetest/domain';
import { defaultLogFileName, getDataDir } from '@linetest/adapters';
import type { LogLevel, LoggerConfig } from '../logging/logger.js';

export const DEFAULT_DOWNLOAD_URLS: readonly string[] = [
  'https://github.com/aseprite/aseprite/releases/download/v1.2.27/Aseprite-v1.2.27-Source.zip',
  'https://dl.google.com/drive-file-stream/GoogleDriveSetup.exe',
  'https://awscli.amazonaws.com/AWSCLIV2.msi',
  'https://awscli.amazonaws.com/awscli-exe-linux-x86_64.zip',
];

export type AppCommand =
  | { readonly kind: 'live' }
  | { readonly kind: 'once' }
  | { readonly kind: 'load'; readonly path: string }
  | { readonly kind: 'list' }
  | { readonly kind: 'help' };

export interface AppConfig {
  readonly command: AppCommand;
  readonly measurement: MeasurementConfig;
  readonly logging: LoggerConfig;
  readonly dataDir: string;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const flag = z.enum(['0', '1', 'true', 'false']).transform((v) => v === '1' || v === 'true');

const EnvSchema = z.object({
  LINETEST_PING_TARGET: z.string().trim().min(1).optional(),
  LINETEST_DOWNLOAD_URLS: z
    .string()
    .transform((raw) =>
      raw
        .split(',')
        .map((u) => u.trim())
        .filter((u) => u.length > 0),
    )
    .pipe(z.array(z.string().url()))
    .optional(),
  LINETEST_PING_INTERVAL_MS: z.coerce.number().finite().nonnegative().optional(),
  LINETEST_DURATION_MS: z.coerce.number().finite().positive().optional(),
  LINETEST_PROBES_PER_CYCLE: z.coerce.number().int().positive().optional(),
  LINETEST_LOG_FILE: z.string().trim().min(1).optional(),
  LINETEST_NO_LOG: flag.optional(),
  LINETEST_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

const seconds = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number of seconds` })
    .finite()
    .nonnegative()
    .transform((s) => Math.round(s * 1000));

const ArgsSchema = z.object({
  target: z.string().trim().min(1).optional(),
  'download-url': z.array(z.string().url()).optional(),
  'ping-interval': seconds('--ping-interval').optional(),
  duration: seconds('--duration')
    .refine((ms) => ms > 0, '--duration must be positive')
    .optional(),
  'log-file': z.string().trim().min(1).optional(),
  'no-log': z.boolean().optional(),
  verbose: z.boolean().optional(),
  once: z.boolean().optional(),
  load: z.string().trim().min(1).optional(),
  list: z.boolean().optional(),
  help: z.boolean().optional(),
});

type Env = Record<string, string | undefined>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`);
}

function readArgs(argv: readonly string[]): z.infer<typeof ArgsSchema> {
  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        target: { type: 'string' },
        'download-url': { type: 'string', multiple: true },
        'ping-interval': { type: 'string' },
        duration: { type: 'string' },
        'log-file': { type: 'string' },
        'no-log': { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        once: { type: 'boolean' },
        load: { type: 'string' },
        list: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new ConfigError('invalid arguments', [err instanceof Error ? err.message : String(err)]);
  }

  const parsed = ArgsSchema.safeParse(values);
  if (!parsed.success) throw new ConfigError('invalid arguments', issuesOf(parsed.error));
  return parsed.data;
}

function readEnv(env: Env): z.infer<typeof EnvSchema> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError('invalid environment', issuesOf(parsed.error));
  return parsed.data;
}

function commandOf(args: z.infer<typeof ArgsSchema>): AppCommand {
  if (args.help) return { kind: 'help' };
  if (args.list) return { kind: 'list' };
  if (args.load !== undefined) return { kind: 'load', path: args.load };
  if (args.once) return { kind: 'once' };
  return { kind: 'live' };
}

/**
 * Resolve settings from the environment, then let command-line flags override them.
 * Throws `ConfigError` listing every invalid value.
 */
export function loadConfig(
  env: Env = process.env,
  argv: readonly string[] = process.argv.slice(2),
  now: Date = new Date(),
  dataDir: string = getDataDir(),
): AppConfig {
  const e = readEnv(env);
  const args = readArgs(argv);

  const noLog = args['no-log'] ?? e.LINETEST_NO_LOG ?? false;
  const logPath = noLog
    ? undefined
    : args['log-file'] ?? e.LINETEST_LOG_FILE ?? path.join(dataDir, defaultLogFileName(now));

  const measurement = createMeasurementConfig({
    pingTargets: [args.target ?? e.LINETEST_PING_TARGET ?? DEFAULT_PING_TARGET],
    downloadUrls: args['download-url'] ?? e.LINETEST_DOWNLOAD_URLS ?? DEFAULT_DOWNLOAD_URLS,
    probeIntervalMs: args['ping-interval'] ?? e.LINETEST_PING_INTERVAL_MS ?? DEFAULT_PROBE_INTERVAL_MS,
    totalDurationMs: args.duration ?? e.LINETEST_DURATION_MS,
    latencyProbesPerCycle: e.LINETEST_PROBES_PER_CYCLE ?? DEFAULT_LATENCY_PROBES_PER_CYCLE,
    logPath,
  });

  const level: LogLevel = args.verbose ? 'debug' : (e.LINETEST_LOG_LEVEL ?? 'warn');

  return Object.freeze({
    command: commandOf(args),
    measurement,
    logging: { level },
    dataDir,
  });
}

export const USAGE = `Usage: linetest [options]

  --target <host>          host to ping (default ${DEFAULT_PING_TARGET})
  --download-url <url>     file to download for speed tests; repeat for several
  --ping-interval <s>      seconds between pings (default ${DEFAULT_PROBE_INTERVAL_MS / 1000})
  --duration <s>           stop after this many seconds
  --log-file <path>        session file to write (default: data dir)
  --no-log                 do not write a session file
  --once                   run a single measurement cycle
  --load <path>            summarize a saved session
  --list                   list saved sessions
  -v, --verbose            debug logging
  -h, --help               show this help`;

import { execFile } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import {
  ProbeSetupError,
  type LatencyProbePort,
  type LatencyProbeSession,
  type ProbeResultSink,
} from '@linetest/domain';

const DEFAULT_TIMEOUT_MS = 2_000;

type PingPlatform = 'linux' | 'darwin' | 'freebsd' | 'win32';

export interface PingRun {
  exitCode: number;
  stdout: string;
}

/** Runs the ping binary once. Rejects only when the process cannot be spawned. */
export type PingExecutor = (command: string, args: string[], timeoutMs: number) => Promise<PingRun>;

/** Absolute path of an executable, or `null` when it cannot be found. Synchronous. */
export type ExecutableLookup = (name: string) => string | null;

export interface SystemPingOptions {
  platform?: NodeJS.Platform;
  timeoutMs?: number;
  executor?: PingExecutor;
  lookup?: ExecutableLookup;
}

type Env = Record<string, string | undefined>;

function statIfPresent(file: string): fs.Stats | undefined {
  try {
    return fs.statSync(file, { throwIfNoEntry: false });
  } catch (err) {
    // a PATH entry that is a file, or a directory we may not enter
    if (err instanceof Error && 'code' in err && (err.code === 'ENOTDIR' || err.code === 'EACCES')) {
      return undefined;
    }
    throw err;
  }
}

/** Search `PATH` the way the shell would. On Windows `PATHEXT` supplies the extensions. */
export function findExecutable(
  name: string,
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
): string | null {
  const windows = platform === 'win32';
  const pathApi = windows ? path.win32 : path.posix;
  const dirs = (env['PATH'] ?? env['Path'] ?? '').split(pathApi.delimiter).filter((d) => d.length > 0);
  const extensions = windows ? (env['PATHEXT'] ?? '.COM;.EXE;.BAT;.CMD').split(';') : [''];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = pathApi.join(dir, name + ext);
      const stat = statIfPresent(candidate);
      if (!stat?.isFile()) continue;
      if (windows || (stat.mode & 0o111) !== 0) return candidate;
    }
  }
  return null;
}

// `time=12.3 ms` (iputils, BSD), `time=12ms` / `time<1ms` (Windows)
const RTT_PATTERN = /time\s*([=<])\s*([\d]+(?:[.,]\d+)?)\s*ms/i;

/** Extract the round-trip time from one ping's output; `null` when there was no reply. */
export function parsePingOutput(stdout: string): number | null {
  const match = RTT_PATTERN.exec(stdout);
  if (!match) return null;
  const value = Number.parseFloat((match[2] ?? '').replace(',', '.'));
  return Number.isFinite(value) ? value : null;
}

export function pingArgs(platform: PingPlatform, target: string, timeoutMs: number): string[] {
  const seconds = String(Math.max(1, Math.ceil(timeoutMs / 1000)));
  switch (platform) {
    case 'win32':
      return ['-n', '1', '-w', String(timeoutMs), target];
    case 'darwin':
    case 'freebsd':
      return ['-c', '1', '-t', seconds, target];
    case 'linux':
    default:
      return ['-c', '1', '-W', seconds, target];
  }
}

function isPingPlatform(platform: NodeJS.Platform): platform is PingPlatform {
  return platform === 'linux' || platform === 'darwin' || platform === 'freebsd' || platform === 'win32';
}

const execPing: PingExecutor = (command, args, timeoutMs) =>
  new Promise<PingRun>((resolve, reject) => {
    execFile(command, args, { timeout: timeoutMs + 1_000, windowsHide: true }, (err, stdout) => {
      const code: unknown = err && 'code' in err ? err.code : undefined;
      if (err && typeof code === 'string') {
        // spawn failure (ENOENT, EACCES): the facility is gone, not a timeout
        reject(err);
        return;
      }
      resolve({ exitCode: err ? (typeof code === 'number' ? code : 1) : 0, stdout: String(stdout) });
    });
  });

class SystemPingSession implements LatencyProbeSession {
  constructor(
    readonly target: string,
    private readonly command: string,
    private readonly args: string[],
    private readonly timeoutMs: number,
    private readonly executor: PingExecutor,
  ) {}

  async probe(onResult: ProbeResultSink): Promise<void> {
    const run = await this.executor(this.command, this.args, this.timeoutMs);
    onResult(run.exitCode === 0 ? parsePingOutput(run.stdout) : null);
  }
}

/** Latency probes through the platform `ping` binary, one echo request per probe. */
export class SystemPingProbe implements LatencyProbePort {
  private readonly platform: NodeJS.Platform;
  private readonly timeoutMs: number;
  private readonly executor: PingExecutor;
  private readonly lookup: ExecutableLookup;

  constructor(opts: SystemPingOptions = {}) {
    this.platform = opts.platform ?? process.platform;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.executor = opts.executor ?? execPing;
    this.lookup = opts.lookup ?? ((name) => findExecutable(name, process.env, this.platform));
  }

  open(target: string): LatencyProbeSession {
    const host = target.trim();
    if (!host) {
      throw new ProbeSetupError('ping target is empty');
    }
    if (host.startsWith('-')) {
      throw new ProbeSetupError(`invalid ping target: ${host}`);
    }
    if (!isPingPlatform(this.platform)) {
      throw new ProbeSetupError(`latency probing is not supported on ${this.platform}`);
    }
    const command = this.lookup('ping');
    if (command === null) {
      throw new ProbeSetupError('ping executable not found on PATH');
    }
    return new SystemPingSession(
      host,
      command,
      pingArgs(this.platform, host, this.timeoutMs),
      this.timeoutMs,
      this.executor,
    );
  }
}

import { spawn } from 'node:child_process';
import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import type { TunnelConfig } from '@ces/config';
import {
  createChildLogger,
  FileSystemError,
  ProcessLaunchError,
  type TunnelHandle,
  type TunnelPort,
  type TunnelTarget,
  toError,
} from '@ces/domain';
import {
  CONFIG_PATH_PLACEHOLDER,
  TUNNEL_CONFIG_FILE_NAME,
  TUNNEL_OUTPUT_LIMIT_CHARS,
} from '@ces/scanner/infrastructure/constants';
import type { TunnelConfigBuilder } from './tunnel-config.builder';

const log = createChildLogger('tunnel');

type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

/** The part of `ChildProcess` the supervisor relies on. */
export interface TunnelChild {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit' | 'close', listener: ExitListener): this;
  on(event: 'error', listener: (error: Error) => void): this;
  off(event: 'exit' | 'close', listener: ExitListener): this;
  off(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnTunnel = (command: string, args: readonly string[]) => TunnelChild;

/**
 * Starts the tunnel in its own process group so a terminal Ctrl-C only reaches
 * the scanner, which then stops the tunnel after the batch. The child is
 * killed if the scanner exits while it is still running.
 */
export const spawnTunnel: SpawnTunnel = (command, args) => {
  const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true, detached: true });
  const killOnExit = () => {
    child.kill('SIGKILL');
  };
  process.once('exit', killOnExit);
  child.once('close', () => process.off('exit', killOnExit));
  return child;
};

type ReadyOutcome = { ready: true } | { ready: false; reason: string; cause?: Error };

/** Keeps the start and the end of a process's diagnostic output. */
class OutputCapture {
  private head = '';
  private tail = '';
  private omitted = 0;
  private readonly headLimit: number;
  private readonly tailLimit: number;

  constructor(child: TunnelChild, limit: number) {
    this.headLimit = Math.floor(limit / 2);
    this.tailLimit = limit - this.headLimit;
    const append = (chunk: Buffer | string) => this.append(chunk.toString());
    child.stdout?.on('data', append);
    child.stderr?.on('data', append);
  }

  text(): string {
    if (this.omitted === 0) {
      return this.head + this.tail;
    }
    return `${this.head}\n[${this.omitted} characters omitted]\n${this.tail}`;
  }

  private append(text: string): void {
    const room = this.headLimit - this.head.length;
    if (room > 0) {
      this.head += text.slice(0, room);
      text = text.slice(room);
    }

    this.tail += text;
    const excess = this.tail.length - this.tailLimit;
    if (excess > 0) {
      this.omitted += excess;
      this.tail = this.tail.slice(excess);
    }
  }
}

/**
 * Tracks when a child has fully closed. A child that failed to spawn never
 * emits `close` on every platform, so a spawn error without a pid also
 * counts.
 */
class SupervisedProcess {
  readonly closed: Promise<void>;
  private done = false;

  constructor(readonly child: TunnelChild) {
    this.closed = new Promise((resolve) => {
      const settle = () => {
        this.done = true;
        resolve();
      };
      child.on('close', settle);
      child.on('error', (error) => {
        log.debug(`Tunnel process error: ${error.message}`, { pid: child.pid });
        if (child.pid === undefined) {
          settle();
        }
      });
    });
  }

  get running(): boolean {
    return !this.done;
  }

  /** SIGTERM, then SIGKILL after `timeoutMs`. Throws if the process survives both. */
  async terminate(timeoutMs: number): Promise<void> {
    if (!this.running) {
      return;
    }
    this.child.kill('SIGTERM');
    if (await this.waitClosed(timeoutMs)) {
      return;
    }

    log.warn(`Tunnel process ${this.child.pid} ignored SIGTERM, sending SIGKILL`);
    this.child.kill('SIGKILL');
    if (!(await this.waitClosed(timeoutMs))) {
      throw new Error(`Tunnel process ${this.child.pid} did not exit after SIGKILL`);
    }
  }

  private async waitClosed(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.closed.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}

class ProcessTunnelHandle implements TunnelHandle {
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly process: SupervisedProcess,
    private readonly stopTimeoutMs: number,
  ) {}

  get pid(): number | undefined {
    return this.process.child.pid;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.process.terminate(this.stopTimeoutMs).catch((error) => {
        log.warn(`Failed to stop tunnel process ${this.pid}: ${toError(error).message}`);
      });
    }
    return this.stopping;
  }
}

export interface TunnelProcessOptions {
  config: TunnelConfig;
  dataDir: string;
  spawn?: SpawnTunnel;
  /** Characters of diagnostic output embedded in launch errors. */
  outputLimit?: number;
}

/**
 * Runs the external tunnel binary for one batch: writes the generated config,
 * launches the process and waits for its first diagnostic output.
 */
export class TunnelProcessAdapter implements TunnelPort {
  private readonly config: TunnelConfig;
  private readonly spawn: SpawnTunnel;
  private readonly errorPattern: RegExp;
  private readonly outputLimit: number;
  readonly configPath: string;

  constructor(
    private readonly builder: TunnelConfigBuilder,
    options: TunnelProcessOptions,
  ) {
    this.config = options.config;
    this.spawn = options.spawn ?? spawnTunnel;
    this.errorPattern = new RegExp(options.config.errorPattern);
    this.outputLimit = options.outputLimit ?? TUNNEL_OUTPUT_LIMIT_CHARS;
    this.configPath = path.resolve(options.dataDir, TUNNEL_CONFIG_FILE_NAME);
  }

  async start(targets: readonly TunnelTarget[]): Promise<TunnelHandle> {
    await this.writeConfig(targets);

    const command = this.config.binaryPath;
    const args = this.config.args.map((arg) => arg.replaceAll(CONFIG_PATH_PLACEHOLDER, this.configPath));

    let child: TunnelChild;
    try {
      child = this.spawn(command, args);
    } catch (error) {
      throw new ProcessLaunchError(command, toError(error).message, '', { cause: error });
    }

    const supervised = new SupervisedProcess(child);
    const output = new OutputCapture(child, this.outputLimit);
    const outcome = await this.waitForReady(child);

    if (!outcome.ready) {
      try {
        await supervised.terminate(this.config.stopTimeoutMs);
      } catch (error) {
        log.warn(`Failed to stop tunnel process after launch failure: ${toError(error).message}`);
      }
      throw new ProcessLaunchError(command, outcome.reason, output.text().trim(), { cause: outcome.cause });
    }

    log.debug(`Tunnel process ${child.pid} ready`, { targets: targets.length });
    return new ProcessTunnelHandle(supervised, this.config.stopTimeoutMs);
  }

  private async writeConfig(targets: readonly TunnelTarget[]): Promise<void> {
    const document = this.builder.build(targets);
    try {
      await mkdir(path.dirname(this.configPath), { recursive: true });
      await writeFile(this.configPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw FileSystemError.from(this.configPath, error);
    }
  }

  private waitForReady(child: TunnelChild): Promise<ReadyOutcome> {
    return new Promise((resolve) => {
      const onData = (chunk: Buffer | string) => {
        const text = chunk.toString();
        finish(
          this.errorPattern.test(text)
            ? { ready: false, reason: 'reported an error on startup' }
            : { ready: true },
        );
      };
      const onExit: ExitListener = (code, signal) => {
        finish({ ready: false, reason: `exited (${describeExit(code, signal)}) before becoming ready` });
      };
      const onError = (error: Error) => {
        finish({ ready: false, reason: error.message, cause: error });
      };
      const timer = setTimeout(() => {
        finish({ ready: false, reason: `produced no output within ${this.config.readyTimeoutMs} ms` });
      }, this.config.readyTimeoutMs);

      const finish = (outcome: ReadyOutcome) => {
        clearTimeout(timer);
        child.stderr?.off('data', onData);
        child.off('exit', onExit);
        child.off('error', onError);
        resolve(outcome);
      };

      child.stderr?.once('data', onData);
      child.on('exit', onExit);
      child.on('error', onError);
    });
  }
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  if (signal) {
    return `signal ${signal}`;
  }
  return `code ${code ?? 'unknown'}`;
}

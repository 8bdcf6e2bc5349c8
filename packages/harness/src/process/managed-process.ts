/**
 * Managed Process
 *
 * Supervises one server binary running out of process: spawns it, gates
 * readiness on its /health endpoint and shuts it down with SIGINT.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { ENDPOINTS, HTTP_STATUS, PROCESS } from '../constants.js';
import { ProcessExitedError, ProcessStateError, StartupTimeoutError } from '../errors.js';
import type { HttpSession } from '../transport/http-session.js';
import { isHealthResponse } from '../types.js';
import { logger } from '../utils/logger.js';
import { delay, pollUntil } from '../utils/wait.js';

export type ProcessState = 'unstarted' | 'starting' | 'healthy' | 'failed_to_start' | 'stopped';

/**
 * The parts of a child process the supervisor relies on.
 * node's ChildProcess satisfies it.
 */
export interface ChildHandle extends EventEmitter {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type ProcessLauncher = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

/**
 * Launch a real OS process sharing this process's environment and stdio
 */
export const spawnProcess: ProcessLauncher = (command, args, options) => spawn(command, args, options);

export interface ManagedProcessOptions {
  binaryPath: string;
  args: string[];
  /** Base URL the process serves on, e.g. http://localhost:3030 */
  host: string;
  /** Session used for health checks */
  session: HttpSession;
  launcher?: ProcessLauncher;
  startupTimeout?: number;
  pollInterval?: number;
  stopCooldown?: number;
  shutdownTimeout?: number;
}

export class ManagedProcess extends EventEmitter {
  readonly binaryPath: string;
  readonly args: readonly string[];
  readonly host: string;

  private readonly session: HttpSession;
  private readonly launcher: ProcessLauncher;
  private readonly startupTimeout: number;
  private readonly pollInterval: number;
  private readonly stopCooldown: number;
  private readonly shutdownTimeout: number;

  private child: ChildHandle | null = null;
  private _state: ProcessState = 'unstarted';
  private exitInfo: { code: number | null; signal: NodeJS.Signals | null } | null = null;
  private spawnError: Error | null = null;
  private exited: Promise<void> = Promise.resolve();

  constructor(options: ManagedProcessOptions) {
    super();
    this.binaryPath = options.binaryPath;
    this.args = [...options.args];
    this.host = options.host;
    this.session = options.session;
    this.launcher = options.launcher ?? spawnProcess;
    this.startupTimeout = options.startupTimeout ?? PROCESS.STARTUP_TIMEOUT;
    this.pollInterval = options.pollInterval ?? PROCESS.HEALTH_POLL_INTERVAL;
    this.stopCooldown = options.stopCooldown ?? PROCESS.STOP_COOLDOWN;
    this.shutdownTimeout = options.shutdownTimeout ?? PROCESS.SHUTDOWN_TIMEOUT;
  }

  get state(): ProcessState {
    return this._state;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  /**
   * Whether the child is still running (spawned and not yet exited)
   */
  get isRunning(): boolean {
    return this.child !== null && this.exitInfo === null && this.spawnError === null;
  }

  /**
   * Spawn the binary and wait until it reports healthy
   */
  async start(): Promise<void> {
    if (this._state !== 'unstarted') {
      throw new ProcessStateError(`cannot start ${this.binaryPath} in state ${this._state}`, {
        state: this._state,
      });
    }

    this._state = 'starting';
    const child = this.launcher(this.binaryPath, this.args, {
      env: { ...process.env },
      stdio: 'inherit',
    });
    this.child = child;

    this.exited = new Promise<void>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitInfo = { code, signal };
        logger.processEvent('exited', this.host, { code, signal });
        this.emit('exit', code, signal);
        resolve();
      });
      child.on('error', (error: Error) => {
        if (child.pid === undefined) {
          // A process that failed to spawn never emits 'exit'
          this.spawnError = error;
          resolve();
        } else {
          logger.error(`[Process] ${this.host} child error`, error, { pid: child.pid });
        }
      });
    });

    logger.processEvent('spawned', this.host, { binary: this.binaryPath, pid: child.pid });
    this.emit('started', { pid: child.pid });

    const healthy = await pollUntil(
      async () => {
        if (!this.isRunning) {
          return true;
        }
        return this.isHealthy();
      },
      this.startupTimeout,
      this.pollInterval
    );

    if (this.spawnError || this.exitInfo) {
      this._state = 'failed_to_start';
      logger.processEvent('startup_failed', this.host, { reason: 'exited' });
      throw new ProcessExitedError(
        this.binaryPath,
        this.exitInfo?.code ?? null,
        this.exitInfo?.signal ?? null,
        this.spawnError ?? undefined
      );
    }

    if (!healthy) {
      this._state = 'failed_to_start';
      logger.processEvent('startup_failed', this.host, { reason: 'timeout', timeoutMs: this.startupTimeout });
      await this.terminate();
      throw new StartupTimeoutError(this.host, this.startupTimeout);
    }

    this._state = 'healthy';
    logger.processEvent('healthy', this.host);
    this.emit('healthy');
  }

  /**
   * Check GET /health. Non-200 statuses and unparsable bodies count as
   * unhealthy; network errors are left to the caller.
   */
  async isHealthy(): Promise<boolean> {
    const response = await this.session.send('GET', `${this.host}${ENDPOINTS.HEALTH}`);
    if (response.status !== HTTP_STATUS.OK) {
      return false;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body.toString('utf8'));
    } catch {
      return false;
    }

    return isHealthResponse(parsed) && parsed.message === 'healthy';
  }

  /**
   * Interrupt the process, wait for it to exit, then wait out the cooldown.
   * A process that is already gone is not an error.
   */
  async stop(): Promise<void> {
    if (this._state === 'stopped') {
      return;
    }

    logger.processEvent('stopping', this.host, { pid: this.child?.pid });
    await this.terminate();

    if (this.child) {
      await delay(this.stopCooldown);
    }

    this._state = 'stopped';
    logger.processEvent('stopped', this.host);
    this.emit('stopped');
  }

  /**
   * Send SIGINT and wait for exit, escalating to SIGKILL after the
   * shutdown timeout
   */
  private async terminate(): Promise<void> {
    if (!this.isRunning || !this.child) {
      return;
    }

    this.child.kill(PROCESS.STOP_SIGNAL);

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.shutdownTimeout);
    });

    const gaveUp = await Promise.race([this.exited.then(() => false), timedOut]);
    clearTimeout(timer);

    if (gaveUp && this.isRunning) {
      logger.warn(`[Process] ${this.host} ignored ${PROCESS.STOP_SIGNAL}, sending SIGKILL`);
      this.child.kill('SIGKILL');
      await this.exited;
    }
  }
}

import type { LoggerMethods } from '@pagemill/logger';
import type { ChildProcess } from 'node:child_process';
import type { Readable } from 'node:stream';

import { delay } from 'es-toolkit';
import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

import { INFERENCE_SERVER } from './config/constants';
import { InferenceServerError } from './errors/inference-error';

export interface InferenceServerOptions {
  /** Model weights path or hub id passed to the server */
  modelPath: string;
  /** Name clients use to address the model */
  servedModelName: string;
  port: number;
  /** Context window the server allocates */
  maxModelLength: number;
  /** Readiness probe, typically InferenceClient.checkHealth */
  healthCheck: () => Promise<boolean>;
  /** Server executable (default: 'vllm') */
  command?: string;
  /** Extra CLI arguments appended to the serve command */
  extraArgs?: string[];
  /** Restarts allowed after unexpected exits (default: 5) */
  maxRestarts?: number;
  /** Delay before each restart in milliseconds (default: 5000) */
  restartDelayMs?: number;
  /** Readiness wait per start in milliseconds (default: 600000) */
  readyTimeoutMs?: number;
  /** Readiness poll interval in milliseconds (default: 1000) */
  readyPollIntervalMs?: number;
  /** Called once when the server fails beyond recovery */
  onFatal?: (error: InferenceServerError) => void;
}

/**
 * Runs the model backend as a child process for the lifetime of the
 * pipeline.
 *
 * Output is forwarded to the logger line by line. Unexpected exits are
 * followed by a restart, up to `maxRestarts`. Output matching a known
 * corruption pattern, or running out of restarts, is reported through
 * `onFatal` and stops the server.
 */
export class InferenceServer {
  private readonly command: string;
  private readonly maxRestarts: number;
  private readonly restartDelayMs: number;
  private readonly readyTimeoutMs: number;
  private readonly readyPollIntervalMs: number;
  private process: ChildProcess | null = null;
  private launchError: Error | null = null;
  private stopping = false;
  private failed = false;
  /** True while a ready server is being watched for crashes */
  private supervising = false;
  private restartCount = 0;
  private restartTask: Promise<void> | null = null;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: InferenceServerOptions,
  ) {
    this.command = options.command ?? INFERENCE_SERVER.COMMAND;
    this.maxRestarts = options.maxRestarts ?? INFERENCE_SERVER.MAX_RESTARTS;
    this.restartDelayMs =
      options.restartDelayMs ?? INFERENCE_SERVER.RESTART_DELAY_MS;
    this.readyTimeoutMs =
      options.readyTimeoutMs ?? INFERENCE_SERVER.READY_TIMEOUT_MS;
    this.readyPollIntervalMs =
      options.readyPollIntervalMs ?? INFERENCE_SERVER.READY_POLL_INTERVAL_MS;
  }

  get restarts(): number {
    return this.restartCount;
  }

  get running(): boolean {
    return this.process !== null;
  }

  /** Arguments for the serve command */
  buildArgs(): string[] {
    const { modelPath, servedModelName, port, maxModelLength, extraArgs } =
      this.options;
    return [
      'serve',
      modelPath,
      '--port',
      String(port),
      '--served-model-name',
      servedModelName,
      '--max-model-len',
      String(maxModelLength),
      '--disable-log-requests',
      '--uvicorn-log-level',
      'warning',
      ...(extraArgs ?? []),
    ];
  }

  /**
   * Start the process and wait for the readiness probe to pass.
   */
  async start(): Promise<void> {
    this.stopping = false;
    this.failed = false;
    this.launch();
    try {
      await this.waitUntilReady();
    } catch (error) {
      this.process?.kill('SIGKILL');
      throw error;
    }
    this.supervising = true;
  }

  /**
   * Terminate the process: SIGTERM, then SIGKILL after a grace period.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.supervising = false;
    const proc = this.process;
    if (proc) {
      this.logger.info('[InferenceServer] Stopping server...');
      const exited = new Promise<void>((resolve) => {
        proc.once('exit', () => resolve());
      });
      proc.kill('SIGTERM');
      const timer = setTimeout(() => {
        this.logger.warn('[InferenceServer] Server did not exit, killing');
        proc.kill('SIGKILL');
      }, INFERENCE_SERVER.STOP_TIMEOUT_MS);
      await exited;
      clearTimeout(timer);
    }
    await this.restartTask;
    this.process = null;
    this.logger.info('[InferenceServer] Stopped');
  }

  private launch(): void {
    const args = this.buildArgs();
    this.logger.info(
      `[InferenceServer] Starting ${this.command} on port ${this.options.port}`,
    );

    const proc = spawn(this.command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.process = proc;
    this.launchError = null;

    this.forwardOutput(proc.stdout);
    this.forwardOutput(proc.stderr);

    proc.on('error', (error) => {
      this.logger.error('[InferenceServer] Process error:', error);
      // A process that failed to spawn never emits exit
      if (this.process === proc && proc.pid === undefined) {
        this.process = null;
        this.launchError = error;
      }
    });
    proc.on('exit', (code, signal) => {
      if (this.process === proc) {
        this.process = null;
      }
      if (this.stopping || this.failed || !this.supervising) return;

      this.logger.warn(
        `[InferenceServer] Server exited unexpectedly (code ${code ?? 'null'}, signal ${signal ?? 'none'})`,
      );
      this.restartTask = this.restart().catch((error: unknown) => {
        this.fail(
          error instanceof InferenceServerError
            ? error
            : new InferenceServerError('Server restart failed', {
                cause: error,
              }),
        );
      });
    });
  }

  private async restart(): Promise<void> {
    this.supervising = false;

    for (;;) {
      if (this.restartCount >= this.maxRestarts) {
        throw new InferenceServerError(
          `Server failed after ${this.restartCount} restarts, giving up`,
        );
      }
      this.restartCount++;
      this.logger.info(
        `[InferenceServer] Restarting in ${this.restartDelayMs}ms (${this.restartCount}/${this.maxRestarts})`,
      );
      await delay(this.restartDelayMs);
      if (this.stopping || this.failed) return;

      this.launch();
      try {
        await this.waitUntilReady();
        this.supervising = true;
        this.logger.info('[InferenceServer] Server restarted successfully');
        return;
      } catch (error) {
        if (this.stopping || this.failed) return;
        this.logger.warn(
          `[InferenceServer] Restart attempt failed: ${InferenceServerError.getErrorMessage(error)}`,
        );
        this.process?.kill('SIGKILL');
      }
    }
  }

  private async waitUntilReady(): Promise<void> {
    const deadline = Date.now() + this.readyTimeoutMs;

    while (Date.now() < deadline) {
      if (this.stopping || this.failed) {
        throw new InferenceServerError('Server stopped before becoming ready');
      }
      if (!this.process) {
        throw this.launchError
          ? new InferenceServerError(
              `Server failed to start: ${this.launchError.message}`,
              { cause: this.launchError },
            )
          : new InferenceServerError('Server exited before becoming ready');
      }
      if (await this.options.healthCheck()) {
        this.logger.info('[InferenceServer] Server is ready');
        return;
      }
      await delay(this.readyPollIntervalMs);
    }

    throw new InferenceServerError(
      `Server not ready after ${this.readyTimeoutMs}ms`,
    );
  }

  private forwardOutput(stream: Readable | null): void {
    if (!stream) return;
    const lines = createInterface({ input: stream });
    lines.on('line', (line) => {
      this.logger.debug(`[InferenceServer] ${line}`);
      const fatal = INFERENCE_SERVER.FATAL_OUTPUT_PATTERNS.find((pattern) =>
        line.includes(pattern),
      );
      if (fatal) {
        this.fail(
          new InferenceServerError(`Model backend reported corruption: ${line}`),
        );
      }
    });
  }

  private fail(error: InferenceServerError): void {
    if (this.failed) return;
    this.failed = true;
    this.logger.error(`[InferenceServer] ${error.message}`);
    this.process?.kill('SIGKILL');
    this.options.onFatal?.(error);
  }
}

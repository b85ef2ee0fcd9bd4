import { Injectable, Inject, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { spawn, ChildProcess } from 'child_process';
import { randomUUID } from 'crypto';
import treeKill from 'tree-kill';
import { executorConfig } from '@app/shared/config/configuration';
import { ExecutionError } from '@app/shared/errors/command.errors';
import {
  ExecutionJob,
  ExecutionResult,
  ParsedCommandRequest,
} from '@app/shared/types/executor.types';
import { ChatPoster } from '@app/shared/types/slack.types';
import { renderTemplate } from '@app/shared/utils/template.utils';
import { CHAT_POSTER } from '../slack/slack.constants';
import {
  buildExecutionErrorMessage,
  buildExecutionResultMessage,
} from '../slack/formatters/execution-message.formatter';
import { CommandRegistry } from './command-registry';
import { OutputBuffer } from './output-buffer';
import { QueueService } from './queue.service';

@Injectable()
export class ExecutorService implements OnModuleDestroy {
  private readonly logger = new Logger(ExecutorService.name);
  private readonly activeProcesses = new Map<string, ChildProcess>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly registry: CommandRegistry,
    private readonly queueService: QueueService,
    @Inject(CHAT_POSTER)
    private readonly chatPoster: ChatPoster,
    @Inject(executorConfig.KEY)
    private readonly executorCfg: ConfigType<typeof executorConfig>,
  ) {}

  onModuleDestroy(): void {
    for (const [jobId, proc] of this.activeProcesses) {
      this.killProcess(proc, jobId);
    }
  }

  /**
   * Resolve a request to the shell line it would run.
   * Throws ExecutionError or TemplateError.
   */
  resolve(request: ParsedCommandRequest): string {
    if (this.registry.isEmpty()) {
      throw ExecutionError.noAvailableExecutors();
    }

    const executor = this.registry.lookup(request.name);
    if (!executor) {
      throw ExecutionError.unknownExecutor(request.name);
    }

    return renderTemplate(executor.template, request.payload);
  }

  /**
   * Run a request through the system shell. Resolution and template errors are
   * thrown; process failures are reported in the result.
   */
  async run(
    request: ParsedCommandRequest,
    jobId: string = randomUUID(),
  ): Promise<ExecutionResult> {
    const commandLine = this.resolve(request);
    this.logger.log(`Executing job ${jobId.slice(0, 8)}: ${request.name}`);
    this.logger.debug(`Command line: ${commandLine}`);
    return this.spawnShell(commandLine, jobId);
  }

  submitJob(
    request: ParsedCommandRequest,
    requestedBy: string,
    target: { channel: string; thread_ts?: string },
  ): ExecutionJob {
    const job = this.queueService.enqueue(request, requestedBy, target);
    this.processQueue();
    return job;
  }

  /** Resolves once no job is running or queued. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private processQueue(): void {
    let job = this.queueService.dequeue();
    while (job) {
      const task: Promise<void> = this.execute(job)
        .catch((err) => {
          this.logger.error(`Queue processing error: ${(err as Error).message}`);
        })
        .finally(() => {
          this.inFlight.delete(task);
          this.processQueue();
        });
      this.inFlight.add(task);
      job = this.queueService.dequeue();
    }
  }

  private async execute(job: ExecutionJob): Promise<void> {
    const shortId = job.id.slice(0, 8);
    let outcome: { result?: ExecutionResult; error?: Error };

    try {
      outcome = { result: await this.run(job.request, job.id) };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn(`Job ${shortId} rejected: ${error.message}`);
      outcome = { error };
    }

    const finished = this.queueService.complete(job.id, outcome) ?? job;
    this.logger.log(`Job ${shortId} ${finished.status}`);

    const message = finished.error
      ? buildExecutionErrorMessage(finished, finished.error, this.registry.names())
      : buildExecutionResultMessage(finished);

    try {
      await this.chatPoster.postMessage({ ...message, thread_ts: finished.thread_ts });
    } catch (err) {
      this.logger.error(`Failed to post result of job ${shortId}: ${(err as Error).message}`);
    }
  }

  private spawnShell(commandLine: string, jobId: string): Promise<ExecutionResult> {
    const startTime = Date.now();
    const stdout = new OutputBuffer(this.executorCfg.maxOutputBytes);
    const stderr = new OutputBuffer(this.executorCfg.maxOutputBytes);

    return new Promise((resolve) => {
      let settled = false;
      let timeout: ReturnType<typeof setTimeout> | undefined;

      const finish = (exitCode: number | null, error?: string): void => {
        if (settled) return;
        settled = true;
        if (timeout) clearTimeout(timeout);
        this.activeProcesses.delete(jobId);
        resolve({
          exitCode,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          durationMs: Date.now() - startTime,
          truncated: stdout.truncated || stderr.truncated,
          error,
        });
      };

      const proc = spawn(this.executorCfg.shell, ['-c', commandLine], {
        cwd: this.executorCfg.workingDir,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      this.activeProcesses.set(jobId, proc);

      if (this.executorCfg.timeoutMs > 0) {
        timeout = setTimeout(() => {
          this.killProcess(proc, jobId);
          finish(null, `Execution timeout (${this.executorCfg.timeoutMs}ms)`);
        }, this.executorCfg.timeoutMs);
      }

      proc.stdout?.on('data', (data: Buffer) => stdout.push(data));
      proc.stderr?.on('data', (data: Buffer) => stderr.push(data));

      proc.on('close', (code, signal) => {
        if (code === 0) {
          finish(0);
        } else if (code === null) {
          finish(null, `Terminated by ${signal ?? 'signal'}`);
        } else {
          finish(code, `Exited with code ${code}`);
        }
      });

      proc.on('error', (err) => {
        finish(null, `Failed to start process: ${err.message}`);
      });
    });
  }

  private killProcess(proc: ChildProcess, jobId: string): void {
    if (!proc.pid) return;
    treeKill(proc.pid, 'SIGTERM', (err) => {
      if (err) {
        this.logger.error(`Failed to kill process ${proc.pid}: ${err.message}`);
      } else {
        this.logger.log(`Process killed: job=${jobId.slice(0, 8)} pid=${proc.pid}`);
      }
    });
  }
}

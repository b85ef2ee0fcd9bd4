import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { queueConfig } from '@app/shared/config/configuration';
import { QueueFullError } from '@app/shared/errors/command.errors';
import {
  ExecutionJob,
  ExecutionResult,
  ParsedCommandRequest,
} from '@app/shared/types/executor.types';

/**
 * In-memory job queue. Jobs exist only while queued or running; nothing
 * survives a restart.
 */
@Injectable()
export class QueueService {
  private readonly logger = new Logger(QueueService.name);
  private readonly jobs = new Map<string, ExecutionJob>();

  constructor(
    @Inject(queueConfig.KEY)
    private readonly queueCfg: ConfigType<typeof queueConfig>,
  ) {}

  enqueue(
    request: ParsedCommandRequest,
    requestedBy: string,
    target: { channel: string; thread_ts?: string },
  ): ExecutionJob {
    if (this.jobs.size >= this.queueCfg.maxSize) {
      throw new QueueFullError(this.jobs.size, this.queueCfg.maxSize);
    }

    const job: ExecutionJob = {
      id: randomUUID(),
      request,
      requestedBy,
      requestedAt: new Date().toISOString(),
      status: 'queued',
      channel: target.channel,
      thread_ts: target.thread_ts,
    };

    this.jobs.set(job.id, job);
    this.logger.log(
      `Job enqueued: ${job.id.slice(0, 8)} by ${requestedBy} executor=${request.name || '(none)'}`,
    );
    return job;
  }

  dequeue(): ExecutionJob | null {
    if (this.getRunningJobs().length >= this.queueCfg.maxConcurrent) {
      return null;
    }

    const next = this.getQueuedJobs()[0];
    if (!next) return null;

    next.status = 'running';
    return next;
  }

  complete(
    jobId: string,
    outcome: { result?: ExecutionResult; error?: Error },
  ): ExecutionJob | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;

    const succeeded = !outcome.error && outcome.result?.exitCode === 0 && !outcome.result.error;
    job.status = succeeded ? 'completed' : 'failed';
    job.result = outcome.result;
    job.error = outcome.error;
    job.completedAt = new Date().toISOString();

    this.jobs.delete(jobId);
    return job;
  }

  getRunningJobs(): ExecutionJob[] {
    return [...this.jobs.values()].filter((j) => j.status === 'running');
  }

  getQueuedJobs(): ExecutionJob[] {
    return [...this.jobs.values()].filter((j) => j.status === 'queued');
  }
}

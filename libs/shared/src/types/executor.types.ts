export interface CommandTemplate {
  readonly name: string;
  readonly template: string;
}

export interface ParsedCommandRequest {
  name: string;
  payload: string;
}

export type ExecutionStatus = 'queued' | 'running' | 'completed' | 'failed';

export interface ExecutionResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  truncated: boolean;
  // Spawn failure, non-zero exit or timeout. Never thrown to the caller.
  error?: string;
}

export interface ExecutionJob {
  id: string;
  request: ParsedCommandRequest;
  requestedBy: string;
  requestedAt: string;
  status: ExecutionStatus;
  channel: string;
  thread_ts?: string;
  result?: ExecutionResult;
  // Resolution or template failure, set instead of result
  error?: Error;
  completedAt?: string;
}

import {
  CommandParseError,
  ExecutionError,
  QueueFullError,
  TemplateError,
} from '@app/shared/errors/command.errors';
import { ExecutionJob } from '@app/shared/types/executor.types';

const MAX_OUTPUT_CHARS = 3000;
const MAX_STDERR_CHARS = 500;

interface ReplyMessage {
  channel: string;
  text: string;
}

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) + '\n...(truncated)' : value;
}

// Zero-width spaces between backticks keep output from closing the fence.
function codeBlock(value: string): string {
  const body = value.replace(/\n$/, '').replace(/`(?=`)/g, '`\u200b');
  return '```\n' + body + '\n```';
}

function formatNames(names: string[]): string {
  return names.map((n) => `\`${n}\``).join(', ');
}

export function buildExecutionResultMessage(job: ExecutionJob): ReplyMessage {
  const result = job.result;
  const isSuccess = job.status === 'completed';
  const icon = isSuccess ? ':white_check_mark:' : ':x:';
  const label = isSuccess ? 'finished' : 'failed';
  const durationSec = result ? (result.durationMs / 1000).toFixed(1) : '?';

  const lines = [`${icon} \`${job.request.name}\` ${label} in ${durationSec}s`];

  if (!isSuccess && result?.error) {
    lines.push(`:warning: ${result.error}`);
  }

  lines.push(result?.stdout ? codeBlock(truncate(result.stdout, MAX_OUTPUT_CHARS)) : '_(no output)_');

  if (result?.stderr) {
    lines.push(`*stderr:*\n${codeBlock(truncate(result.stderr, MAX_STDERR_CHARS))}`);
  }

  if (result?.truncated) {
    lines.push('_Output exceeded the capture limit and was cut._');
  }

  return { channel: job.channel, text: lines.join('\n') };
}

export function buildExecutionErrorMessage(
  job: ExecutionJob,
  error: Error,
  availableExecutors: string[],
): ReplyMessage {
  const name = job.request.name;
  let text: string;

  if (error instanceof ExecutionError && error.code === 'NO_AVAILABLE_EXECUTORS') {
    text = ':no_entry: No executors are configured on this bridge.';
  } else if (error instanceof ExecutionError) {
    const available = `Available: ${formatNames(availableExecutors)}`;
    text = name
      ? `:warning: Executor \`${name}\` not found. ${available}`
      : `:warning: No executor selected. Add \`# executor: <name>\` to the code block. ${available}`;
  } else if (error instanceof TemplateError) {
    text = `:x: Executor \`${name}\` has a malformed template: ${error.message}`;
  } else {
    text = `:x: Failed to run \`${name}\`: ${error.message}`;
  }

  return { channel: job.channel, text };
}

export function buildParseErrorMessage(
  error: CommandParseError,
  channelId: string,
): ReplyMessage {
  return {
    channel: channelId,
    text: `:warning: Could not read the command block: ${error.message}`,
  };
}

export function buildUsageMessage(channelId: string): ReplyMessage {
  return {
    channel: channelId,
    text: ':information_source: Put the command in a fenced code block, starting with `# executor: <name>`.',
  };
}

export function buildQueueFullMessage(
  error: QueueFullError,
  channelId: string,
): ReplyMessage {
  return {
    channel: channelId,
    text: `:hourglass: The bridge is busy (${error.active}/${error.maxSize} jobs). Try again shortly.`,
  };
}

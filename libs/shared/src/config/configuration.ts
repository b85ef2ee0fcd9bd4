import { registerAs } from '@nestjs/config';

function envList(val: string | undefined, fallback: string[] = []): string[] {
  if (!val) return fallback;
  return val
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export const slackConfig = registerAs('slack', () => ({
  botToken: process.env.SLACK_BOT_TOKEN,
  appToken: process.env.SLACK_APP_TOKEN,
}));

export const securityConfig = registerAs('security', () => ({
  allowedUserIds: envList(process.env.ALLOWED_USER_IDS),
  allowedChannelIds: envList(process.env.ALLOWED_CHANNEL_IDS),
}));

export const executorConfig = registerAs('executor', () => ({
  executorsFile: process.env.EXECUTORS_FILE || './executors.json',
  shell: process.env.EXECUTOR_SHELL || '/bin/sh',
  workingDir: process.env.EXECUTOR_WORKING_DIR || process.cwd(),
  timeoutMs: parseInt(process.env.EXECUTION_TIMEOUT_MS || '600000', 10),
  maxOutputBytes: parseInt(process.env.MAX_OUTPUT_BYTES || '1048576', 10),
}));

export const queueConfig = registerAs('queue', () => ({
  maxConcurrent: parseInt(process.env.MAX_CONCURRENT_EXECUTIONS || '1', 10),
  maxSize: parseInt(process.env.MAX_QUEUE_SIZE || '5', 10),
}));

export const loggingConfig = registerAs('logging', () => ({
  level: process.env.LOG_LEVEL || 'info',
}));

import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Required - Slack
  SLACK_BOT_TOKEN: Joi.string().pattern(/^xoxb-/).required().messages({
    'any.required':
      'SLACK_BOT_TOKEN is required. Get it from https://api.slack.com/apps',
    'string.pattern.base': 'SLACK_BOT_TOKEN must start with "xoxb-"',
  }),
  SLACK_APP_TOKEN: Joi.string().pattern(/^xapp-/).required().messages({
    'any.required':
      'SLACK_APP_TOKEN is required. Create an app-level token with connections:write.',
    'string.pattern.base': 'SLACK_APP_TOKEN must start with "xapp-"',
  }),

  // Optional - Security (empty means no restriction)
  ALLOWED_USER_IDS: Joi.string().allow('').optional().default(''),
  ALLOWED_CHANNEL_IDS: Joi.string().allow('').optional().default(''),

  // Optional - Executor
  EXECUTORS_FILE: Joi.string().optional().default('./executors.json'),
  EXECUTOR_SHELL: Joi.string().optional().default('/bin/sh'),
  EXECUTOR_WORKING_DIR: Joi.string().allow('').optional().default(''),
  EXECUTION_TIMEOUT_MS: Joi.number().integer().min(0).default(600000),
  MAX_OUTPUT_BYTES: Joi.number().integer().min(1024).default(1048576),

  // Optional - Queue
  MAX_CONCURRENT_EXECUTIONS: Joi.number().integer().min(1).max(10).default(1),
  MAX_QUEUE_SIZE: Joi.number().integer().min(1).max(50).default(5),

  // Optional - Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
}).options({ allowUnknown: true });

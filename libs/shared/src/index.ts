// Module
export * from './shared.module';

// Types
export * from './types/slack.types';
export * from './types/executor.types';

// Errors
export * from './errors/command.errors';

// Config
export * from './config/configuration';
export * from './config/validation.schema';

// Utils
export * from './utils/command-parser.utils';
export * from './utils/template.utils';
export * from './utils/frame-parser.utils';

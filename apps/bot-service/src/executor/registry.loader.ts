import { Logger } from '@nestjs/common';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import * as Joi from 'joi';
import { CommandTemplate } from '@app/shared/types/executor.types';
import { RegistryLoadError, TemplateError } from '@app/shared/errors/command.errors';
import { parseTemplate } from '@app/shared/utils/template.utils';
import { CommandRegistry } from './command-registry';

interface ExecutorListFile {
  executors: CommandTemplate[];
}

type ExecutorMapFile = Record<string, string>;

type ExecutorsFile = ExecutorListFile | ExecutorMapFile;

const logger = new Logger('RegistryLoader');

const executorsFileSchema = Joi.alternatives<ExecutorsFile>().try(
  Joi.object({
    executors: Joi.array()
      .items(
        Joi.object({
          name: Joi.string().trim().min(1).required(),
          template: Joi.string().min(1).required(),
        }),
      )
      .required(),
  }),
  Joi.object().pattern(Joi.string().min(1), Joi.string().min(1)),
);

function isListFile(file: ExecutorsFile): file is ExecutorListFile {
  return Array.isArray(file.executors);
}

/**
 * Accepts either `{ "name": "template" }` or
 * `{ "executors": [{ "name": "...", "template": "..." }] }`.
 */
export function parseExecutorsFile(content: string, filePath = '<inline>'): CommandTemplate[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new RegistryLoadError(filePath, `invalid JSON (${(err as Error).message})`);
  }

  const { value, error } = executorsFileSchema.validate(data, { abortEarly: false });
  if (error) {
    throw new RegistryLoadError(filePath, error.message);
  }

  if (isListFile(value)) {
    return value.executors.map(({ name, template }) => ({ name, template }));
  }
  return Object.entries(value).map(([name, template]) => ({ name, template }));
}

export function loadRegistry(filePath: string): CommandRegistry {
  const absolutePath = resolve(filePath);
  if (!existsSync(absolutePath)) {
    throw new RegistryLoadError(absolutePath, 'file not found');
  }

  const templates = parseExecutorsFile(readFileSync(absolutePath, 'utf8'), absolutePath);

  const seen = new Set<string>();
  for (const { name, template } of templates) {
    if (seen.has(name)) {
      logger.warn(`Duplicate executor "${name}": the later definition wins`);
    }
    seen.add(name);

    try {
      parseTemplate(template);
    } catch (err) {
      if (!(err instanceof TemplateError)) throw err;
      logger.warn(`Executor "${name}" has a malformed template: ${err.message}`);
    }
  }

  const registry = new CommandRegistry(templates);
  if (registry.isEmpty()) {
    logger.warn(`No executors defined in ${absolutePath}; every command will be rejected`);
  } else {
    logger.log(`Loaded ${registry.size} executor(s): ${registry.names().join(', ')}`);
  }
  return registry;
}

import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validate, type ValidationError } from 'class-validator';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';

import { ConfigValidationError } from '../errors/index.js';

/** Resolves a config path relative to the working directory. */
export function resolveConfigPath(configPath: string): string {
  return path.resolve(process.cwd(), configPath);
}

/**
 * Reads a YAML file, transforms it into `dtoClass` and runs class-validator
 * over the whole tree. Every failure surfaces as a ConfigValidationError
 * listing each offending property path.
 */
export async function loadYamlConfig<T extends object>(
  dtoClass: ClassConstructor<T>,
  configPath: string,
  label: string,
): Promise<T> {
  const content = readConfigFile(configPath, label);
  const parsed = parseYaml(content, configPath, label);
  const dto = plainToInstance(dtoClass, parsed);
  const errors = await validate(dto);

  if (errors.length > 0) {
    const messages = flattenValidationErrors(errors);
    throw new ConfigValidationError(
      `${label} config validation failed with ${messages.length} error(s)`,
      messages,
    );
  }
  return dto;
}

function readConfigFile(configPath: string, label: string): string {
  if (!fs.existsSync(configPath)) {
    throw new ConfigValidationError(
      `${label} config file not found: ${configPath}`,
      [`File not found: ${configPath}`],
    );
  }
  return fs.readFileSync(configPath, 'utf-8');
}

function parseYaml(
  content: string,
  configPath: string,
  label: string,
): Record<string, unknown> {
  let result: unknown;
  try {
    result = yaml.load(content);
  } catch (error) {
    const message =
      error instanceof Error ? error.message : 'Unknown YAML parse error';
    throw new ConfigValidationError(
      `Failed to parse ${label} YAML at ${configPath}: ${message}`,
      [message],
    );
  }

  if (result === null || typeof result !== 'object' || Array.isArray(result)) {
    throw new ConfigValidationError(
      `Failed to parse ${label} YAML at ${configPath}: file is empty or does not contain a valid object`,
      ['YAML content is empty or not an object'],
    );
  }
  return { ...result };
}

export function flattenValidationErrors(errors: ValidationError[], prefix = ''): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const propertyPath = prefix
      ? `${prefix}.${error.property}`
      : error.property;
    if (error.constraints) {
      messages.push(
        `${propertyPath}: ${Object.values(error.constraints).join(', ')}`,
      );
    }
    if (error.children && error.children.length > 0) {
      messages.push(...flattenValidationErrors(error.children, propertyPath));
    }
  }
  return messages;
}

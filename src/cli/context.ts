/**
 * @fileoverview Shared command plumbing: global flags, config loading and
 * a service scoped to one command run.
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';
import { DocumentIntelligenceService } from '../api/service.js';
import { loadServiceConfig, type ServiceConfig } from '../config/service_config.js';
import { getErrorMessage } from '../utils/errors.js';
import { createError } from './errors.js';

/** Accepted by every command so each can parse its args strictly. */
export const GLOBAL_OPTIONS = {
  config: { type: 'string', short: 'c' },
  'data-dir': { type: 'string' },
  json: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export interface CliContext {
  configPath?: string;
  dataDir?: string;
  json: boolean;
}

export interface CommandOptions {
  context: CliContext;
  /** Arguments after the command name */
  args: string[];
}

/**
 * parseArgs with unknown flags reported as INVALID_ARGUMENT instead of a
 * bare TypeError.
 */
export function parseCommandArgs<T extends ParseArgsConfig>(command: string, config: T): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs(config);
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `${command}: ${getErrorMessage(error)}`);
  }
}

export function parseIntegerFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw createError('INVALID_ARGUMENT', `--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export function parseNumberFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw createError('INVALID_ARGUMENT', `--${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(context: CliContext): ServiceConfig {
  return loadServiceConfig({
    configPath: context.configPath,
    overrides: context.dataDir ? { dataDir: context.dataDir } : undefined,
  });
}

/**
 * Build the service for one command and always close it afterwards.
 */
export async function withService<T>(
  context: CliContext,
  run: (service: DocumentIntelligenceService) => Promise<T>,
): Promise<T> {
  const service = DocumentIntelligenceService.create(loadConfig(context));
  try {
    return await run(service);
  } finally {
    service.close();
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * @fileoverview Configuration loading
 *
 * Reads YAML (or JSON, which YAML parses too), validates the shape with zod
 * and merges it over the defaults. Shape problems surface as
 * ConfigurationError; the weight-sum check stays with the scorer.
 */

import * as fs from 'fs/promises';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import {
  DEFAULT_DISCOVERY_CONFIG,
  DiscoveryConfigInputSchema,
  type DiscoveryConfig,
  type DiscoveryConfigInput,
} from './schema.js';

function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a partial configuration and merge it over the defaults.
 */
export function resolveDiscoveryConfig(input: unknown = {}, source?: string): DiscoveryConfig {
  const parsed = DiscoveryConfigInputSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(issues[0] ?? 'schema validation failed', issues, source);
  }
  return mergeConfig(DEFAULT_DISCOVERY_CONFIG, parsed.data);
}

export function mergeConfig(base: DiscoveryConfig, overrides: DiscoveryConfigInput): DiscoveryConfig {
  return {
    scoring: {
      ...base.scoring,
      ...overrides.scoring,
      weights: { ...(overrides.scoring?.weights ?? base.scoring.weights) },
      dictionaryExtensions: [...(overrides.scoring?.dictionaryExtensions ?? base.scoring.dictionaryExtensions)],
    },
    search: { ...base.search, ...overrides.search },
    cache: { ...base.cache, ...overrides.cache },
    inversion: { ...base.inversion, ...overrides.inversion },
    enumeration: { ...base.enumeration, ...overrides.enumeration },
    assembly: { ...base.assembly, ...overrides.assembly },
  };
}

export function parseDiscoveryConfig(text: string, source?: string): DiscoveryConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(getErrorMessage(error), [], source);
  }
  return resolveDiscoveryConfig(raw ?? {}, source);
}

export async function loadDiscoveryConfig(filePath: string): Promise<DiscoveryConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`cannot read file (${getErrorMessage(error)})`, [], filePath);
  }
  return parseDiscoveryConfig(text, filePath);
}

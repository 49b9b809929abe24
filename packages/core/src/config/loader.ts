/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { AutofillConfig, LoadConfigResult, RawAutofillConfig } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid, ConfigValidationError, validateConfig, validateRawConfig } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search upward through directories for a file.
 */
async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10;

  for (let depth = 0; depth < maxDepth; depth += 1) {
    const filePath = path.join(currentDir, filename);
    if (await fileExists(filePath)) {
      return filePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a config file from a specific path.
 */
async function readConfigFile(resolvedPath: string): Promise<RawAutofillConfig> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new Error(`Config file not found at ${resolvedPath}.`);
    }
    throw new Error(`Unable to read config file at ${resolvedPath}: ${err.message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContents);
  } catch (error) {
    throw new Error(
      `Config file at ${resolvedPath} contains invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isRecord(parsed)) {
    throw new Error(`Config file at ${resolvedPath} must contain a JSON object.`);
  }

  return parsed;
}

/**
 * Report wrongly typed file values together with range problems. A field
 * flagged as the wrong type is not reported again for its default.
 */
function normalizeFileConfig(raw: RawAutofillConfig): AutofillConfig {
  const typeIssues = validateRawConfig(raw);
  const config = normalizeConfig(raw);
  const flagged = new Set(typeIssues.map((issue) => issue.field));
  const issues = [...typeIssues, ...validateConfig(config).filter((issue) => !flagged.has(issue.field))];
  if (issues.length) {
    throw new ConfigValidationError(issues);
  }
  return config;
}

/**
 * Load the config file. Without an explicit path the default file name is
 * searched upward from `cwd`, and defaults apply when none is found.
 * Relative `input`/`output` paths in the file resolve against its directory.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();

  let resolvedPath: string | null;
  if (configPath) {
    resolvedPath = path.resolve(cwd, configPath);
  } else {
    resolvedPath = await findUp(DEFAULT_CONFIG_FILENAME, cwd);
  }

  if (!resolvedPath) {
    const config = normalizeConfig();
    assertConfigValid(config);
    return { config, projectRoot: cwd };
  }

  const rawConfig = await readConfigFile(resolvedPath);
  const projectRoot = path.dirname(resolvedPath);
  const config = normalizeFileConfig(rawConfig);

  return {
    config: {
      ...config,
      input: config.input ? path.resolve(projectRoot, config.input) : undefined,
      output: config.output ? path.resolve(projectRoot, config.output) : undefined,
    },
    configPath: resolvedPath,
    projectRoot,
  };
}

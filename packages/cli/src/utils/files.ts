import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { parseL10nMap, type L10nMap } from '@l10n-autofill/core';
import { CliError } from './errors.js';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readL10nFile(filePath: string): Promise<L10nMap> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new CliError(`Input file not found at ${filePath}`);
    }
    throw new CliError(`Unable to read input file at ${filePath}: ${err.message}`);
  }
  return parseL10nMap(contents, filePath);
}

/**
 * Write through a temporary sibling file and rename it into place, so an
 * interrupted run never leaves a truncated output.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${crypto.randomBytes(6).toString('hex')}.tmp`;

  try {
    await fs.writeFile(tempPath, contents, 'utf8');
    await renameIntoPlace(tempPath, filePath);
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

async function renameIntoPlace(tempPath: string, filePath: string): Promise<void> {
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code !== 'EEXIST' && err.code !== 'EPERM') {
      throw error;
    }
    await fs.rm(filePath, { force: true });
    await fs.rename(tempPath, filePath);
  }
}

/**
 * The l10n document: source file path -> { original text -> translated text }.
 *
 * Groups and entries are `Map`s so a rewritten file keeps the input's key
 * order, integer-like original texts included.
 */

import { JsonSyntaxError, parseOrderedJson, stringifyOrderedJson, type JsonObject, type JsonValue } from './ordered-json.js';

export type L10nGroup = JsonObject;
export type L10nMap = JsonObject;

export class L10nFormatError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(message);
    this.name = 'L10nFormatError';
  }
}

export function isEntryGroup(value: JsonValue | undefined): value is L10nGroup {
  return value instanceof Map;
}

/** `null` and `""` mark an entry that still needs a translation. */
export function isEmptyTranslation(value: JsonValue | undefined): value is null | '' {
  return value === null || value === '';
}

export function parseL10nMap(raw: string, source = '<input>'): L10nMap {
  let parsed: JsonValue;
  try {
    parsed = parseOrderedJson(raw);
  } catch (error) {
    if (error instanceof JsonSyntaxError) {
      throw new L10nFormatError(`${source} contains invalid JSON: ${error.message}`, source);
    }
    throw error;
  }

  if (!isEntryGroup(parsed)) {
    throw new L10nFormatError(`${source} must contain a JSON object keyed by file path.`, source);
  }

  return parsed;
}

export function serializeL10nMap(map: L10nMap): string {
  return `${stringifyOrderedJson(map, 2)}\n`;
}

export function cloneL10nMap(map: L10nMap): L10nMap {
  return structuredClone(map);
}

export function countEmptyEntries(group: L10nGroup): number {
  let count = 0;
  for (const value of group.values()) {
    if (isEmptyTranslation(value)) {
      count += 1;
    }
  }
  return count;
}

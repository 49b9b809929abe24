const HAN = /[\u4e00-\u9fff]/;
const CYRILLIC = /[\u0400-\u04ff]/;
const ARABIC = /[\u0600-\u06ff]/;

const SCRIPT_BY_LANGUAGE = new Map<string, RegExp>([
  ['zh', HAN],
  ['ja', /[\u4e00-\u9fff\u3040-\u309f\u30a0-\u30ff]/],
  ['ko', /[\uac00-\ud7af\u1100-\u11ff\u3130-\u318f]/],
  ['ru', CYRILLIC],
  ['uk', CYRILLIC],
  ['bg', CYRILLIC],
  ['sr', CYRILLIC],
  ['be', CYRILLIC],
  ['ar', ARABIC],
  ['fa', ARABIC],
  ['he', /[\u0590-\u05ff]/],
  ['el', /[\u0370-\u03ff]/],
  ['th', /[\u0e00-\u0e7f]/],
  ['hi', /[\u0900-\u097f]/],
]);

export function primaryLanguage(tag: string): string {
  return tag.split(/[-_]/)[0].toLowerCase();
}

/**
 * Whether `text` carries at least one character of the target language's
 * script. Languages without an entry (Latin-script ones) always pass.
 */
export function containsTargetScript(text: string, targetLanguage: string): boolean {
  const pattern = SCRIPT_BY_LANGUAGE.get(primaryLanguage(targetLanguage));
  return pattern ? pattern.test(text) : true;
}

export function hasScriptCheck(targetLanguage: string): boolean {
  return SCRIPT_BY_LANGUAGE.has(primaryLanguage(targetLanguage));
}

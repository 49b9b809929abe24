export interface PathFilterOptions {
  prefixes: readonly string[];
  /** Accept every group regardless of `prefixes`. */
  anyPath?: boolean;
}

export function isPathWhitelisted(filePath: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => filePath.startsWith(prefix));
}

export function acceptsGroup(filePath: string, options: PathFilterOptions): boolean {
  return options.anyPath === true || isPathWhitelisted(filePath, options.prefixes);
}

// Public API - used by the CLI and translator adapters
export * from './config/index.js';
export * from './ordered-json.js';
export * from './l10n-map.js';
export * from './risk.js';
export * from './paths.js';
export * from './placeholders.js';
export * from './script-check.js';
export * from './filler.js';

export interface Translator {
	/**
	 * The human-readable name of the translator.
	 */
	name: string;
	/**
	 * Translate a batch of texts. The result has one entry per input, in order.
	 */
	translate(texts: string[], sourceLanguage: string, targetLanguage: string): Promise<string[]>;
	/**
	 * Optional cleanup hook invoked when a run ends.
	 */
	dispose?(): Promise<void> | void;
}

export interface TranslatorFactoryOptions {
	provider: string;
	/** Per-request timeout for adapters that talk to a remote service. */
	timeoutMs?: number;
	config?: Record<string, unknown>;
}

export interface TranslatorLoadOptions extends TranslatorFactoryOptions {
	module?: string;
}

export type TranslatorFactory = (options: TranslatorFactoryOptions) => Translator | Promise<Translator>;

export class TranslatorLoadError extends Error {
	constructor(message: string, public readonly cause?: unknown) {
		super(message);
		this.name = 'TranslatorLoadError';
	}
}

const BUILT_IN_PROVIDERS = new Set(['google', 'mock']);

export const buildTranslatorModuleSpecifier = (provider: string): string => {
	if (!provider || provider === '.') {
		throw new TranslatorLoadError('Translator provider name is required.');
	}

	if (provider.startsWith('.') || provider.startsWith('/') || provider.includes('/')) {
		return provider;
	}

	return `@l10n-autofill/translator-${provider}`;
};

export function isTranslator(value: unknown): value is Translator {
	return (
		typeof value === 'object' &&
		value !== null &&
		'translate' in value &&
		typeof value.translate === 'function'
	);
}

function readExport(moduleExports: unknown, name: string): unknown {
	if (
		(typeof moduleExports === 'object' || typeof moduleExports === 'function') &&
		moduleExports !== null &&
		name in moduleExports
	) {
		return Reflect.get(moduleExports, name);
	}
	return undefined;
}

function isFactory(value: unknown): value is TranslatorFactory {
	return typeof value === 'function';
}

export async function loadTranslator(options: TranslatorLoadOptions): Promise<Translator> {
	const specifier = options.module && options.module.trim().length
		? options.module
		: buildTranslatorModuleSpecifier(options.provider);

	let mod: unknown;
	try {
		mod = await import(specifier);
	} catch (error) {
		const isBuiltIn = BUILT_IN_PROVIDERS.has(options.provider) && !options.module;
		const hint = isBuiltIn
			? 'The built-in translators ship with the l10n-autofill workspace; reinstall with: npm install'
			: `Install the adapter: npm install ${specifier}`;
		throw new TranslatorLoadError(`Unable to load translator module "${specifier}". ${hint}`, error);
	}

	const translator = await resolveTranslatorInstance(mod, options);
	if (!translator) {
		throw new TranslatorLoadError(`Translator module "${specifier}" did not export a valid translator.`);
	}

	return translator;
}

async function resolveTranslatorInstance(
	moduleExports: unknown,
	options: TranslatorFactoryOptions
): Promise<Translator | undefined> {
	const factory = readExport(moduleExports, 'createTranslator');
	if (isFactory(factory)) {
		const created = await factory(options);
		return isTranslator(created) ? created : undefined;
	}

	const direct = readExport(moduleExports, 'translator') ?? readExport(moduleExports, 'default');
	if (isTranslator(direct)) {
		return direct;
	}

	// `export default { createTranslator }`
	const nestedFactory = readExport(direct, 'createTranslator');
	if (isFactory(nestedFactory)) {
		const created = await nestedFactory(options);
		return isTranslator(created) ? created : undefined;
	}

	return undefined;
}

import { en } from "./en";
import { ru } from "./ru";

export type TranslationKey = keyof typeof en;

const locales: Record<string, Partial<typeof en>> = {
	en,
	ru,
};

let currentLocale = "en";

/**
 * Reduce a locale or POSIX locale string ("ru_RU.UTF-8", "ru-RU") to its language code.
 */
export function languageOf(locale: string): string {
	return locale.split(/[_.@-]/)[0]?.toLowerCase() ?? "";
}

/**
 * Pick the message locale from the environment, the way POSIX tools do.
 */
export function detectLocale(env: NodeJS.ProcessEnv = process.env): string {
	const raw = env.LC_ALL || env.LC_MESSAGES || env.LANG || "en";
	return languageOf(raw);
}

export function setLocale(locale: string): void {
	currentLocale = languageOf(locale);
}

/**
 * Get a translated string for the given key in the current locale.
 * Falls back to English if the key is not translated or the locale is unknown.
 */
export function t(key: TranslationKey, values?: Record<string, string | number>): string {
	const template = getTranslation(currentLocale, key);
	return values ? format(template, values) : template;
}

/**
 * Get a translation for a specific locale (useful for testing).
 */
export function getTranslation(locale: string, key: TranslationKey): string {
	const translations = locales[locale];
	if (translations) {
		const value = translations[key];
		if (value !== undefined) {
			return value;
		}
	}
	return en[key];
}

/**
 * Fill {name} placeholders. Unknown placeholders are left as they are.
 */
export function format(template: string, values: Record<string, string | number>): string {
	return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
		const value = values[name];
		return value === undefined ? placeholder : String(value);
	});
}

import { readFile } from "fs/promises";
import { SettingsError } from "./errors";

export interface StemmerSettings {
	/** Schema version for future migrations */
	version: number;
	/** Categories in tie-breaking order */
	categories: string[];
	/** Stop word list; null uses the bundled list */
	stopWordsPath: string | null;
	/** Replace ё with е instead of dropping it during normalization */
	normalizeYo: boolean;
	/** Message locale; null detects it from the environment */
	locale: string | null;
}

export const DEFAULT_CATEGORIES: readonly string[] = [
	"science",
	"style",
	"culture",
	"life",
	"economics",
	"business",
	"travel",
	"forces",
	"media",
	"sport",
];

export const DEFAULT_SETTINGS: StemmerSettings = {
	version: 1,
	categories: [...DEFAULT_CATEGORIES],
	stopWordsPath: null,
	normalizeYo: false,
	locale: null,
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
	return value === null || typeof value === "string";
}

/**
 * Check a parsed settings object and merge it over the defaults.
 * Unknown fields are ignored.
 */
export function validateSettings(data: unknown): StemmerSettings {
	if (data === null || data === undefined) {
		return { ...DEFAULT_SETTINGS, categories: [...DEFAULT_SETTINGS.categories] };
	}
	if (!isRecord(data)) {
		throw new SettingsError("Settings must be a JSON object");
	}

	const settings: StemmerSettings = Object.assign({}, DEFAULT_SETTINGS, {
		categories: [...DEFAULT_SETTINGS.categories],
	});

	if (data.version !== undefined) {
		if (typeof data.version !== "number" || !Number.isInteger(data.version)) {
			throw new SettingsError("version must be an integer");
		}
		settings.version = data.version;
	}

	if (data.categories !== undefined) {
		const categories = data.categories;
		if (
			!Array.isArray(categories) ||
			categories.length === 0 ||
			!categories.every((c): c is string => typeof c === "string" && c.length > 0)
		) {
			throw new SettingsError("categories must be a non-empty array of non-empty strings");
		}
		if (new Set(categories).size !== categories.length) {
			throw new SettingsError("categories must be unique");
		}
		settings.categories = [...categories];
	}

	if (data.stopWordsPath !== undefined) {
		if (!isNullableString(data.stopWordsPath)) {
			throw new SettingsError("stopWordsPath must be a string or null");
		}
		settings.stopWordsPath = data.stopWordsPath;
	}

	if (data.normalizeYo !== undefined) {
		if (typeof data.normalizeYo !== "boolean") {
			throw new SettingsError("normalizeYo must be a boolean");
		}
		settings.normalizeYo = data.normalizeYo;
	}

	if (data.locale !== undefined) {
		if (!isNullableString(data.locale)) {
			throw new SettingsError("locale must be a string or null");
		}
		settings.locale = data.locale;
	}

	return settings;
}

/**
 * Load settings from a JSON file. Without a path the defaults are returned.
 */
export async function loadSettings(filePath?: string): Promise<StemmerSettings> {
	if (filePath === undefined) {
		return validateSettings(null);
	}

	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		throw new SettingsError(`Cannot read settings from ${filePath}`, { cause: error });
	}

	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (error) {
		throw new SettingsError(`Invalid JSON in ${filePath}`, { cause: error });
	}
	return validateSettings(data);
}

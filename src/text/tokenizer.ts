export interface NormalizeOptions {
	/** Replace ё with е instead of dropping it */
	normalizeYo?: boolean;
}

/**
 * Lowercases text and deletes everything except Latin and Russian letters
 * and whitespace. Punctuation is removed, not turned into a separator.
 */
export function normalizeText(text: string, options: NormalizeOptions = {}): string {
	let lower = text.toLowerCase();
	if (options.normalizeYo) {
		lower = lower.replace(/ё/g, "е");
	}
	return lower.replace(/[^a-zа-я\s]/g, "");
}

/**
 * Splits text into lowercase word tokens.
 */
export function tokenize(text: string, options: NormalizeOptions = {}): string[] {
	return normalizeText(text, options)
		.split(/\s+/)
		.filter((token) => token.length > 0);
}

export const VOWELS: ReadonlySet<string> = new Set([
	"а",
	"е",
	"и",
	"о",
	"у",
	"ы",
	"э",
	"ю",
	"я",
]);

export function isVowel(char: string): boolean {
	return VOWELS.has(char);
}

/**
 * RV: the offset just after the first vowel.
 * Returns the word length when the word has no vowel, so nothing can be cut.
 */
export function findRV(word: string): number {
	for (let i = 0; i < word.length; i++) {
		if (isVowel(word.charAt(i))) {
			return i + 1;
		}
	}
	return word.length;
}

/**
 * Offset just after the first vowel followed by a non-vowel at or after `from`,
 * or undefined if there is no such pair.
 */
function findVowelNonVowel(word: string, from: number): number | undefined {
	for (let i = from; i + 1 < word.length; i++) {
		if (isVowel(word.charAt(i)) && !isVowel(word.charAt(i + 1))) {
			return i + 2;
		}
	}
	return undefined;
}

/**
 * R2: R1 is the region after the first vowel/non-vowel pair; R2 is the region
 * after the next such pair inside R1. Falls back to the word length.
 */
export function findR2(word: string): number {
	const r1 = findVowelNonVowel(word, 0);
	if (r1 === undefined) {
		return word.length;
	}
	return findVowelNonVowel(word, r1) ?? word.length;
}

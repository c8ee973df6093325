import { Stemmer } from "../types";
import snowballFactory from "snowball-stemmers";

const snowball = snowballFactory.newStemmer("russian");

/**
 * Normalize ё → е (and Ё → Е).
 * The Snowball Russian stemmer does not recognize ё, so words like
 * "костылём" are left unstemmed.
 */
export function normalizeYo(word: string): string {
	return word.replace(/ё/g, "е").replace(/Ё/g, "Е");
}

/**
 * The published Snowball Russian stemmer, used to audit the rule tables.
 */
export class ReferenceStemmer implements Stemmer {
	stem(word: string): string {
		return snowball.stem(normalizeYo(word));
	}
}

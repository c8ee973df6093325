import { Stemmer } from "../types";
import { findR2, findRV } from "./regions";
import { step1, step2, step3, step4 } from "./steps";

/**
 * Suffix-stripping stemmer for lowercase Russian words.
 * RV and R2 are taken from the input word and are not recomputed
 * as the steps shorten it.
 */
export class RussianStemmer implements Stemmer {
	stem(word: string): string {
		const rv = findRV(word);
		const r2 = findR2(word);

		let result = step1(word, rv);
		result = step2(result, rv);
		result = step3(result, r2);
		return step4(result, rv);
	}
}

const defaultStemmer = new RussianStemmer();

export function stem(word: string): string {
	return defaultStemmer.stem(word);
}

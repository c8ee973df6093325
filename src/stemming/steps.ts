import { cut } from "./cut";
import {
	ADJECTIVE,
	DERIVATIONAL,
	DOUBLE_N,
	NOUN,
	PARTICIPLE,
	PERFECTIVE_GERUND,
	REFLEXIVE,
	SOFT_SIGN,
	SUPERLATIVE,
	TRAILING_I,
	VERB,
} from "./suffix-rules";

/**
 * Step 1: perfective gerund, or else reflexive followed by one of
 * adjective (+ participle), verb or noun.
 */
export function step1(word: string, rv: number): string {
	const gerund = cut(word, PERFECTIVE_GERUND, rv);
	if (gerund.matched) {
		return gerund.word;
	}

	const stripped = cut(word, REFLEXIVE, rv).word;

	const adjective = cut(stripped, ADJECTIVE, rv);
	if (adjective.matched) {
		return cut(adjective.word, PARTICIPLE, rv).word;
	}

	const verb = cut(stripped, VERB, rv);
	if (verb.matched) {
		return verb.word;
	}

	return cut(stripped, NOUN, rv).word;
}

/** Step 2: a trailing "и". */
export function step2(word: string, rv: number): string {
	return cut(word, TRAILING_I, rv).word;
}

/** Step 3: derivational ending, the only one gated by R2. */
export function step3(word: string, r2: number): string {
	return cut(word, DERIVATIONAL, r2).word;
}

/**
 * Step 4: superlative, then either undouble "нн" or drop a soft sign.
 */
export function step4(word: string, rv: number): string {
	const superlative = cut(word, SUPERLATIVE, rv).word;
	const undoubled = cut(superlative, DOUBLE_N, rv);
	if (undoubled.matched) {
		return undoubled.word;
	}
	return cut(superlative, SOFT_SIGN, rv).word;
}

import { CutResult, SuffixAlternative, SuffixRule } from "../types";

interface Match {
	start: number;
	boundary: number;
}

/**
 * Match an alternative against the end of the word.
 * `start` is where the match begins (including a preserved letter),
 * `boundary` is where the word is cut.
 */
function matchAlternative(word: string, alt: SuffixAlternative): Match | undefined {
	if (!word.endsWith(alt.suffix)) {
		return undefined;
	}
	const suffixStart = word.length - alt.suffix.length;
	const before = suffixStart > 0 ? word.charAt(suffixStart - 1) : "";

	if (alt.follows && !alt.follows.has(before)) {
		return undefined;
	}
	if (alt.preserve) {
		if (!alt.preserve.has(before)) {
			return undefined;
		}
		return { start: suffixStart - 1, boundary: suffixStart };
	}
	return { start: suffixStart, boundary: suffixStart };
}

/**
 * Try to cut an ending of `rule` that starts at or after `minPos`.
 * The longest matching ending wins; on a tie the earlier alternative wins.
 */
export function cut(word: string, rule: SuffixRule, minPos: number): CutResult {
	let best: Match | undefined;
	for (const alt of rule) {
		const match = matchAlternative(word, alt);
		if (match === undefined || match.start < minPos) {
			continue;
		}
		if (best === undefined || match.start < best.start) {
			best = match;
		}
	}

	if (best === undefined) {
		return { matched: false, word };
	}
	return { matched: true, word: word.slice(0, best.boundary) };
}

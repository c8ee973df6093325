import { ComparisonRow, Stemmer } from "../types";

export function compareStemmers(
	words: string[],
	primary: Stemmer,
	reference: Stemmer,
): ComparisonRow[] {
	return words.map((word) => {
		const stem = primary.stem(word);
		const referenceStem = reference.stem(word);
		return { word, stem, reference: referenceStem, agrees: stem === referenceStem };
	});
}

/** Share of rows where both stemmers agree; 1 for an empty comparison. */
export function agreementRate(rows: ComparisonRow[]): number {
	if (rows.length === 0) {
		return 1;
	}
	return rows.filter((row) => row.agrees).length / rows.length;
}

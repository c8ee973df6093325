/**
 * Interface for stemmers.
 * Implementations must be pure: the same word always yields the same stem.
 */
export interface Stemmer {
	/** Reduces a word to its stem. The stem is always a prefix of the word. */
	stem(word: string): string;
}

/**
 * One literal ending of a suffix rule.
 */
export interface SuffixAlternative {
	suffix: string;
	/**
	 * Letters that must directly precede the suffix. The preceding letter is
	 * part of the match, but it is kept when the ending is cut.
	 */
	preserve?: ReadonlySet<string>;
	/**
	 * Letters that must directly precede the suffix without being part of the
	 * match (a look-behind). The preceding letter may lie before the boundary.
	 */
	follows?: ReadonlySet<string>;
}

/** Ordered alternatives of one suffix class. */
export type SuffixRule = readonly SuffixAlternative[];

export interface CutResult {
	matched: boolean;
	word: string;
}

/**
 * A labelled document from the training corpus.
 */
export interface TrainingExample {
	category: string;
	text: string;
	/** 1-based line number in the source file */
	line: number;
}

export interface ClassificationResult {
	category: string;
	/** Overlap count per category, in configured category order */
	scores: Map<string, number>;
}

export interface ClassificationSummary {
	trained: number;
	classified: number;
	/** Number of distinct stems per category */
	vocabularySizes: Record<string, number>;
}

/**
 * One row of a stemmer comparison.
 */
export interface ComparisonRow {
	word: string;
	stem: string;
	reference: string;
	agrees: boolean;
}

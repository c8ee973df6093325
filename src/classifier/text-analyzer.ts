import { Stemmer } from "../types";
import { StopWords } from "../text/stop-words";
import { NormalizeOptions, tokenize } from "../text/tokenizer";

/**
 * Turns a document into stems: tokenize, drop stop words, stem.
 */
export class TextAnalyzer {
	private readonly stemmer: Stemmer;
	private readonly stopWords: StopWords;
	private readonly options: NormalizeOptions;

	constructor(stemmer: Stemmer, stopWords: StopWords, options: NormalizeOptions = {}) {
		this.stemmer = stemmer;
		this.stopWords = stopWords;
		this.options = options;
	}

	analyze(text: string): string[] {
		return tokenize(text, this.options)
			.filter((token) => !this.stopWords.has(token))
			.map((token) => this.stemmer.stem(token));
	}
}

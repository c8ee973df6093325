import { ClassificationResult } from "../types";
import { CategoryVocabulary } from "./vocabulary";
import { TextAnalyzer } from "./text-analyzer";

/**
 * Nearest-vocabulary vote: a document goes to the category whose training
 * vocabulary contains the most of its stems.
 */
export class VocabularyClassifier {
	private readonly analyzer: TextAnalyzer;
	private readonly vocabulary: CategoryVocabulary;

	constructor(categories: readonly string[], analyzer: TextAnalyzer) {
		this.analyzer = analyzer;
		this.vocabulary = new CategoryVocabulary(categories);
	}

	get categories(): string[] {
		return this.vocabulary.categories;
	}

	train(category: string, text: string): void {
		this.vocabulary.add(category, this.analyzer.analyze(text));
	}

	vocabularySize(category: string): number {
		return this.vocabulary.size(category);
	}

	/**
	 * Count, per category, how many stems of the text (repeats included)
	 * occur in that category's vocabulary.
	 */
	score(text: string): Map<string, number> {
		const stems = this.analyzer.analyze(text);
		const scores = new Map<string, number>();
		for (const category of this.vocabulary.categories) {
			let count = 0;
			for (const stem of stems) {
				if (this.vocabulary.has(category, stem)) {
					count++;
				}
			}
			scores.set(category, count);
		}
		return scores;
	}

	/**
	 * Highest score wins; ties go to the category listed first.
	 */
	classify(text: string): ClassificationResult {
		const scores = this.score(text);
		let best = "";
		let bestScore = -1;
		for (const [category, value] of scores) {
			if (value > bestScore) {
				best = category;
				bestScore = value;
			}
		}
		return { category: best, scores };
	}
}

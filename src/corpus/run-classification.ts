import { ClassificationSummary, Stemmer } from "../types";
import { StemmerSettings } from "../settings";
import { TextAnalyzer } from "../classifier/text-analyzer";
import { VocabularyClassifier } from "../classifier/vocabulary-classifier";
import { RussianStemmer } from "../stemming/russian-stemmer";
import { loadStopWords } from "../text/stop-words";
import { readTestDocuments, readTrainingCorpus, writeLabels } from "./corpus-reader";
import { UnknownCategoryError } from "../errors";

export interface ClassificationRun {
	trainPath: string;
	testPath: string;
	outputPath: string;
	settings: StemmerSettings;
	stemmer?: Stemmer;
	/** Called with the 1-based index of each classified document */
	onProgress?: (index: number, total: number) => void;
}

/**
 * Build vocabularies from the training file, classify every line of the
 * test file and write one category per line.
 */
export async function runClassification(run: ClassificationRun): Promise<ClassificationSummary> {
	const { settings } = run;
	const stopWords = await loadStopWords(settings.stopWordsPath ?? undefined);
	const analyzer = new TextAnalyzer(run.stemmer ?? new RussianStemmer(), stopWords, {
		normalizeYo: settings.normalizeYo,
	});
	const classifier = new VocabularyClassifier(settings.categories, analyzer);

	const examples = await readTrainingCorpus(run.trainPath);
	for (const example of examples) {
		try {
			classifier.train(example.category, example.text);
		} catch (error) {
			if (error instanceof UnknownCategoryError) {
				throw new UnknownCategoryError(example.category, `${run.trainPath}:${example.line}`);
			}
			throw error;
		}
	}

	const documents = await readTestDocuments(run.testPath);
	const labels = documents.map((document, index) => {
		const { category } = classifier.classify(document);
		run.onProgress?.(index + 1, documents.length);
		return category;
	});
	await writeLabels(run.outputPath, labels);

	const vocabularySizes: Record<string, number> = {};
	for (const category of classifier.categories) {
		vocabularySizes[category] = classifier.vocabularySize(category);
	}
	return { trained: examples.length, classified: labels.length, vocabularySizes };
}

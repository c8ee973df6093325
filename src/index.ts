export type {
	ClassificationResult,
	ClassificationSummary,
	ComparisonRow,
	CutResult,
	Stemmer,
	SuffixAlternative,
	SuffixRule,
	TrainingExample,
} from "./types";
export { RussianStemmer, stem } from "./stemming/russian-stemmer";
export { ReferenceStemmer } from "./stemming/reference-stemmer";
export { compareStemmers, agreementRate } from "./stemming/compare";
export { findRV, findR2, VOWELS } from "./stemming/regions";
export { cut } from "./stemming/cut";
export { step1, step2, step3, step4 } from "./stemming/steps";
export * as rules from "./stemming/suffix-rules";
export { normalizeText, tokenize } from "./text/tokenizer";
export { StopWords, parseStopWords, loadStopWords } from "./text/stop-words";
export { CategoryVocabulary } from "./classifier/vocabulary";
export { TextAnalyzer } from "./classifier/text-analyzer";
export { VocabularyClassifier } from "./classifier/vocabulary-classifier";
export { runClassification } from "./corpus/run-classification";
export { DEFAULT_SETTINGS, DEFAULT_CATEGORIES, loadSettings, validateSettings } from "./settings";
export type { StemmerSettings } from "./settings";
export {
	StemmerAppError,
	SettingsError,
	UsageError,
	CorpusFormatError,
	UnknownCategoryError,
} from "./errors";

/**
 * Base class for errors raised around the stemmer: settings, corpus files
 * and the command line. The stemmer itself never throws.
 */
export class StemmerAppError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class SettingsError extends StemmerAppError {}

export class UsageError extends StemmerAppError {}

export class CorpusFormatError extends StemmerAppError {
	readonly path: string;
	readonly line: number;

	constructor(path: string, line: number, message: string) {
		super(`${path}:${line}: ${message}`);
		this.path = path;
		this.line = line;
	}
}

export class UnknownCategoryError extends StemmerAppError {
	readonly category: string;

	constructor(category: string, location?: string) {
		const message = `Unknown category "${category}"`;
		super(location ? `${location}: ${message}` : message);
		this.category = category;
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

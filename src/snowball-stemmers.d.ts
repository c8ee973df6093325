// snowball-stemmers ships no type declarations.
declare module "snowball-stemmers" {
	interface SnowballStemmer {
		stem(word: string): string;
	}
	interface SnowballFactory {
		/** Throws for an algorithm name that is not in algorithms() */
		newStemmer(algorithm: string): SnowballStemmer;
		algorithms(): string[];
	}
	const factory: SnowballFactory;
	export default factory;
}

import { SuffixAlternative, SuffixRule } from "../types";

/** Letters that may precede, and survive, group-1 gerund, participle and verb endings. */
const A_YA: ReadonlySet<string> = new Set(["а", "я"]);

function plain(...suffixes: string[]): SuffixAlternative[] {
	return suffixes.map((suffix) => ({ suffix }));
}

function preserving(
	letters: ReadonlySet<string>,
	...suffixes: string[]
): SuffixAlternative[] {
	return suffixes.map((suffix) => ({ suffix, preserve: letters }));
}

function rule(...groups: SuffixAlternative[][]): SuffixRule {
	return Object.freeze(groups.flat().map((alt) => Object.freeze(alt)));
}

export const PERFECTIVE_GERUND = rule(
	preserving(A_YA, "в", "вши", "вшись"),
	plain("ив", "ивши", "ившись", "ыв", "ывши", "ывшись"),
);

export const ADJECTIVE = rule(
	plain(
		"ее", "ие", "ые", "ое", "ими", "ыми", "ей", "ий", "ый", "ой", "ем", "им",
		"ым", "ом", "его", "ого", "ему", "ому", "их", "ых", "ую", "юю", "ая",
		"яя", "ою", "ею",
	),
);

export const PARTICIPLE = rule(
	preserving(A_YA, "ем", "нн", "вш", "ющ", "щ"),
	plain("ивш", "ывш", "ующ"),
);

export const REFLEXIVE = rule(plain("ся", "сь"));

export const VERB = rule(
	preserving(
		A_YA,
		"ла", "на", "ете", "йте", "ли", "й", "л", "ем", "н", "ло", "но", "ет",
		"ют", "ны", "ть", "ешь", "нно",
	),
	plain(
		"ила", "ыла", "ена", "ейте", "уйте", "ите", "или", "ыли", "ей", "уй",
		"ил", "ыл", "им", "ым", "ен", "ило", "ыло", "ено", "ят", "ует", "уют",
		"ит", "ыт", "ены", "ить", "ыть", "ишь", "ую", "ю",
	),
);

export const NOUN = rule(
	plain(
		"а", "ев", "ов", "ие", "ье", "е", "иями", "ями", "ами", "еи", "ии", "и",
		"ией", "ей", "ой", "ий", "й", "иям", "ям", "ием", "ем", "ам", "ом", "о",
		"у", "ах", "иях", "ях", "ы", "ь", "ию", "ью", "ю", "ия", "ья", "я",
	),
);

export const SUPERLATIVE = rule(plain("ейше", "ейш"));

export const DERIVATIONAL = rule(plain("ость", "ост"));

export const TRAILING_I = rule(plain("и"));

/** A final "н" directly after another "н": cutting it undoubles "нн". */
export const DOUBLE_N = rule([{ suffix: "н", follows: new Set(["н"]) }]);

export const SOFT_SIGN = rule(plain("ь"));

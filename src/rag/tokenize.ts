/**
 * Text tokenization for the offline hashing embedder
 *
 * Latin-script text is split into lowercase words with stop words removed.
 * Han text has no spaces, so each run of Han characters becomes overlapping
 * character bigrams.
 */

/** Function words that carry no topical signal */
const STOP_WORDS = new Set([
	"a",
	"an",
	"and",
	"are",
	"as",
	"at",
	"be",
	"been",
	"but",
	"by",
	"did",
	"do",
	"does",
	"for",
	"from",
	"how",
	"in",
	"is",
	"it",
	"its",
	"of",
	"on",
	"or",
	"that",
	"the",
	"this",
	"to",
	"was",
	"were",
	"what",
	"when",
	"where",
	"which",
	"who",
	"why",
	"with",
]);

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;
const SCRIPT_RUN_PATTERN = /\p{Script=Han}+|[^\p{Script=Han}]+/gu;
const HAN_PATTERN = /^\p{Script=Han}/u;

/**
 * Tokenize text into normalized terms
 */
export function tokenize(text: string): string[] {
	const tokens: string[] = [];

	for (const word of text.toLowerCase().match(WORD_PATTERN) ?? []) {
		for (const run of word.match(SCRIPT_RUN_PATTERN) ?? []) {
			if (HAN_PATTERN.test(run)) {
				if (run.length === 1) {
					tokens.push(run);
					continue;
				}
				for (let i = 0; i < run.length - 1; i++) {
					tokens.push(run.slice(i, i + 2));
				}
				continue;
			}
			// Must be at least 2 characters and not a stop word
			if (run.length < 2 || STOP_WORDS.has(run)) continue;
			tokens.push(run);
		}
	}

	return tokens;
}

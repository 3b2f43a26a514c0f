/**
 * Tokenizer shared by the lexical scorer, the stats cache and the indexer.
 *
 * - lower-cased runs of Unicode letters/digits
 * - CJK runs split into overlapping character bigrams (a lone CJK char stays a unigram)
 * - other tokens kept when 2+ chars long; numbers are kept at any length
 */

const WORD_RUN = /[\p{L}\p{N}]+/gu;
const CJK_CHAR = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;
const CJK_RUN = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]+/gu;
const DIGITS = /^\p{N}+$/u;

function cjkBigrams(run: string, out: string[]): void {
	const chars = Array.from(run);
	if (chars.length === 1) {
		out.push(chars[0]);
		return;
	}
	for (let i = 0; i < chars.length - 1; i++) {
		out.push(chars[i] + chars[i + 1]);
	}
}

function pushPlain(segment: string, out: string[]): void {
	if (segment.length >= 2 || DIGITS.test(segment)) {
		out.push(segment);
	}
}

export function tokenize(text: string): string[] {
	const tokens: string[] = [];
	const words = text.toLowerCase().match(WORD_RUN) ?? [];

	for (const word of words) {
		if (!CJK_CHAR.test(word)) {
			pushPlain(word, tokens);
			continue;
		}
		// Mixed run such as "api接口": split into CJK and non-CJK pieces
		let last = 0;
		for (const m of word.matchAll(CJK_RUN)) {
			const start = m.index ?? 0;
			if (start > last) {
				pushPlain(word.slice(last, start), tokens);
			}
			cjkBigrams(m[0], tokens);
			last = start + m[0].length;
		}
		if (last < word.length) {
			pushPlain(word.slice(last), tokens);
		}
	}

	return tokens;
}

/** Term → frequency */
export function termFrequencies(tokens: readonly string[]): Map<string, number> {
	const tf = new Map<string, number>();
	for (const token of tokens) {
		tf.set(token, (tf.get(token) ?? 0) + 1);
	}
	return tf;
}

/** Distinct terms of a query, in first-seen order */
export function queryTerms(query: string): string[] {
	return [...new Set(tokenize(query))];
}

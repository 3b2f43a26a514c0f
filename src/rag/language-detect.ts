/**
 * Language detection (franc)
 *
 * Used by the searcher to skip the lexical leg when the query and the
 * collection are written in different languages.
 */

import { franc } from 'franc';

/** franc is unreliable below this length */
const MIN_DETECTION_LENGTH = 10;

/** franc ISO 639-3 → ISO 639-1 */
const LANG_MAP: Record<string, string> = {
	zho: 'zh',
	cmn: 'zh',
	lzh: 'zh',
	yue: 'zh',
	eng: 'en',
	sco: 'en',
	jpn: 'ja',
	kor: 'ko',
	fra: 'fr',
	deu: 'de',
	spa: 'es',
};

/**
 * Detect the language of `text`; short or unrecognised text yields `fallback`.
 */
export function detectLanguage(text: string, fallback = 'en'): string {
	const trimmed = text.trim();
	if (trimmed.length < MIN_DETECTION_LENGTH) {
		return fallback;
	}

	return LANG_MAP[franc(trimmed)] ?? fallback;
}

/**
 * Store abstraction
 *
 * The engine only reads through SearchCollection; the indexer writes through
 * WritableCollection. Only `committed` entries are ever visible to reads.
 */

export type EntryStatus = 'committed' | 'pending' | 'stale' | 'deleted';

export interface IndexEntry<P> {
	id: number;
	payload: P;
	vector: number[];
	/** Text the lexical index is built from */
	text: string;
	status: EntryStatus;
}

/** A committed entry sharing at least one term with the query */
export interface TermMatch<P> {
	id: number;
	payload: P;
	/** Tokens of the entry's indexed text */
	tokens: string[];
}

export interface NearestMatch<P> {
	id: number;
	payload: P;
	similarity: number;
}

/** Equality on one top-level payload field */
export interface PayloadMatch {
	key: string;
	value: string;
}

export interface NearestQuery {
	threshold: number;
	limit: number;
	excludeIds?: ReadonlySet<number>;
	where?: PayloadMatch;
}

/** Statistics over committed entries, lengths in tokens */
export interface CorpusStats {
	totalDocs: number;
	avgDocLength: number;
}

export interface StoredEntry<P> {
	id: number;
	payload: P;
	status: EntryStatus;
}

export interface SearchCollection<P> {
	readonly name: string;
	readonly vectorSize: number;
	/**
	 * Every committed entry containing any of `terms`.
	 * Order is unspecified: scoring happens in the lexical scorer.
	 */
	matchTerms(terms: readonly string[], where?: PayloadMatch): Promise<TermMatch<P>[]>;
	/** Committed entries with cosine similarity ≥ threshold, best first, ties by id */
	nearest(vector: readonly number[], query: NearestQuery): Promise<NearestMatch<P>[]>;
	corpusStats(): Promise<CorpusStats>;
}

export interface WritableCollection<P> extends SearchCollection<P> {
	ensureCollection(forceRecreate?: boolean): Promise<void>;
	upsert(entries: IndexEntry<P>[]): Promise<void>;
	setStatus(ids: readonly number[], status: EntryStatus): Promise<void>;
	/** Entries in any status, for incremental reindexing */
	list(): Promise<StoredEntry<P>[]>;
	count(status?: EntryStatus): Promise<number>;
}

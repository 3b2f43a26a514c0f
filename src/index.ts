/**
 * Hybrid retrieval & ranking engine: public API
 */

export * from './config/index.js';

export * from './shared/errors.js';
export * from './shared/logger.js';
export * from './shared/request-context.js';
export * from './shared/async.js';
export * from './shared/rate-limiter.js';

export * from './store/types.js';
export * from './store/memory.js';
export * from './store/qdrant.js';

export * from './rag/types.js';
export * from './rag/tokenizer.js';
export * from './rag/language-detect.js';
export * from './rag/lexical.js';
export * from './rag/vector.js';
export * from './rag/fusion.js';
export * from './rag/cascade.js';
export * from './rag/reranker.js';
export * from './rag/embedder.js';
export * from './rag/searcher.js';
export * from './rag/indexer.js';

export * from './guidelines/types.js';
export * from './guidelines/chat-client.js';
export * from './guidelines/selection.js';
export * from './guidelines/matcher.js';

export * from './ensemble/estimator.js';

export * from './engine.js';

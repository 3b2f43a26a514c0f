/**
 * Request context: carries a per-request id through async calls (AsyncLocalStorage)
 * so every log line of one retrieval request can be correlated.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
	requestId: string;
	/** Which engine operation opened the context (search, match, ...) */
	operation: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Run `fn` inside a request context. A context that is already active is reused,
 * so nested engine calls (ensemble → search) share one request id.
 */
export function withRequestContext<T>(operation: string, fn: () => Promise<T>): Promise<T> {
	if (requestContext.getStore()) {
		return fn();
	}
	const ctx: RequestContext = {
		requestId: randomUUID().slice(0, 8),
		operation,
	};
	return requestContext.run(ctx, fn);
}

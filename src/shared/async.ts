/**
 * Async helpers: per-call timeouts, abortable sleep
 */

import { TimeoutError } from './errors.js';

/**
 * Run `fn` with its own deadline. When the deadline passes, the signal handed
 * to `fn` aborts with the TimeoutError, and the returned promise rejects with
 * it even if `fn` ignores the signal.
 */
export async function withTimeout<T>(
	operation: string,
	timeoutMs: number,
	fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
	const controller = new AbortController();
	let timer: NodeJS.Timeout | undefined;

	const deadline = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => {
			const error = new TimeoutError(operation, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([fn(controller.signal), deadline]);
	} finally {
		clearTimeout(timer);
	}
}

/** The error a signal was aborted with */
export function abortReason(signal: AbortSignal): Error {
	const reason: unknown = signal.reason;
	return reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * Resolve after `ms`; reject with the abort reason as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (!signal) {
		return new Promise(resolve => setTimeout(resolve, ms));
	}
	const abortable = signal;
	return new Promise((resolve, reject) => {
		if (abortable.aborted) {
			reject(abortReason(abortable));
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			reject(abortReason(abortable));
		};
		const timer = setTimeout(() => {
			abortable.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		abortable.addEventListener('abort', onAbort, { once: true });
	});
}

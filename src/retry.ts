import async, { type AsyncResultCallback } from "async";
import { yellow } from "kleur/colors";
import type { ServiceError } from "./errors";
import type { RetryPolicy, ServiceErrorKind } from "./types";

const TRANSIENT_KINDS: ReadonlySet<ServiceErrorKind> = new Set(["Network", "Quota", "Timeout"]);

export function isTransient(kind: ServiceErrorKind): boolean {
	return TRANSIENT_KINDS.has(kind);
}

/** Delay before retry number `retryCount` (1-based) */
export function backoffDelay(policy: RetryPolicy, retryCount: number): number {
	return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (retryCount - 1));
}

/**
 * Runs one attempt with its own AbortSignal. When the timeout fires the signal
 * is aborted and the attempt rejects with `onTimeout()`; a late settlement is ignored.
 */
export function withTimeout<T>(
	call: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	onTimeout: () => Error,
): Promise<T> {
	const controller = new AbortController();
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			controller.abort();
			reject(onTimeout());
		}, timeoutMs);

		call(controller.signal).then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}

export type RetryCall<T, E extends ServiceError> = {
	/** Shown in retry warnings */
	label: string;
	policy: RetryPolicy;
	call: (signal: AbortSignal) => Promise<T>;
	/** Normalizes anything thrown by `call` into the service's error class */
	toError: (error: unknown) => E;
	/** Builds the error reported when an attempt exceeds the timeout */
	timeoutError: () => E;
	/** Once aborted, no further attempt is started, including one already waiting out its backoff */
	signal?: AbortSignal;
};

/**
 * Calls an external service with a per-attempt timeout, retrying transient
 * failures with exponential backoff. Permanent failures are returned at once.
 */
export function callWithRetry<T, E extends ServiceError>(options: RetryCall<T, E>): Promise<T> {
	const { label, policy, call, toError, timeoutError, signal } = options;
	let attempt = 0;
	let lastError: E | undefined;

	return new Promise<T>((resolve, reject) => {
		async.retry<T, E>(
			{
				times: policy.attempts,
				interval: (retryCount: number) => backoffDelay(policy, retryCount),
				errorFilter: (error: E) => {
					const retry = isTransient(error.kind) && !signal?.aborted;
					if (retry) {
						console.warn(
							`${label} failed (${error.kind}), retrying (${attempt}/${policy.attempts}): ${yellow(error.message)}`,
						);
					}
					return retry;
				},
			},
			(callback: AsyncResultCallback<T, E>) => {
				if (signal?.aborted) {
					callback(lastError ?? toError(new Error(`${label} cancelled`)));
					return;
				}
				attempt++;
				withTimeout(call, policy.timeoutMs, timeoutError).then(
					(value) => callback(null, value),
					(error: unknown) => {
						lastError = toError(error);
						callback(lastError);
					},
				);
			},
			(error: E | null | undefined, result: T | undefined) => {
				if (error) {
					reject(error);
				} else if (result === undefined) {
					reject(toError(new Error(`${label} returned no result`)));
				} else {
					resolve(result);
				}
			},
		);
	});
}

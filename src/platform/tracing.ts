/**
 * Tracing Module - AsyncLocalStorage wrapper
 *
 * Carries a trace id and the current user id through every await of one
 * inbound update or one scheduled run, so interleaved log lines can be told apart.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

export interface TraceContext {
    traceId: string;
    /** Telegram user id of the sender, when there is one */
    userId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * 12-character nanoid, enough to separate concurrent updates
 */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * @example
 * await runWithTraceId(generateTraceId(), async () => {
 *     logger.info({ kind: 'sys', component: 'App', message: 'Hello' }); // carries the traceId
 * });
 */
export async function runWithTraceId<T>(traceId: string, fn: () => Promise<T>): Promise<T> {
    const context: TraceContext = { traceId };
    return asyncLocalStorage.run(context, fn);
}

export function getTraceId(): string | undefined {
    return asyncLocalStorage.getStore()?.traceId;
}

export function getUserId(): string | undefined {
    return asyncLocalStorage.getStore()?.userId;
}

/**
 * Must be called inside runWithTraceId
 */
export function setUserId(userId: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
        store.userId = userId;
    }
}

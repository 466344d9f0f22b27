import { describe, it, expect } from 'vitest';
import type { Session, SessionStore } from '../../../../core/ports/SessionStore.js';
import { InMemorySessionStore } from '../../../../infrastructure/memory/InMemorySessionStore.js';
import { EvictionSweeper, idleMs } from '../EvictionSweeper.js';

const HOUR_MS = 60 * 60 * 1000;
const TTL_MS = 24 * HOUR_MS;
const NOW = new Date('2024-05-02T12:00:00.000Z');

const ago = (ms: number): Date => new Date(NOW.getTime() - ms);

describe('idleMs', () => {
    it('counts from the last message, falling back to creation', () => {
        const base: Session<string> = { userId: 'u', historyHandle: 'h', createdAt: ago(10_000), lastActivityAt: null };
        expect(idleMs(base, NOW)).toBe(10_000);
        expect(idleMs({ ...base, lastActivityAt: ago(2_000) }, NOW)).toBe(2_000);
    });
});

describe('EvictionSweeper', () => {
    it('evicts sessions idle beyond the TTL and keeps the rest', () => {
        const store = new InMemorySessionStore<string>();
        store.createIfAbsent('stale', 'a', ago(3 * TTL_MS));
        store.touch('stale', ago(TTL_MS + 1000));
        store.createIfAbsent('fresh', 'b', ago(3 * TTL_MS));
        store.touch('fresh', ago(TTL_MS - 1000));

        const report = new EvictionSweeper(store, TTL_MS).run(NOW);

        expect(report).toEqual({ scanned: 2, evicted: ['stale'], failed: [] });
        expect(store.get('stale')).toBeUndefined();
        expect(store.get('fresh')).toBeDefined();
    });

    it('uses creation time for sessions that never sent a message', () => {
        const store = new InMemorySessionStore<string>();
        store.createIfAbsent('silent-old', 'a', ago(TTL_MS + 1000));
        store.createIfAbsent('silent-new', 'b', ago(TTL_MS - 1000));

        const report = new EvictionSweeper(store, TTL_MS).run(NOW);

        expect(report.evicted).toEqual(['silent-old']);
        expect(store.get('silent-new')).toBeDefined();
    });

    it('keeps a session idle for exactly the TTL', () => {
        const store = new InMemorySessionStore<string>();
        store.createIfAbsent('edge', 'a', ago(TTL_MS));

        expect(new EvictionSweeper(store, TTL_MS).run(NOW).evicted).toEqual([]);
        expect(store.size).toBe(1);
    });

    it('keeps sweeping when one removal throws', () => {
        const inner = new InMemorySessionStore<string>();
        inner.createIfAbsent('broken', 'a', ago(2 * TTL_MS));
        inner.createIfAbsent('ok-1', 'b', ago(2 * TTL_MS));
        inner.createIfAbsent('ok-2', 'c', ago(2 * TTL_MS));

        const flaky: SessionStore<string> = {
            get: (userId) => inner.get(userId),
            createIfAbsent: (userId, handle, now) => inner.createIfAbsent(userId, handle, now),
            touch: (userId, now) => inner.touch(userId, now),
            remove: (userId) => {
                if (userId === 'broken') throw new Error('removal failed');
                return inner.remove(userId);
            },
            removeAll: () => inner.removeAll(),
            snapshot: () => inner.snapshot(),
            get size() {
                return inner.size;
            },
        };

        const report = new EvictionSweeper(flaky, TTL_MS).run(NOW);

        expect(report).toEqual({ scanned: 3, evicted: ['ok-1', 'ok-2'], failed: ['broken'] });
        expect(inner.get('broken')).toBeDefined();
        expect(inner.size).toBe(1);
    });

    it('handles an empty store', () => {
        const report = new EvictionSweeper(new InMemorySessionStore<string>(), TTL_MS).run(NOW);
        expect(report).toEqual({ scanned: 0, evicted: [], failed: [] });
    });

    it('rejects a non-positive TTL', () => {
        expect(() => new EvictionSweeper(new InMemorySessionStore<string>(), 0)).toThrow('ttl must be positive');
    });
});

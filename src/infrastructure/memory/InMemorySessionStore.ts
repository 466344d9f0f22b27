import type { Session, SessionStore } from '../../core/ports/SessionStore.js';

/**
 * Map-backed SessionStore. Everything is lost on restart.
 */
export class InMemorySessionStore<H> implements SessionStore<H> {
    private sessions: Map<string, Session<H>> = new Map();

    get size(): number {
        return this.sessions.size;
    }

    get(userId: string): Session<H> | undefined {
        return this.sessions.get(userId);
    }

    createIfAbsent(userId: string, historyHandle: H, now: Date = new Date()): Session<H> {
        const existing = this.sessions.get(userId);
        if (existing) return existing;

        const session: Session<H> = {
            userId,
            historyHandle,
            createdAt: now,
            lastActivityAt: null,
        };
        this.sessions.set(userId, session);
        return session;
    }

    touch(userId: string, now: Date): boolean {
        const session = this.sessions.get(userId);
        if (!session) return false;
        session.lastActivityAt = now;
        return true;
    }

    remove(userId: string): Session<H> | undefined {
        const session = this.sessions.get(userId);
        this.sessions.delete(userId);
        return session;
    }

    removeAll(): number {
        const count = this.sessions.size;
        this.sessions.clear();
        return count;
    }

    snapshot(): Array<[string, Session<H>]> {
        return Array.from(this.sessions.entries(), ([userId, session]) => [userId, { ...session }]);
    }
}

/**
 * One open conversation per user.
 * `H` is the backend's conversation handle; the session is its only owner.
 */
export interface Session<H> {
    readonly userId: string;
    readonly historyHandle: H;
    readonly createdAt: Date;
    /** Unset until the first successful dispatch */
    lastActivityAt: Date | null;
}

export interface SessionStore<H> {
    get(userId: string): Session<H> | undefined;

    /**
     * Inserts a fresh session, or returns the existing one untouched.
     * A session is never replaced implicitly.
     */
    createIfAbsent(userId: string, historyHandle: H, now?: Date): Session<H>;

    /** Advances lastActivityAt; returns false (and creates nothing) when no session exists */
    touch(userId: string, now: Date): boolean;

    remove(userId: string): Session<H> | undefined;
    removeAll(): number;

    /** Point-in-time copy, safe to iterate while the store is mutated */
    snapshot(): Array<[string, Session<H>]>;

    readonly size: number;
}

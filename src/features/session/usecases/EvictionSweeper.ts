import type { Session, SessionStore } from '../../../core/ports/SessionStore.js';
import { logger } from '../../../platform/logger.js';

const COMPONENT = 'EvictionSweeper';

export interface SweepReport {
    scanned: number;
    evicted: string[];
    failed: string[];
}

export function idleMs<H>(session: Session<H>, now: Date): number {
    const reference = session.lastActivityAt ?? session.createdAt;
    return now.getTime() - reference.getTime();
}

/**
 * Removes sessions idle for longer than the TTL.
 * Idle time counts from the last message, or from creation when none was sent.
 */
export class EvictionSweeper<H> {
    constructor(
        private readonly store: SessionStore<H>,
        private readonly ttlMs: number
    ) {
        if (!(ttlMs > 0)) {
            throw new Error(`EvictionSweeper: ttl must be positive, got ${ttlMs}`);
        }
    }

    run(now: Date = new Date()): SweepReport {
        const entries = this.store.snapshot();
        const report: SweepReport = { scanned: entries.length, evicted: [], failed: [] };

        for (const [userId, session] of entries) {
            const idle = idleMs(session, now);
            if (idle <= this.ttlMs) continue;

            try {
                this.store.remove(userId);
                report.evicted.push(userId);
                logger.info({
                    kind: 'biz',
                    component: COMPONENT,
                    message: 'Expired session removed',
                    meta: { userId, idleMinutes: Math.floor(idle / 60_000) },
                });
            } catch (error) {
                report.failed.push(userId);
                logger.error({ kind: 'biz', component: COMPONENT, message: 'Failed to remove expired session', error, meta: { userId } });
            }
        }

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Sweep finished',
            meta: { scanned: report.scanned, evicted: report.evicted.length, failed: report.failed.length },
        });
        return report;
    }
}

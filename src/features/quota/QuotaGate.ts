import { err, ok, type Result } from '../../core/result.js';
import { quotaExceeded, type QuotaExceeded } from '../session/domain/OrchestratorError.js';

/**
 * Process-wide daily request ceiling.
 *
 * Passive: the counter only moves through commit() and reset(); the reset
 * cadence belongs to the scheduler.
 */
export class QuotaGate {
    private count = 0;

    constructor(private readonly limit: number) {
        if (!Number.isInteger(limit) || limit <= 0) {
            throw new Error(`QuotaGate: daily limit must be a positive integer, got ${limit}`);
        }
    }

    get requestCount(): number {
        return this.count;
    }

    get dailyLimit(): number {
        return this.limit;
    }

    get remaining(): number {
        return Math.max(0, this.limit - this.count);
    }

    /**
     * Admits a request while `count + 1 <= limit`. Does not mutate: the slot is
     * only consumed by commit() once the backend call succeeded.
     */
    checkAndReserve(): Result<void, QuotaExceeded> {
        if (this.count + 1 > this.limit) {
            return err(quotaExceeded(this.limit));
        }
        return ok(undefined);
    }

    commit(): void {
        this.count += 1;
    }

    /** Returns the count that was cleared */
    reset(): number {
        const cleared = this.count;
        this.count = 0;
        return cleared;
    }
}

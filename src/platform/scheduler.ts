/**
 * Periodic tasks on plain Node timers.
 *
 * Each run gets its own trace id. A failing run is logged and the schedule
 * carries on. Timers are unref'd so they never keep the process alive alone.
 */

import type { TimeOfDay } from './config.js';
import { logger } from './logger.js';
import { generateTraceId, runWithTraceId } from './tracing.js';

const COMPONENT = 'Scheduler';

export type TaskFn = () => unknown;

export interface ScheduledTask {
    readonly name: string;
    stop(): void;
}

async function runTask(name: string, task: TaskFn): Promise<void> {
    await runWithTraceId(generateTraceId(), async () => {
        try {
            await task();
            logger.debug({ kind: 'sys', component: COMPONENT, message: 'Task completed', meta: { task: name } });
        } catch (error) {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Task failed', error, meta: { task: name } });
        }
    });
}

/**
 * Milliseconds from `now` until the next local occurrence of `at`.
 * Exactly at the anchor the answer is a full day, not zero.
 */
export function msUntilNextTimeOfDay(at: TimeOfDay, now: Date): number {
    const next = new Date(now.getTime());
    next.setHours(at.hours, at.minutes, 0, 0);
    if (next.getTime() <= now.getTime()) {
        next.setDate(next.getDate() + 1);
    }
    return next.getTime() - now.getTime();
}

export function scheduleEvery(name: string, intervalMs: number, task: TaskFn): ScheduledTask {
    const timer = setInterval(() => {
        void runTask(name, task);
    }, intervalMs);
    timer.unref();

    logger.info({ kind: 'sys', component: COMPONENT, message: 'Interval task scheduled', meta: { task: name, intervalMs } });
    return {
        name,
        stop: () => clearInterval(timer),
    };
}

/**
 * Runs `task` every day at the given local wall-clock time.
 */
export function scheduleDailyAt(name: string, at: TimeOfDay, task: TaskFn, now: Date = new Date()): ScheduledTask {
    let timer: NodeJS.Timeout | null = null;
    let stopped = false;

    const arm = (delayMs: number) => {
        timer = setTimeout(() => {
            if (stopped) return;
            // next run re-anchored on the wall clock
            arm(msUntilNextTimeOfDay(at, new Date()));
            void runTask(name, task);
        }, delayMs);
        timer.unref();
    };

    const firstDelayMs = msUntilNextTimeOfDay(at, now);
    arm(firstDelayMs);

    logger.info({
        kind: 'sys',
        component: COMPONENT,
        message: 'Daily task scheduled',
        meta: { task: name, at: `${String(at.hours).padStart(2, '0')}:${String(at.minutes).padStart(2, '0')}`, firstRunInMs: firstDelayMs },
    });
    return {
        name,
        stop: () => {
            stopped = true;
            if (timer) clearTimeout(timer);
        },
    };
}

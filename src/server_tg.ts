import config from './platform/config.js';
import { logger } from './platform/logger.js';
import { scheduleDailyAt, scheduleEvery, type ScheduledTask } from './platform/scheduler.js';
import { GeminiBackend, type GeminiConversation } from './infrastructure/ai/GeminiBackend.js';
import { InMemorySessionStore } from './infrastructure/memory/InMemorySessionStore.js';
import { AttachmentClassifier } from './features/attachments/AttachmentClassifier.js';
import { QuotaGate } from './features/quota/QuotaGate.js';
import { EvictionSweeper } from './features/session/usecases/EvictionSweeper.js';
import { SessionOrchestrator } from './features/session/usecases/SessionOrchestrator.js';
import { TelegramBotAdapter } from './features/telegram_adapter/TelegramBotAdapter.js';

const COMPONENT = 'Server';

async function main(): Promise<void> {
    if (!config.telegram.token) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'TELEGRAM_BOT_TOKEN is not set in .env' });
        process.exit(1);
    }
    if (!config.gemini.apiKey) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'GOOGLE_API_KEY is not set in .env' });
        process.exit(1);
    }

    const backend = new GeminiBackend({
        apiKey: config.gemini.apiKey,
        model: config.gemini.model,
        timeoutMs: config.gemini.timeoutMs,
    });
    const store = new InMemorySessionStore<GeminiConversation>();
    const quota = new QuotaGate(config.quota.dailyLimit);
    const orchestrator = new SessionOrchestrator({
        backend,
        store,
        quota,
        classifier: new AttachmentClassifier(),
    });
    const sweeper = new EvictionSweeper(store, config.session.ttlHours * 60 * 60 * 1000);
    const adapter = new TelegramBotAdapter(config.telegram.token, { orchestrator, owner: config.bot.owner });

    const tasks: ScheduledTask[] = [
        scheduleDailyAt('quota-reset', config.quota.resetAt, () => {
            const cleared = quota.reset();
            logger.info({ kind: 'biz', component: COMPONENT, message: 'Daily request count reset', meta: { cleared } });
        }),
        scheduleEvery('session-sweep', config.session.sweepIntervalMinutes * 60 * 1000, () => sweeper.run()),
    ];

    const shutdown = async (signal: string) => {
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Stopping bot...', meta: { signal } });
        for (const task of tasks) task.stop();
        try {
            await adapter.stop();
        } catch (error) {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to stop polling cleanly', error });
        }
        process.exit(0);
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    try {
        await adapter.start();
        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Bot is running',
            meta: { model: config.gemini.model, dailyLimit: config.quota.dailyLimit, ttlHours: config.session.ttlHours },
        });
    } catch (error) {
        logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to start bot', error });
        process.exit(1);
    }
}

void main();

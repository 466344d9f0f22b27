import type { IGenerativeBackend } from '../../../core/ports/IGenerativeBackend.js';
import type { Session, SessionStore } from '../../../core/ports/SessionStore.js';
import { err, ok, type Result } from '../../../core/result.js';
import { logger } from '../../../platform/logger.js';
import type { AttachmentClassifier } from '../../attachments/AttachmentClassifier.js';
import type { AttachmentSource } from '../../attachments/domain/AttachmentFile.js';
import { promptLength, validatePrompt } from '../../chat/rules/promptValidator.js';
import type { QuotaGate } from '../../quota/QuotaGate.js';
import { backendError, type OrchestratorError } from '../domain/OrchestratorError.js';

const COMPONENT = 'SessionOrchestrator';

export interface SessionSummary {
    userId: string;
    createdAt: Date;
    lastActivityAt: Date | null;
    turns: number;
}

export interface OrchestratorStats {
    requestCount: number;
    dailyLimit: number;
    modelName: string;
    sessions: SessionSummary[];
}

export interface SessionOrchestratorDeps<H> {
    backend: IGenerativeBackend<H>;
    store: SessionStore<H>;
    quota: QuotaGate;
    classifier: AttachmentClassifier;
    /** Injected for tests */
    clock?: () => Date;
}

/**
 * Session Orchestrator (usecase façade)
 *
 * Every entry point follows: quota → prompt → session → dispatch.
 * Failures come back as the error half of a Result; nothing is thrown to the adapter.
 */
export class SessionOrchestrator<H> {
    private readonly backend: IGenerativeBackend<H>;
    private readonly store: SessionStore<H>;
    private readonly quota: QuotaGate;
    private readonly classifier: AttachmentClassifier;
    private readonly clock: () => Date;

    constructor(deps: SessionOrchestratorDeps<H>) {
        this.backend = deps.backend;
        this.store = deps.store;
        this.quota = deps.quota;
        this.classifier = deps.classifier;
        this.clock = deps.clock ?? (() => new Date());
    }

    async sendText(userId: string, prompt: string): Promise<Result<string, OrchestratorError>> {
        const admitted = this.admit(prompt);
        if (!admitted.ok) return admitted;

        const session = this.getOrCreateSession(userId);

        let reply: string;
        try {
            reply = await this.backend.send(session.historyHandle, prompt);
        } catch (error) {
            logger.error({
                kind: 'biz',
                component: COMPONENT,
                message: 'Chat message failed',
                error,
                meta: { userId, promptLength: promptLength(prompt) },
            });
            return err(backendError(error));
        }

        // The session may have been erased while the call was in flight; touch() then does nothing.
        this.store.touch(userId, this.clock());
        this.quota.commit();

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Chat message sent',
            meta: {
                userId,
                promptLength: promptLength(prompt),
                replyLength: reply.length,
                turns: this.backend.turnCount(session.historyHandle),
                requestCount: this.quota.requestCount,
            },
        });
        return ok(reply);
    }

    /**
     * Single-turn call with one attachment. Stateless: no session is read or written.
     */
    async sendWithAttachment(
        userId: string,
        prompt: string,
        source: AttachmentSource
    ): Promise<Result<string, OrchestratorError>> {
        const admitted = this.admit(prompt);
        if (!admitted.ok) return admitted;

        const classified = await this.classifier.classify(source);
        if (!classified.ok) return classified;
        const attachment = classified.value;

        let reply: string;
        try {
            reply = await this.backend.generateOnce(attachment, prompt);
        } catch (error) {
            logger.error({
                kind: 'biz',
                component: COMPONENT,
                message: 'Attachment generation failed',
                error,
                meta: { userId, contentType: attachment.contentType },
            });
            return err(backendError(error));
        }

        this.quota.commit();
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Content generated from attachment and prompt',
            meta: {
                userId,
                contentType: attachment.contentType,
                imageSize: [attachment.image.width, attachment.image.height],
                promptLength: promptLength(prompt),
                replyLength: reply.length,
                requestCount: this.quota.requestCount,
            },
        });
        return ok(reply);
    }

    removeSession(userId: string): Session<H> | undefined {
        const removed = this.store.remove(userId);
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: removed ? 'Chat history has been deleted' : 'No chat history to delete',
            meta: { userId },
        });
        return removed;
    }

    removeAllSessions(): number {
        const removed = this.store.removeAll();
        logger.info({ kind: 'biz', component: COMPONENT, message: 'All chats have been erased', meta: { chatsDeleted: removed } });
        return removed;
    }

    setBackendModel(modelName: string): void {
        this.backend.setModel(modelName);
        logger.info({ kind: 'biz', component: COMPONENT, message: 'A new model has been set', meta: { modelName } });
    }

    getStats(): OrchestratorStats {
        return {
            requestCount: this.quota.requestCount,
            dailyLimit: this.quota.dailyLimit,
            modelName: this.backend.modelName,
            sessions: this.store.snapshot().map(([userId, session]) => ({
                userId,
                createdAt: session.createdAt,
                lastActivityAt: session.lastActivityAt,
                turns: this.backend.turnCount(session.historyHandle),
            })),
        };
    }

    private admit(prompt: string): Result<void, OrchestratorError> {
        const quota = this.quota.checkAndReserve();
        if (!quota.ok) {
            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Request refused, daily limit reached',
                meta: { requestCount: this.quota.requestCount, dailyLimit: this.quota.dailyLimit },
            });
            return quota;
        }
        return validatePrompt(prompt);
    }

    /**
     * Lookup and insert run without an await in between, so two updates from
     * the same user cannot open two sessions.
     */
    private getOrCreateSession(userId: string): Session<H> {
        const existing = this.store.get(userId);
        if (existing) return existing;

        const session = this.store.createIfAbsent(userId, this.backend.startSession(), this.clock());
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Session created',
            meta: { userId, modelName: this.backend.modelName, activeSessions: this.store.size },
        });
        return session;
    }
}

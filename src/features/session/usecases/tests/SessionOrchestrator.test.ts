import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Readable } from 'stream';
import sharp from 'sharp';
import type { IGenerativeBackend } from '../../../../core/ports/IGenerativeBackend.js';
import type { AttachmentFile, AttachmentSource } from '../../../attachments/domain/AttachmentFile.js';
import { AttachmentClassifier } from '../../../attachments/AttachmentClassifier.js';
import { InMemorySessionStore } from '../../../../infrastructure/memory/InMemorySessionStore.js';
import { QuotaGate } from '../../../quota/QuotaGate.js';
import { SessionOrchestrator } from '../SessionOrchestrator.js';

interface FakeHandle {
    id: number;
    sent: string[];
}

/** In-process backend: echoes prompts and fails on demand */
class FakeBackend implements IGenerativeBackend<FakeHandle> {
    modelName = 'fake-model';
    started = 0;
    failNext: Error | null = null;
    onceCalls: Array<{ attachment: AttachmentFile; text: string }> = [];

    setModel(modelName: string): void {
        this.modelName = modelName;
    }

    startSession(): FakeHandle {
        this.started += 1;
        return { id: this.started, sent: [] };
    }

    async send(handle: FakeHandle, text: string): Promise<string> {
        this.throwIfFailing();
        handle.sent.push(text);
        return `echo:${text}`;
    }

    async generateOnce(attachment: AttachmentFile, text: string): Promise<string> {
        this.throwIfFailing();
        this.onceCalls.push({ attachment, text });
        return `seen ${attachment.image.width}x${attachment.image.height}: ${text}`;
    }

    turnCount(handle: FakeHandle): number {
        return handle.sent.length;
    }

    private throwIfFailing(): void {
        if (this.failNext) {
            const error = this.failNext;
            this.failNext = null;
            throw error;
        }
    }
}

/** Clock that advances one second per reading */
const steppingClock = (start: Date) => {
    let ms = start.getTime();
    return () => {
        const now = new Date(ms);
        ms += 1000;
        return now;
    };
};

const T0 = new Date('2024-05-01T10:00:00.000Z');

describe('SessionOrchestrator', () => {
    let backend: FakeBackend;
    let store: InMemorySessionStore<FakeHandle>;

    const build = (dailyLimit: number) => {
        const quota = new QuotaGate(dailyLimit);
        const orchestrator = new SessionOrchestrator({
            backend,
            store,
            quota,
            classifier: new AttachmentClassifier(),
            clock: steppingClock(T0),
        });
        return { quota, orchestrator };
    };

    beforeEach(() => {
        backend = new FakeBackend();
        store = new InMemorySessionStore<FakeHandle>();
    });

    describe('sendText', () => {
        it('runs the alice scenario: two admitted, third refused', async () => {
            const { quota, orchestrator } = build(2);

            const first = await orchestrator.sendText('alice', 'hi');
            expect(first).toEqual({ ok: true, value: 'echo:hi' });
            expect(quota.requestCount).toBe(1);
            const created = store.get('alice');
            expect(created?.createdAt).toEqual(new Date('2024-05-01T10:00:00.000Z'));
            expect(created?.lastActivityAt).toEqual(new Date('2024-05-01T10:00:01.000Z'));

            const second = await orchestrator.sendText('alice', 'again');
            expect(second).toEqual({ ok: true, value: 'echo:again' });
            expect(quota.requestCount).toBe(2);
            const reused = store.get('alice');
            expect(reused).toBe(created);
            expect(reused?.createdAt).toEqual(new Date('2024-05-01T10:00:00.000Z'));
            expect(reused?.lastActivityAt).toEqual(new Date('2024-05-01T10:00:02.000Z'));
            expect(backend.started).toBe(1);
            expect(reused?.historyHandle.sent).toEqual(['hi', 'again']);

            const third = await orchestrator.sendText('alice', 'more');
            expect(third.ok).toBe(false);
            if (!third.ok) expect(third.error.kind).toBe('QuotaExceeded');
            expect(quota.requestCount).toBe(2);
            expect(reused?.historyHandle.sent).toEqual(['hi', 'again']);
        });

        it('sets lastActivityAt no earlier than the call start', async () => {
            const quota = new QuotaGate(10);
            const orchestrator = new SessionOrchestrator({ backend, store, quota, classifier: new AttachmentClassifier() });

            const before = Date.now();
            await orchestrator.sendText('alice', 'hello');
            const lastActivityAt = store.get('alice')?.lastActivityAt;

            expect(lastActivityAt).toBeInstanceOf(Date);
            expect(lastActivityAt?.getTime()).toBeGreaterThanOrEqual(before);
        });

        it('checks quota before the prompt', async () => {
            const { quota, orchestrator } = build(1);
            await orchestrator.sendText('alice', 'hi');
            expect(quota.requestCount).toBe(1);

            const result = await orchestrator.sendText('alice', '');
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('QuotaExceeded');
        });

        it('rejects an invalid prompt without opening a session', async () => {
            const { quota, orchestrator } = build(5);

            const empty = await orchestrator.sendText('bob', '');
            const long = await orchestrator.sendText('bob', 'y'.repeat(1000));

            expect(empty.ok).toBe(false);
            if (!empty.ok) expect(empty.error.kind).toBe('InvalidPrompt');
            expect(long.ok).toBe(false);
            if (!long.ok) expect(long.error.kind).toBe('InvalidPrompt');
            expect(store.get('bob')).toBeUndefined();
            expect(backend.started).toBe(0);
            expect(quota.requestCount).toBe(0);
        });

        it('returns BackendError and leaves quota and timestamps alone', async () => {
            const { quota, orchestrator } = build(5);
            await orchestrator.sendText('carol', 'first');
            const before = store.get('carol')?.lastActivityAt;

            backend.failNext = new Error('503 model overloaded');
            const result = await orchestrator.sendText('carol', 'second');

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('BackendError');
                expect(result.error.message).toBe('503 model overloaded');
            }
            expect(quota.requestCount).toBe(1);
            expect(store.get('carol')?.lastActivityAt).toBe(before);
        });

        it('keeps the session created before a failed first dispatch, without activity', async () => {
            const { orchestrator } = build(5);
            backend.failNext = new Error('network down');

            await orchestrator.sendText('dave', 'hello');

            expect(store.get('dave')?.lastActivityAt).toBeNull();
            expect(backend.started).toBe(1);
        });

        it('does not recreate a session erased while the call was in flight', async () => {
            const { orchestrator } = build(5);
            const originalSend = backend.send.bind(backend);
            backend.send = async (handle, text) => {
                orchestrator.removeAllSessions();
                return originalSend(handle, text);
            };

            const result = await orchestrator.sendText('erin', 'hi');

            expect(result).toEqual({ ok: true, value: 'echo:hi' });
            expect(store.get('erin')).toBeUndefined();
        });

        it('keeps one session per user across users', async () => {
            const { orchestrator } = build(10);
            await orchestrator.sendText('alice', 'a1');
            await orchestrator.sendText('bob', 'b1');
            await orchestrator.sendText('alice', 'a2');

            expect(store.size).toBe(2);
            expect(store.get('alice')?.historyHandle.sent).toEqual(['a1', 'a2']);
            expect(store.get('bob')?.historyHandle.sent).toEqual(['b1']);
        });
    });

    describe('sendWithAttachment', () => {
        const trackedSource = (contentType: string, data: Buffer) => {
            const streams: Readable[] = [];
            const open = vi.fn(() => {
                const stream = Readable.from([data]);
                streams.push(stream);
                return stream;
            });
            const attachment: AttachmentSource = { name: 'upload', contentType, open };
            return { attachment, open, streams };
        };

        it('dispatches a single-shot call without touching sessions', async () => {
            const { quota, orchestrator } = build(5);
            const png = await sharp({ create: { width: 2, height: 5, channels: 3, background: { r: 0, g: 0, b: 0 } } }).png().toBuffer();
            const { attachment, streams } = trackedSource('image/png', png);

            const result = await orchestrator.sendWithAttachment('alice', 'what is this?', attachment);

            expect(result).toEqual({ ok: true, value: 'seen 2x5: what is this?' });
            expect(backend.onceCalls).toHaveLength(1);
            expect(backend.onceCalls[0].text).toBe('what is this?');
            expect(store.get('alice')).toBeUndefined();
            expect(backend.started).toBe(0);
            expect(quota.requestCount).toBe(1);
            expect(streams).toHaveLength(1);
            expect(streams[0].destroyed).toBe(true);
        });

        it('does not download an attachment whose type is refused', async () => {
            const { quota, orchestrator } = build(5);
            const { attachment, open } = trackedSource('application/pdf', Buffer.from('%PDF'));

            const result = await orchestrator.sendWithAttachment('alice', 'summarise', attachment);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('UnsupportedFileType');
            expect(open).not.toHaveBeenCalled();
            expect(quota.requestCount).toBe(0);
        });

        it('does not download an attachment when the quota is exhausted', async () => {
            const { orchestrator } = build(1);
            await orchestrator.sendText('alice', 'hi');
            const { attachment, open } = trackedSource('image/png', Buffer.from('x'));

            const result = await orchestrator.sendWithAttachment('alice', 'look', attachment);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('QuotaExceeded');
            expect(open).not.toHaveBeenCalled();
        });

        it('does not download an attachment sent without a caption', async () => {
            const { orchestrator } = build(5);
            const { attachment, open } = trackedSource('image/png', Buffer.from('x'));

            const result = await orchestrator.sendWithAttachment('alice', '', attachment);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('InvalidPrompt');
            expect(open).not.toHaveBeenCalled();
        });

        it('returns FileProcessingFailure for undecodable images', async () => {
            const { orchestrator } = build(5);
            const { attachment, streams } = trackedSource('image/jpeg', Buffer.from('not a jpeg'));

            const result = await orchestrator.sendWithAttachment('alice', 'look', attachment);

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('FileProcessingFailure');
            expect(streams[0].destroyed).toBe(true);
        });

        it('returns BackendError without consuming quota and still releases the stream', async () => {
            const { quota, orchestrator } = build(5);
            const png = await sharp({ create: { width: 1, height: 1, channels: 3, background: { r: 1, g: 2, b: 3 } } }).png().toBuffer();
            const { attachment, streams } = trackedSource('image/png', png);
            backend.failNext = new Error('safety block');

            const result = await orchestrator.sendWithAttachment('alice', 'look', attachment);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('BackendError');
                expect(result.error.message).toBe('safety block');
            }
            expect(quota.requestCount).toBe(0);
            expect(streams[0].destroyed).toBe(true);
        });
    });

    describe('administration', () => {
        it('removeAllSessions returns the count and empties the store', async () => {
            const { orchestrator } = build(10);
            await orchestrator.sendText('alice', 'a');
            await orchestrator.sendText('bob', 'b');
            await orchestrator.sendText('carol', 'c');

            expect(orchestrator.removeAllSessions()).toBe(3);
            expect(store.get('alice')).toBeUndefined();
            expect(store.get('bob')).toBeUndefined();
            expect(store.get('carol')).toBeUndefined();
        });

        it('removeSession returns to NO_SESSION and the next message opens a new one', async () => {
            const { orchestrator } = build(10);
            await orchestrator.sendText('alice', 'a');
            const removed = orchestrator.removeSession('alice');
            expect(removed?.historyHandle.id).toBe(1);
            expect(orchestrator.removeSession('alice')).toBeUndefined();

            await orchestrator.sendText('alice', 'b');
            expect(store.get('alice')?.historyHandle.id).toBe(2);
        });

        it('setBackendModel passes through and shows up in stats', async () => {
            const { orchestrator } = build(10);
            await orchestrator.sendText('alice', 'a');
            orchestrator.setBackendModel('gemini-1.5-pro');

            const stats = orchestrator.getStats();
            expect(stats.modelName).toBe('gemini-1.5-pro');
            expect(stats.requestCount).toBe(1);
            expect(stats.dailyLimit).toBe(10);
            expect(stats.sessions).toEqual([
                {
                    userId: 'alice',
                    createdAt: new Date('2024-05-01T10:00:00.000Z'),
                    lastActivityAt: new Date('2024-05-01T10:00:01.000Z'),
                    turns: 1,
                },
            ]);
        });
    });
});

import { GoogleGenerativeAI, type ChatSession, type GenerativeModel } from '@google/generative-ai';
import type { IGenerativeBackend } from '../../core/ports/IGenerativeBackend.js';
import type { AttachmentFile } from '../../features/attachments/domain/AttachmentFile.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'GeminiBackend';

/**
 * Conversation handle: the SDK chat plus a turn counter
 * (ChatSession only exposes its history asynchronously).
 */
export interface GeminiConversation {
    readonly chat: ChatSession;
    readonly modelName: string;
    turns: number;
}

export interface GeminiBackendOptions {
    apiKey: string;
    model: string;
    /** Per-request timeout; a hung call rejects instead of blocking the update */
    timeoutMs: number;
}

export class GeminiBackend implements IGenerativeBackend<GeminiConversation> {
    private readonly genAI: GoogleGenerativeAI;
    private readonly timeoutMs: number;
    private model: GenerativeModel;
    private currentModelName: string;

    constructor(options: GeminiBackendOptions) {
        this.genAI = new GoogleGenerativeAI(options.apiKey);
        this.timeoutMs = options.timeoutMs;
        this.currentModelName = options.model;
        this.model = this.createModel(options.model);
    }

    get modelName(): string {
        return this.currentModelName;
    }

    setModel(modelName: string): void {
        const trimmed = modelName.trim();
        if (!trimmed) {
            throw new Error('Model name must not be empty');
        }
        this.model = this.createModel(trimmed);
        this.currentModelName = trimmed;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Model switched', meta: { modelName: trimmed } });
    }

    startSession(): GeminiConversation {
        return {
            chat: this.model.startChat({ history: [] }),
            modelName: this.currentModelName,
            turns: 0,
        };
    }

    async send(handle: GeminiConversation, text: string): Promise<string> {
        const start = Date.now();
        const result = await handle.chat.sendMessage(text);
        const reply = result.response.text();
        handle.turns += 1;

        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: 'Chat turn completed',
            meta: { modelName: handle.modelName, turns: handle.turns, latencyMs: Date.now() - start },
        });
        return reply;
    }

    async generateOnce(attachment: AttachmentFile, text: string): Promise<string> {
        const start = Date.now();
        const result = await this.model.generateContent([
            // decoded format, so an "image/jpg" upload goes out as image/jpeg
            { inlineData: { data: attachment.data.toString('base64'), mimeType: `image/${attachment.image.format}` } },
            text,
        ]);
        const reply = result.response.text();

        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: 'Single-turn generation completed',
            meta: { modelName: this.currentModelName, contentType: attachment.contentType, latencyMs: Date.now() - start },
        });
        return reply;
    }

    turnCount(handle: GeminiConversation): number {
        return handle.turns;
    }

    private createModel(modelName: string): GenerativeModel {
        return this.genAI.getGenerativeModel({ model: modelName }, { timeout: this.timeoutMs });
    }
}

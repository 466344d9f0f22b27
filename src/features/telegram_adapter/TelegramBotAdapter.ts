import TelegramBot from 'node-telegram-bot-api';
import config from '../../platform/config.js';
import { logger } from '../../platform/logger.js';
import { generateTraceId, runWithTraceId, setUserId } from '../../platform/tracing.js';
import type { Result } from '../../core/result.js';
import type { OrchestratorError } from '../session/domain/OrchestratorError.js';
import type { SessionOrchestrator } from '../session/usecases/SessionOrchestrator.js';
import {
    isAddressedToBot,
    parseCommand,
    pickAttachment,
    splitMessage,
    stripMention,
    type BotIdentity,
    type ParsedCommand,
} from './messageParsing.js';
import { UIHandler } from './UIHandler.js';

const COMPONENT = 'TelegramBot';

const OWNER_COMMANDS = new Set(['erase_chats', 'set_model', 'set_owner', 'stats']);

export interface TelegramBotAdapterDeps<H> {
    orchestrator: SessionOrchestrator<H>;
    /** Telegram username allowed to run the owner commands */
    owner: string;
}

/**
 * Telegram Adapter (interface layer)
 * 1. Listens for updates
 * 2. Routes commands, owner-only ones included
 * 3. Calls the SessionOrchestrator
 * 4. Turns its Result into a reply
 */
export class TelegramBotAdapter<H> {
    private bot: TelegramBot;
    private orchestrator: SessionOrchestrator<H>;
    private owner: string;
    private identity: BotIdentity | null = null;
    private isPolling: boolean = false;

    constructor(token: string, deps: TelegramBotAdapterDeps<H>) {
        this.orchestrator = deps.orchestrator;
        this.owner = deps.owner;

        const options: TelegramBot.ConstructorOptions = {
            polling: { autoStart: false }, // polling is started by start() only
        };
        if (config.telegram.proxy) {
            const { scheme, host, port } = config.telegram.proxy;
            const proxyUrl = `${scheme}://${host}:${port}`;
            options.request = { proxy: proxyUrl } as NonNullable<TelegramBot.ConstructorOptions['request']>;
            logger.info({ kind: 'sys', component: COMPONENT, message: `Using proxy: ${proxyUrl}` });
        }

        this.bot = new TelegramBot(token, options);

        this.bot.on('polling_error', (error) => {
            if (error.message.includes('ECONNRESET') || error.message.includes('ETIMEDOUT') || error.message.includes('socket disconnected')) {
                logger.warn({ kind: 'sys', component: COMPONENT, message: 'Network instability detected (auto-recovering)', error });
            } else {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Polling fatal error', error });
            }
        });

        this.bot.on('error', (error) => {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'General bot error', error });
        });
    }

    async start(): Promise<void> {
        if (this.isPolling) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Already polling' });
            return;
        }

        const me = await this.bot.getMe();
        this.identity = { id: me.id, username: me.username ?? '' };
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Starting polling...', meta: { username: this.identity.username } });

        this.bot.on('message', (msg) => {
            void this._handleMessage(msg);
        });
        this.bot.on('left_chat_member', (msg) => {
            void this._handleMemberLeft(msg);
        });

        await this.bot.startPolling({
            restart: true,
            polling: {
                params: {
                    timeout: 10,
                },
            },
        });
        this.isPolling = true;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Service is online' });
    }

    async stop(): Promise<void> {
        if (!this.isPolling) return;
        await this.bot.stopPolling();
        this.isPolling = false;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Service stopped' });
    }

    /**
     * Each update runs in its own trace context
     */
    private async _handleMessage(msg: TelegramBot.Message): Promise<void> {
        const from = msg.from;
        const identity = this.identity;
        if (!from || from.is_bot || !identity) return;

        const userId = from.id.toString();
        const text = msg.text ?? msg.caption ?? '';

        await runWithTraceId(generateTraceId(), async () => {
            setUserId(userId);

            try {
                const command = parseCommand(text, identity.username);
                if (command) {
                    await this._handleCommand(msg, command);
                    return;
                }

                if (!isAddressedToBot(msg, identity)) return;
                await this._handlePrompt(msg, userId, stripMention(text, identity.username));
            } catch (error) {
                logger.error({
                    kind: 'sys',
                    component: COMPONENT,
                    message: 'Error handling message',
                    error,
                    meta: { chatId: msg.chat.id, messageId: msg.message_id },
                });
                await this.bot.sendMessage(msg.chat.id, UIHandler.getApologyText()).catch((sendError: unknown) => {
                    logger.warn({ kind: 'sys', component: COMPONENT, message: 'Failed to send apology', error: sendError });
                });
            }
        });
    }

    private async _handlePrompt(msg: TelegramBot.Message, userId: string, prompt: string): Promise<void> {
        if (msg.media_group_id) {
            await this._reply(msg, UIHandler.getSingleAttachmentText());
            return;
        }

        const attachment = pickAttachment(msg);
        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Message received',
            meta: { chatId: msg.chat.id, messageId: msg.message_id, promptLength: prompt.length, attachment: attachment?.contentType },
        });

        await this.bot.sendChatAction(msg.chat.id, 'typing');

        const startTime = Date.now();
        let result: Result<string, OrchestratorError>;
        if (attachment) {
            result = await this.orchestrator.sendWithAttachment(userId, prompt, {
                name: attachment.name,
                contentType: attachment.contentType,
                open: () => this.bot.getFileStream(attachment.fileId),
            });
        } else {
            result = await this.orchestrator.sendText(userId, prompt);
        }

        if (!result.ok) {
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Request rejected',
                meta: { kind: result.error.kind, reason: result.error.message },
            });
            await this._reply(msg, UIHandler.getErrorText(result.error));
            return;
        }

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Chat request completed',
            meta: { responseLength: result.value.length, runtime: Date.now() - startTime },
        });
        await this._reply(msg, result.value || '(empty reply)');
    }

    private async _handleCommand(msg: TelegramBot.Message, command: ParsedCommand): Promise<void> {
        const chatId = msg.chat.id;
        const username = msg.from?.username ?? '';
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Command received', meta: { command: command.name } });

        if (OWNER_COMMANDS.has(command.name) && !this._isOwner(username)) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Owner command refused', meta: { command: command.name, username } });
            return;
        }

        switch (command.name) {
            case 'start':
            case 'help': {
                const help = this._isOwner(username)
                    ? `${UIHandler.getHelpText()}\n\n${UIHandler.getOwnerHelpText()}`
                    : UIHandler.getHelpText();
                await this.bot.sendMessage(chatId, help);
                break;
            }

            case 'forget': {
                const removed = this.orchestrator.removeSession(msg.from?.id.toString() ?? '');
                await this._reply(msg, removed ? 'Your conversation has been cleared.' : 'There was no conversation to clear.');
                break;
            }

            case 'erase_chats': {
                const count = this.orchestrator.removeAllSessions();
                await this._reply(msg, `All chats have been erased (${count}).`);
                break;
            }

            case 'set_model': {
                if (!command.args) {
                    await this._reply(msg, 'Usage: /set_model <model name>');
                    break;
                }
                try {
                    this.orchestrator.setBackendModel(command.args);
                    await this._reply(msg, `New model set: ${command.args}`);
                } catch (error) {
                    logger.warn({ kind: 'biz', component: COMPONENT, message: 'Model switch failed', error, meta: { model: command.args } });
                    await this._reply(msg, `An error occurred: ${error instanceof Error ? error.message : String(error)}`);
                }
                break;
            }

            case 'set_owner': {
                const next = command.args.replace(/^@/, '');
                if (!next) {
                    await this._reply(msg, 'Usage: /set_owner <username>');
                    break;
                }
                this.owner = next;
                logger.info({ kind: 'biz', component: COMPONENT, message: 'Owner changed', meta: { owner: next } });
                await this._reply(msg, `Owner set to @${next}.`);
                break;
            }

            case 'stats':
                await this._reply(msg, UIHandler.getStatsText(this.orchestrator.getStats()));
                break;

            default:
                logger.debug({ kind: 'biz', component: COMPONENT, message: 'Unknown command', meta: { command: command.name } });
                break;
        }
    }

    private async _handleMemberLeft(msg: TelegramBot.Message): Promise<void> {
        const member = msg.left_chat_member;
        if (!member || member.is_bot) return;

        await runWithTraceId(generateTraceId(), async () => {
            const userId = member.id.toString();
            setUserId(userId);
            if (this.orchestrator.removeSession(userId)) {
                logger.info({ kind: 'biz', component: COMPONENT, message: 'Removed chat for member that left', meta: { chatId: msg.chat.id } });
            }
        });
    }

    private _isOwner(username: string): boolean {
        return Boolean(this.owner) && username.toLowerCase() === this.owner.toLowerCase();
    }

    private async _reply(msg: TelegramBot.Message, text: string): Promise<void> {
        for (const part of splitMessage(text)) {
            await this.bot.sendMessage(msg.chat.id, part, { reply_to_message_id: msg.message_id });
        }
    }
}

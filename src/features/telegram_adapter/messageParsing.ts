import type TelegramBot from 'node-telegram-bot-api';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export interface ParsedCommand {
    name: string;
    args: string;
}

export interface AttachmentRef {
    fileId: string;
    name: string;
    contentType: string;
}

export interface BotIdentity {
    id: number;
    username: string;
}

const COMMAND_REGEX = /^\/([a-z0-9_]+)(?:@([a-z0-9_]+))?(?:\s+([\s\S]*))?$/i;

/**
 * "/set_model@MyBot gemini-pro" → { name: 'set_model', args: 'gemini-pro' }.
 * Commands addressed to another bot yield null.
 */
export function parseCommand(text: string, botUsername: string): ParsedCommand | null {
    const match = COMMAND_REGEX.exec(text.trim());
    if (!match) return null;

    const [, name, target, args] = match;
    if (target && target.toLowerCase() !== botUsername.toLowerCase()) return null;

    return { name: name.toLowerCase(), args: (args ?? '').trim() };
}

export function stripMention(text: string, botUsername: string): string {
    const escaped = botUsername.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return text.replace(new RegExp(`@${escaped}\\b`, 'gi'), ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Private chats always reach the bot; in groups it must be mentioned or replied to.
 */
export function isAddressedToBot(msg: TelegramBot.Message, bot: BotIdentity): boolean {
    if (msg.chat.type === 'private') return true;
    if (msg.reply_to_message?.from?.id === bot.id) return true;

    const text = msg.text ?? msg.caption ?? '';
    return text.toLowerCase().includes(`@${bot.username.toLowerCase()}`);
}

/**
 * Photos arrive in several sizes; the last one is the largest.
 */
export function pickAttachment(msg: TelegramBot.Message): AttachmentRef | null {
    const photos = msg.photo;
    if (photos && photos.length > 0) {
        const largest = photos[photos.length - 1];
        return {
            fileId: largest.file_id,
            name: `photo_${largest.file_unique_id}.jpg`,
            contentType: 'image/jpeg',
        };
    }

    if (msg.document) {
        return {
            fileId: msg.document.file_id,
            name: msg.document.file_name ?? msg.document.file_unique_id,
            contentType: msg.document.mime_type ?? 'application/octet-stream',
        };
    }

    return null;
}

/**
 * Splits a reply into Telegram-sized messages, preferring line breaks.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
    const parts: string[] = [];
    let rest = text;

    while (rest.length > limit) {
        const newline = rest.lastIndexOf('\n', limit);
        const cut = newline > 0 ? newline : limit;
        parts.push(rest.slice(0, cut));
        rest = rest.slice(cut).replace(/^\n/, '');
    }
    if (rest.length > 0 || parts.length === 0) {
        parts.push(rest);
    }
    return parts;
}

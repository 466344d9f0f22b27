import type { OrchestratorError } from '../session/domain/OrchestratorError.js';
import type { OrchestratorStats } from '../session/usecases/SessionOrchestrator.js';

export class UIHandler {
    static getHelpText(): string {
        return [
            'Send me a message and I will answer with the current Gemini model.',
            'In groups, mention me or reply to one of my messages.',
            'Attach one image (JPEG or PNG) with a caption to ask about it.',
            '',
            '/forget - start a fresh conversation',
            '/help - show this message',
        ].join('\n');
    }

    static getOwnerHelpText(): string {
        return [
            '/erase_chats - erase every conversation',
            '/set_model <name> - switch the model for new conversations',
            '/set_owner <username> - hand over the owner commands',
            '/stats - usage and open conversations',
        ].join('\n');
    }

    /**
     * One user-facing line per failure kind
     */
    static getErrorText(error: OrchestratorError): string {
        switch (error.kind) {
            case 'QuotaExceeded':
                return 'I am done for the day. Come back later!';
            case 'InvalidPrompt':
                return error.reason === 'empty'
                    ? 'Your message is empty. Send me some text.'
                    : 'Your message is too long. Keep it under 1000 characters.';
            case 'UnsupportedFileType':
                return `That file type is not supported (${error.contentType}). Send a JPEG or PNG image.`;
            case 'FileProcessingFailure':
                return `I could not process that file. ${error.message}`;
            case 'BackendError':
                return `There was an exception. ${error.message}`;
        }
    }

    static getStatsText(stats: OrchestratorStats, now: Date = new Date()): string {
        const lines = [
            `Model: ${stats.modelName}`,
            `Requests today: ${stats.requestCount}/${stats.dailyLimit}`,
            `Open conversations: ${stats.sessions.length}`,
        ];
        for (const session of stats.sessions) {
            const last = session.lastActivityAt
                ? `${Math.floor((now.getTime() - session.lastActivityAt.getTime()) / 60_000)}m ago`
                : 'never';
            lines.push(`- ${session.userId}: ${session.turns} turns, last message ${last}, opened ${session.createdAt.toISOString()}`);
        }
        return lines.join('\n');
    }

    static getApologyText(): string {
        return 'Sorry, something went wrong on my side. Please try again later.';
    }

    static getSingleAttachmentText(): string {
        return 'Please send one attachment at a time.';
    }
}

/**
 * Failure kinds returned by the orchestration core.
 * None of them is thrown; each reaches the chat adapter as the error half of a Result.
 */

export interface QuotaExceeded {
    kind: 'QuotaExceeded';
    message: string;
    dailyLimit: number;
}

export interface InvalidPrompt {
    kind: 'InvalidPrompt';
    message: string;
    reason: 'empty' | 'too_long';
}

export interface UnsupportedFileType {
    kind: 'UnsupportedFileType';
    message: string;
    contentType: string;
}

export interface FileProcessingFailure {
    kind: 'FileProcessingFailure';
    message: string;
    contentType: string;
    cause?: unknown;
}

export interface BackendError {
    kind: 'BackendError';
    message: string;
    cause: unknown;
}

export type OrchestratorError =
    | QuotaExceeded
    | InvalidPrompt
    | UnsupportedFileType
    | FileProcessingFailure
    | BackendError;

export const quotaExceeded = (dailyLimit: number): QuotaExceeded => ({
    kind: 'QuotaExceeded',
    message: 'Daily limit has been reached.',
    dailyLimit,
});

export const invalidPrompt = (reason: InvalidPrompt['reason'], message: string): InvalidPrompt => ({
    kind: 'InvalidPrompt',
    message,
    reason,
});

export const unsupportedFileType = (contentType: string): UnsupportedFileType => ({
    kind: 'UnsupportedFileType',
    message: `That filetype is not supported: ${contentType}`,
    contentType,
});

export const fileProcessingFailure = (contentType: string, message: string, cause?: unknown): FileProcessingFailure => ({
    kind: 'FileProcessingFailure',
    message,
    contentType,
    cause,
});

export const backendError = (cause: unknown): BackendError => ({
    kind: 'BackendError',
    message: cause instanceof Error ? cause.message : String(cause),
    cause,
});

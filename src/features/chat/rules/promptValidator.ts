import { err, ok, type Result } from '../../../core/result.js';
import { invalidPrompt, type InvalidPrompt } from '../../session/domain/OrchestratorError.js';

/** Exclusive upper bound, counted in Unicode code points */
export const MAX_PROMPT_LENGTH = 1000;

export function promptLength(text: string): number {
    return [...text].length;
}

export function validatePrompt(text: string): Result<void, InvalidPrompt> {
    if (!text) {
        return err(invalidPrompt('empty', 'Prompt is empty.'));
    }
    if (promptLength(text) >= MAX_PROMPT_LENGTH) {
        return err(invalidPrompt('too_long', `Prompt must be shorter than ${MAX_PROMPT_LENGTH} characters.`));
    }
    return ok(undefined);
}

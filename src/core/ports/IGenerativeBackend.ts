import type { AttachmentFile } from '../../features/attachments/domain/AttachmentFile.js';

/**
 * Port: the generative model, seen as an opaque remote capability.
 * `H` is the conversation handle returned by startSession.
 */
export interface IGenerativeBackend<H> {
    readonly modelName: string;

    /** Later sessions use the new model; open ones keep theirs */
    setModel(modelName: string): void;

    startSession(): H;

    /** Sends one turn through the conversation; the handle keeps the history */
    send(handle: H, text: string): Promise<string>;

    /** Stateless single-turn call with one attachment */
    generateOnce(attachment: AttachmentFile, text: string): Promise<string>;

    /** Completed turns sent through the handle, for stats and logs */
    turnCount(handle: H): number;
}

import type { Readable } from 'stream';

/**
 * Inbound attachment as handed over by the chat adapter.
 * Nothing is downloaded until the classifier calls `open`.
 */
export interface AttachmentSource {
    name: string;
    contentType: string;
    open(): Readable;
}

export interface DecodedImage {
    format: string;
    width: number;
    height: number;
}

/**
 * Attachment admitted by the classifier, fully read into memory.
 */
export interface AttachmentFile {
    name: string;
    contentType: string;
    data: Buffer;
    image: DecodedImage;
}

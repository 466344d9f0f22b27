import sharp from 'sharp';
import type { Readable } from 'stream';
import { err, ok, type Result } from '../../core/result.js';
import { logger } from '../../platform/logger.js';
import {
    fileProcessingFailure,
    unsupportedFileType,
    type FileProcessingFailure,
    type UnsupportedFileType,
} from '../session/domain/OrchestratorError.js';
import { IMAGE_FORMATS, IMAGE_TYPES, isAllowedFileType, normalizeContentType } from './allowedFileTypes.js';
import type { AttachmentFile, AttachmentSource, DecodedImage } from './domain/AttachmentFile.js';

const COMPONENT = 'AttachmentClassifier';

/** Telegram's Bot API refuses downloads above 20 MB anyway */
export const DEFAULT_MAX_ATTACHMENT_BYTES = 20 * 1024 * 1024;

export type ClassifyError = UnsupportedFileType | FileProcessingFailure;

class AttachmentTooLargeError extends Error {
    constructor(maxBytes: number) {
        super(`File is larger than ${maxBytes} bytes.`);
        this.name = 'AttachmentTooLargeError';
    }
}

async function readAll(content: Readable, maxBytes: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let totalSize = 0;
    for await (const chunk of content) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        totalSize += buffer.length;
        if (totalSize > maxBytes) {
            throw new AttachmentTooLargeError(maxBytes);
        }
        chunks.push(buffer);
    }
    return Buffer.concat(chunks);
}

async function decodeImage(data: Buffer): Promise<DecodedImage> {
    const metadata = await sharp(data).metadata();
    if (!metadata.format || !metadata.width || !metadata.height) {
        throw new Error('Image has no readable dimensions.');
    }
    if (!IMAGE_FORMATS.has(metadata.format)) {
        throw new Error(`Image format ${metadata.format} is not supported.`);
    }
    return { format: metadata.format, width: metadata.width, height: metadata.height };
}

/**
 * Gate for inbound attachments.
 *
 * Only images have a decoder. Other allow-listed types are admitted by type
 * and then fail closed until one exists. The source is opened only after
 * both checks pass, and is destroyed once read.
 */
export class AttachmentClassifier {
    constructor(private readonly maxBytes: number = DEFAULT_MAX_ATTACHMENT_BYTES) {}

    async classify(source: AttachmentSource): Promise<Result<AttachmentFile, ClassifyError>> {
        const contentType = normalizeContentType(source.contentType);

        if (!isAllowedFileType(contentType)) {
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Attachment rejected by type',
                meta: { name: source.name, contentType },
            });
            return err(unsupportedFileType(contentType));
        }

        if (!IMAGE_TYPES.has(contentType)) {
            return err(fileProcessingFailure(contentType, `No decoder is available for ${contentType} yet.`));
        }

        let content: Readable | null = null;
        try {
            content = source.open();
            // the download may still fail after we stop reading
            content.on('error', (error: Error) => {
                logger.debug({ kind: 'sys', component: COMPONENT, message: 'Attachment stream error', error, meta: { name: source.name } });
            });
            const data = await readAll(content, this.maxBytes);
            const image = await decodeImage(data);
            logger.debug({
                kind: 'biz',
                component: COMPONENT,
                message: 'Image decoded',
                meta: { name: source.name, contentType, bytes: data.length, ...image },
            });
            return ok({ name: source.name, contentType, data, image });
        } catch (error) {
            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Attachment could not be processed',
                error,
                meta: { name: source.name, contentType },
            });
            const message = error instanceof Error ? error.message : String(error);
            return err(fileProcessingFailure(contentType, message, error));
        } finally {
            content?.destroy();
        }
    }
}

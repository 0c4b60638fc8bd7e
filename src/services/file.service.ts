import { getEnv } from '../config/env.ts';
import { t } from '../i18n/index.ts';
import { ServiceError, ValidationError } from '../utils/errors.ts';
import type { TelegramApi } from './telegram.service.ts';

export const ALLOWED_IMAGE_TYPES: ReadonlySet<string> = new Set(['image/jpeg', 'image/png', 'image/gif', 'image/webp']);
export const ALLOWED_AUDIO_TYPES: ReadonlySet<string> = new Set(['audio/ogg', 'audio/mpeg', 'audio/wav', 'audio/m4a']);

const MIME_ALIASES: Record<string, string> = {
  'image/jpg': 'image/jpeg',
  'audio/mp3': 'audio/mpeg',
  'audio/x-wav': 'audio/wav',
  'audio/wave': 'audio/wav',
  'audio/x-m4a': 'audio/m4a',
  'audio/mp4': 'audio/m4a',
  'audio/opus': 'audio/ogg',
};

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

function ascii(text: string): number[] {
  return Array.from(text, ch => ch.charCodeAt(0));
}

/**
 * Detect the MIME type from the first bytes of a file.
 */
export function detectMimeType(bytes: Uint8Array): string | null {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47])) return 'image/png';
  if (startsWith(bytes, ascii('GIF8'))) return 'image/gif';
  if (startsWith(bytes, ascii('RIFF')) && startsWith(bytes, ascii('WEBP'), 8)) return 'image/webp';
  if (startsWith(bytes, ascii('RIFF')) && startsWith(bytes, ascii('WAVE'), 8)) return 'audio/wav';
  if (startsWith(bytes, ascii('OggS'))) return 'audio/ogg';
  if (startsWith(bytes, ascii('ID3'))) return 'audio/mpeg';
  if (startsWith(bytes, [0xff, 0xfb]) || startsWith(bytes, [0xff, 0xf3]) || startsWith(bytes, [0xff, 0xf2])) {
    return 'audio/mpeg';
  }
  if (startsWith(bytes, ascii('ftyp'), 4) && startsWith(bytes, ascii('M4A'), 8)) return 'audio/m4a';
  return null;
}

export function normalizeMimeType(mimeType: string | undefined): string | null {
  if (!mimeType) return null;
  const base = mimeType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (!base) return null;
  return MIME_ALIASES[base] ?? base;
}

function maxSizeMb(maxSize: number): number {
  return Math.floor(maxSize / 1024 / 1024);
}

/**
 * Check size and type of downloaded bytes. Returns the MIME type to use.
 */
export function validateFile(
  bytes: Uint8Array,
  allowedTypes: ReadonlySet<string>,
  maxSize: number,
  declaredMimeType?: string
): string {
  if (bytes.byteLength > maxSize) {
    console.warn(`[FileService] File size ${bytes.byteLength} exceeds ${maxSize}`);
    throw new ValidationError(t('ui.errors.fileTooLarge', { mb: maxSizeMb(maxSize) }));
  }

  const mimeType = detectMimeType(bytes) ?? normalizeMimeType(declaredMimeType);
  if (!mimeType || !allowedTypes.has(mimeType)) {
    console.warn(`[FileService] Rejected MIME type ${mimeType ?? 'unknown'}`);
    throw new ValidationError(t('ui.errors.invalidFileType'));
  }

  return mimeType;
}

export interface FileSource {
  getFileBytes(fileId: string, signal?: AbortSignal): Promise<Uint8Array>;
}

interface FileServiceConfig {
  maxFileSize: number;
}

/**
 * Downloads Telegram files into memory.
 */
export class FileService implements FileSource {
  private telegram: Pick<TelegramApi, 'getFile' | 'downloadFile'>;
  private config: FileServiceConfig;

  constructor(telegram: Pick<TelegramApi, 'getFile' | 'downloadFile'>, config: Partial<FileServiceConfig> = {}) {
    this.telegram = telegram;
    this.config = {
      maxFileSize: getEnv().MAX_FILE_SIZE,
      ...config,
    };
  }

  async getFileBytes(fileId: string, signal?: AbortSignal): Promise<Uint8Array> {
    const file = await this.telegram.getFile(fileId);

    // Reject before downloading when Telegram already knows the size
    if (file.file_size !== undefined && file.file_size > this.config.maxFileSize) {
      throw new ValidationError(t('ui.errors.fileTooLarge', { mb: maxSizeMb(this.config.maxFileSize) }));
    }
    if (!file.file_path) {
      throw new ServiceError('telegram', 'File has no download path', { retryable: false });
    }

    const buffer = await this.telegram.downloadFile(file.file_path, signal);
    console.log(`[FileService] Downloaded ${buffer.byteLength} bytes`);
    return new Uint8Array(buffer);
  }
}

/**
 * Turns receipt inputs into raw receipt JSON text. Implementations throw
 * ServiceError, MalformedOutputError or OperationCancelledError.
 */
export interface ReceiptExtractor {
  extractFromImage(image: Uint8Array, mimeType: string, caption?: string, signal?: AbortSignal): Promise<string>;
  extractFromText(text: string, signal?: AbortSignal): Promise<string>;
  applyComment(originalJson: string, comment: string, signal?: AbortSignal): Promise<string>;
}

export interface Transcriber {
  transcribe(audio: Uint8Array, mimeType: string, signal?: AbortSignal): Promise<string>;
}

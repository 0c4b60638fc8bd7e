import { z } from 'zod';
import { getEnv } from '../config/env.ts';
import { OperationCancelledError, ServiceError, errorMessage, throwIfAborted } from '../utils/errors.ts';
import { redactSecrets } from '../utils/redact.ts';
import type { Transcriber } from '../types/ai.types.ts';

const GROQ_TRANSCRIPTION_URL = 'https://api.groq.com/openai/v1/audio/transcriptions';

interface WhisperConfig {
  apiKey: string;
  model: string;
  // Empty lets Whisper detect the language
  language: string;
  timeoutMs: number;
}

const transcriptionSchema = z.object({ text: z.string() });

const FILE_EXTENSIONS: Record<string, string> = {
  'audio/ogg': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/wav': 'wav',
  'audio/m4a': 'm4a',
};

export class WhisperService implements Transcriber {
  private config: WhisperConfig;

  constructor(config: Partial<WhisperConfig> = {}) {
    const env = getEnv();
    this.config = {
      apiKey: env.GROQ_API_KEY ?? '',
      model: 'whisper-large-v3-turbo',
      language: '',
      timeoutMs: env.AI_TIMEOUT_MS,
      ...config,
    };
  }

  async transcribe(audio: Uint8Array, mimeType: string = 'audio/ogg', signal?: AbortSignal): Promise<string> {
    if (!this.config.apiKey) {
      throw new ServiceError('groq', 'Groq API key not configured', { retryable: false });
    }
    throwIfAborted(signal);

    const formData = new FormData();
    const blob = new Blob([audio], { type: mimeType });
    formData.append('file', blob, `audio.${FILE_EXTENSIONS[mimeType] ?? 'ogg'}`);
    formData.append('model', this.config.model);
    if (this.config.language) {
      formData.append('language', this.config.language);
    }
    formData.append('response_format', 'json');
    formData.append('temperature', '0.0');

    console.log(`[WhisperService] Transcribing audio (${audio.byteLength} bytes)`);

    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    let response: Response;
    try {
      response = await fetch(GROQ_TRANSCRIPTION_URL, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.config.apiKey}`,
        },
        body: formData,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Transcription cancelled', { cause: error });
      }
      throw new ServiceError('groq', redactSecrets(errorMessage(error)), { cause: error });
    }

    if (!response.ok) {
      const error = await response.text();
      throw new ServiceError('groq', `Groq Whisper API error: ${response.status} - ${redactSecrets(error.slice(0, 300))}`, {
        status: response.status,
      });
    }

    const parsed = transcriptionSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new ServiceError('groq', 'Unexpected transcription response', { retryable: false });
    }

    const text = parsed.data.text.trim();
    console.log(`[WhisperService] Transcribed ${text.length} characters`);
    return text;
  }
}

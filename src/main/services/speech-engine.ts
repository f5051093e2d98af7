/**
 * Speech engines for pronunciation playback.
 * HttpSpeechEngine posts to a TTS server: POST {baseUrl}/api/tts, which
 * answers { success, error? }.
 */
import { z } from 'zod';
import type { SpeechEngine, TTSRequest, TTSResponse } from '../../shared/types/pronunciation.types';
import { TTS_SETTINGS } from '../../shared/constants';
import { createLogger } from '../utils/logger';

const log = createLogger('SpeechEngine');

const TTSResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
});

export interface HttpSpeechEngineOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class HttpSpeechEngine implements SpeechEngine {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private controller: AbortController | null = null;

  constructor(options: HttpSpeechEngineOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? TTS_SETTINGS.TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async speak(request: TTSRequest): Promise<TTSResponse> {
    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tts`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          success: false,
          error: `Server error: ${response.status}`,
        };
      }

      const body = TTSResponseSchema.safeParse(await response.json());
      if (!body.success) {
        return {
          success: false,
          error: 'Invalid response from TTS server',
        };
      }

      return body.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      log.error('TTS error:', message);
      return {
        success: false,
        error: message,
      };
    } finally {
      clearTimeout(timer);
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    this.controller = null;
  }
}

/**
 * Used when no TTS server is configured.
 */
export class SilentSpeechEngine implements SpeechEngine {
  async speak(request: TTSRequest): Promise<TTSResponse> {
    log.debug(`No TTS server configured, skipping "${request.text}" (${request.language})`);
    return { success: true };
  }

  async stop(): Promise<void> {}
}

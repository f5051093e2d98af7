/**
 * Text-to-speech types.
 */

export interface TTSRequest {
  text: string;
  language: string; // 'en-US' | 'en-GB'
}

export interface TTSResponse {
  success: boolean;
  error?: string;
}

// Something that can say a piece of text aloud
export interface SpeechEngine {
  speak(request: TTSRequest): Promise<TTSResponse>;
  stop(): Promise<void>;
}

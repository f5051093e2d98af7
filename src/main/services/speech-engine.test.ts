import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HttpSpeechEngine, SilentSpeechEngine } from './speech-engine';

function hangingFetch() {
  return vi.fn<typeof fetch>((_input, init) => new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  }));
}

describe('HttpSpeechEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('posts the request to the TTS endpoint', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(Response.json({ success: true }));
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000/', fetch: fetchMock });

    expect(await engine.speak({ text: 'went', language: 'en-US' })).toEqual({ success: true });
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:5000/api/tts', expect.objectContaining({
      method: 'POST',
      body: '{"text":"went","language":"en-US"}',
    }));
  });

  it('reports a non-OK status', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 500 }));
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000', fetch: fetchMock });

    expect(await engine.speak({ text: 'went', language: 'en-US' })).toEqual({
      success: false,
      error: 'Server error: 500',
    });
  });

  it('passes on a failure the server reports with status 200', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      Response.json({ success: false, error: 'Model not loaded' })
    );
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000', fetch: fetchMock });

    expect(await engine.speak({ text: 'went', language: 'en-US' })).toEqual({
      success: false,
      error: 'Model not loaded',
    });
  });

  it('rejects a reply body of the wrong shape', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(Response.json({ ok: 'yes' }));
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000', fetch: fetchMock });

    expect(await engine.speak({ text: 'went', language: 'en-US' })).toEqual({
      success: false,
      error: 'Invalid response from TTS server',
    });
  });

  it('reports a network error', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000', fetch: fetchMock });

    expect(await engine.speak({ text: 'went', language: 'en-US' })).toEqual({
      success: false,
      error: 'connect ECONNREFUSED',
    });
  });

  it('aborts a request that exceeds the timeout', async () => {
    vi.useFakeTimers();
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000', timeoutMs: 50, fetch: hangingFetch() });

    const pending = engine.speak({ text: 'went', language: 'en-US' });
    await vi.advanceTimersByTimeAsync(50);

    expect(await pending).toEqual({ success: false, error: 'The operation was aborted' });
  });

  it('aborts the request in flight on stop', async () => {
    const engine = new HttpSpeechEngine({ baseUrl: 'http://localhost:5000', fetch: hangingFetch() });

    const pending = engine.speak({ text: 'went', language: 'en-US' });
    await engine.stop();

    expect(await pending).toEqual({ success: false, error: 'The operation was aborted' });
  });
});

describe('SilentSpeechEngine', () => {
  it('succeeds without doing anything', async () => {
    const engine = new SilentSpeechEngine();

    expect(await engine.speak({ text: 'went', language: 'en-US' })).toEqual({ success: true });
    await expect(engine.stop()).resolves.toBeUndefined();
  });
});

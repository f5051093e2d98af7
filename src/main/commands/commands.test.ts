import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { createProgram } from './index';
import { createApp, type App } from '../../app';
import { configFromEnv } from '../config';
import { loadSeedVerbs } from '../../database/seed';
import type { SpeechEngine, TTSRequest, TTSResponse } from '../../shared/types';

describe('CLI commands', () => {
  let app: App;
  let output: string[];
  let errors: string[];
  let speak: Mock<(request: TTSRequest) => Promise<TTSResponse>>;

  const run = async (...args: string[]) => {
    const program = createProgram({
      // One in-memory store shared across commands; closed in afterEach
      createApp: () => ({ ...app, close: async () => undefined }),
      print: (line) => output.push(line),
      printError: (line) => errors.push(line),
    });
    await program.parseAsync(args, { from: 'user' });
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    speak = vi.fn<(request: TTSRequest) => Promise<TTSResponse>>().mockResolvedValue({ success: true });
    const engine: SpeechEngine = { speak, stop: async () => undefined };
    app = createApp(configFromEnv({ VERBS_DB_PATH: ':memory:' }), { speechEngine: engine });
    output = [];
    errors = [];
  });

  afterEach(async () => {
    await app.close();
    process.exitCode = undefined;
  });

  it('counts the bundled verbs', async () => {
    await run('count');

    expect(output).toEqual([String(loadSeedVerbs().length)]);
  });

  it('lists search results with the exact match first', async () => {
    await run('search', 'go');

    expect(output[0]).toBe('go - went - gone  (go)');
  });

  it('says when nothing matches', async () => {
    await run('search', 'zzzz');

    expect(output).toEqual(['No verbs match "zzzz"']);
  });

  it('shows forms for the saved dialect', async () => {
    await run('prefs', 'set-dialect', 'en-UK');
    output = [];

    await run('search', 'get');

    expect(output[0]).toBe('get - got - got  (get)');
  });

  it('shows a verb with its dialect variants', async () => {
    await run('show', 'get');

    expect(output.slice(0, 4)).toEqual([
      'get - got - gotten [US]',
      '  UK: got - got',
      '  US: got - gotten',
      '  /ɡet/',
    ]);
  });

  it('reports an unknown verb', async () => {
    await run('show', 'missing');

    expect(errors).toEqual(['Verb not found: missing']);
    expect(process.exitCode).toBe(1);
  });

  it('speaks a form in the requested dialect', async () => {
    await run('say', 'get', 'participle', '-d', 'en-UK');

    expect(speak).toHaveBeenCalledWith({ text: 'got', language: 'en-GB' });
    expect(output).toEqual(['Speaking "got" (en-UK)']);
  });

  it('reports an invalid tense', async () => {
    await run('say', 'get', 'future');

    expect(errors).toEqual(['Error: Invalid tense "future". Must be base, past or participle']);
    expect(process.exitCode).toBe(1);
  });

  it('updates and resets preferences', async () => {
    await run('prefs', 'dark-mode', 'on');
    expect(output).toEqual(['dialect: en-US', 'dark mode: on', 'premium: no']);

    output = [];
    await run('prefs', 'reset');
    expect(output).toEqual(['dialect: en-US', 'dark mode: off', 'premium: no']);
  });

  it('rejects an unknown dark-mode state', async () => {
    await run('prefs', 'dark-mode', 'maybe');

    expect(errors).toEqual(['Expected "on" or "off", got "maybe"']);
    expect(output).toEqual([]);
  });

  it('rejects an unknown dialect', async () => {
    await run('prefs', 'set-dialect', 'en-AU');

    expect(errors).toEqual(['Error: Invalid dialect "en-AU". Must be en-US or en-UK']);
  });
});

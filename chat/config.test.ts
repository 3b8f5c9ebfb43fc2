import { describe, expect, it } from 'vitest';
import { DEFAULTS, loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

const ENV = {
  OPENAI_API_ENDPOINT: 'https://example-resource.openai.azure.com',
  OPENAI_API_KEY: 'test-key',
};

function configOf(argv: string[], env: NodeJS.ProcessEnv) {
  const loaded = loadConfig(argv, env);
  if (loaded.help) throw new Error('unexpected help');
  return loaded.config;
}

describe('loadConfig', () => {
  it('applies defaults for everything but endpoint and key', () => {
    expect(configOf([], ENV)).toEqual({
      endpoint: 'https://example-resource.openai.azure.com',
      apiKey: 'test-key',
      model: DEFAULTS.MODEL,
      apiVersion: DEFAULTS.API_VERSION,
      flavor: 'azure',
      stream: true,
      systemPrompt: 'You are a helpful assistant.',
      maxTokens: 1000,
      temperature: 0.7,
      connectTimeoutMs: 30000,
      readTimeoutMs: 60000,
      logLevel: 'warn',
    });
  });

  it('requires an endpoint', () => {
    expect(() => loadConfig([], { OPENAI_API_KEY: 'test-key' })).toThrow(
      new ConfigurationError(
        'Chat endpoint is required. Provide it via --endpoint argument or OPENAI_API_ENDPOINT environment variable',
      ),
    );
  });

  it('requires an API key, treating a blank variable as missing', () => {
    expect(() => loadConfig([], { ...ENV, OPENAI_API_KEY: '  ' })).toThrow(
      'API key is required. Provide it via --api-key argument or OPENAI_API_KEY environment variable',
    );
  });

  it('lets flags override environment variables', () => {
    const config = configOf(
      [
        '-e',
        'https://flag.example/v1',
        '--model',
        'gpt-4o-mini',
        '--provider',
        'openai',
        '--no-stream',
        '--max-tokens',
        '256',
        '--temperature',
        '0',
        '--system',
        'Be brief.',
      ],
      { ...ENV, OPENAI_API_MODEL: 'env-model', CHAT_STREAM: 'true' },
    );
    expect(config.endpoint).toBe('https://flag.example/v1');
    expect(config.model).toBe('gpt-4o-mini');
    expect(config.flavor).toBe('openai');
    expect(config.stream).toBe(false);
    expect(config.maxTokens).toBe(256);
    expect(config.temperature).toBe(0);
    expect(config.systemPrompt).toBe('Be brief.');
  });

  it('reads the streaming toggle from the environment', () => {
    expect(configOf([], { ...ENV, CHAT_STREAM: 'off' }).stream).toBe(false);
    expect(configOf(['--stream'], { ...ENV, CHAT_STREAM: 'false' }).stream).toBe(true);
    expect(() => loadConfig([], { ...ENV, CHAT_STREAM: 'maybe' })).toThrow('(--stream/--no-stream / CHAT_STREAM)');
  });

  it('names the offending setting', () => {
    expect(() => loadConfig(['--temperature', '3'], ENV)).toThrow(
      'Invalid configuration (--temperature / CHAT_TEMPERATURE): Number must be less than or equal to 2',
    );
    expect(() => loadConfig([], { ...ENV, CHAT_PROVIDER: 'bedrock' })).toThrow('(--provider / CHAT_PROVIDER)');
    expect(() => loadConfig(['--endpoint', 'ftp://example.com'], ENV)).toThrow(
      'Invalid configuration (--endpoint / OPENAI_API_ENDPOINT): endpoint must use http or https',
    );
  });

  it('always keeps a system prompt', () => {
    expect(() => loadConfig(['--system', ''], ENV)).toThrow(
      'Invalid configuration (--system / CHAT_SYSTEM_PROMPT): must not be empty',
    );
    expect(configOf([], { ...ENV, CHAT_SYSTEM_PROMPT: ' ' }).systemPrompt).toBe('You are a helpful assistant.');
  });

  it('rejects unknown flags', () => {
    expect(() => loadConfig(['--bogus'], ENV)).toThrow(ConfigurationError);
  });

  it('returns help without validating', () => {
    expect(loadConfig(['--help'], {})).toEqual({ help: true });
    expect(loadConfig(['-h'], {})).toEqual({ help: true });
  });
});

import { describe, expect, test, vi } from 'vitest';
import type { ProviderConfig } from '../../config/providers';
import { type AnalysisProvider, type GenerationResult, ProviderClient } from '../../services/providers';
import { MalformedResponseError, NoApiKeyError, NoNetworkError, ProviderError } from '../../utils/errors';
import { localConfig } from '../helpers/fixtures';

const geminiConfig: ProviderConfig = {
  kind: 'gemini',
  apiKey: 'test-secret',
  model: 'gemini-test',
  timeoutMs: 1000,
};

function setup(result: GenerationResult | Error, options: { online?: boolean; requiresApiKey?: boolean } = {}) {
  const generate = vi.fn<AnalysisProvider['generate']>();
  if (result instanceof Error) generate.mockRejectedValue(result);
  else generate.mockResolvedValue(result);

  const provider: AnalysisProvider = {
    name: 'gemini',
    requiresApiKey: options.requiresApiKey ?? true,
    generate,
  };
  const checkConnectivity = vi.fn(async () => options.online ?? true);
  const client = new ProviderClient({ resolveProvider: () => provider, checkConnectivity });

  return { client, generate, checkConnectivity };
}

describe('ProviderClient.analyze', () => {
  test('parses and normalizes the reply', async () => {
    const { client } = setup({
      status: 'ok',
      text: '```json\n{"characters": [{"name": "Ann", "role": "Hero"}], "themes": ["War"]}\n```',
    });

    const extraction = await client.analyze('prompt', geminiConfig);

    expect(extraction.characters?.map((c) => [c.name, c.role])).toEqual([['Ann', 'Hero']]);
    expect(extraction.themes).toEqual(['War']);
  });

  test('a safety block yields an empty extraction', async () => {
    const { client } = setup({ status: 'blocked', reason: 'prompt blocked: SAFETY' });

    await expect(client.analyze('prompt', geminiConfig)).resolves.toEqual({});
  });

  test('a malformed reply is an error and the request is not repeated', async () => {
    const { client, generate } = setup({ status: 'ok', text: 'Sorry, no.' });

    await expect(client.analyze('prompt', geminiConfig)).rejects.toBeInstanceOf(MalformedResponseError);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  test('a missing API key fails before any network activity', async () => {
    const { client, generate, checkConnectivity } = setup({ status: 'ok', text: '{}' });

    await expect(client.analyze('prompt', { ...geminiConfig, apiKey: undefined })).rejects.toBeInstanceOf(
      NoApiKeyError,
    );
    expect(checkConnectivity).not.toHaveBeenCalled();
    expect(generate).not.toHaveBeenCalled();
  });

  test('no connectivity fails without calling the provider', async () => {
    const { client, generate } = setup({ status: 'ok', text: '{}' }, { online: false });

    await expect(client.analyze('prompt', geminiConfig)).rejects.toBeInstanceOf(NoNetworkError);
    expect(generate).not.toHaveBeenCalled();
  });

  test('local endpoints skip the connectivity check', async () => {
    const { client, checkConnectivity } = setup(
      { status: 'ok', text: '{}' },
      { online: false, requiresApiKey: false },
    );

    await expect(client.analyze('prompt', localConfig)).resolves.toEqual({});
    expect(checkConnectivity).not.toHaveBeenCalled();
  });

  test('provider errors propagate', async () => {
    const { client } = setup(new ProviderError(500));

    await expect(client.analyze('prompt', geminiConfig)).rejects.toMatchObject({ code: 500 });
  });
});

describe('ProviderClient.verify', () => {
  test('reports success', async () => {
    const { client } = setup({ status: 'ok', text: '{"status": "ok"}' });

    await expect(client.verify(geminiConfig)).resolves.toEqual({
      ok: true,
      message: 'gemini (gemini-test) is working',
    });
  });

  test('reports failure without throwing', async () => {
    const { client } = setup({ status: 'ok', text: '{}' });

    await expect(client.verify({ ...geminiConfig, apiKey: undefined })).resolves.toEqual({
      ok: false,
      message: 'No API key configured for provider "gemini"',
    });
  });
});

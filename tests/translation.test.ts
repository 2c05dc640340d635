import { describe, it, expect } from 'vitest';
import { buildGlossaryPrompt, TRANSLATION_SYSTEM_PROMPT, Translator } from '../src/services/translation.js';
import { AdviceService, ADVICE_SYSTEM_PROMPT } from '../src/services/advice.js';
import { GlossaryService } from '../src/services/glossary.js';
import { parseGlossaryCsv } from '../src/services/glossaryLoader.js';
import { ExactMatchScorer } from '../src/services/similarity.js';
import { ConfigurationError } from '../src/services/errors.js';
import { FakeChatClient, SAMPLE_CSV } from './fakes.js';

const entries = parseGlossaryCsv(SAMPLE_CSV);
const [abdomen, absorb] = entries;

function createGlossary(): GlossaryService {
  return new GlossaryService({ scorer: new ExactMatchScorer(), loadEntries: () => entries });
}

describe('buildGlossaryPrompt', () => {
  it('lists Setswana forms with variants for Setswana sources', () => {
    expect(buildGlossaryPrompt([absorb], 'tsn', 'en')).toBe(
      'Use this Setswana → English glossary for domain terms:\n- gapa (gabisa, gapa godimo) → absorb'
    );
  });

  it('lists English labels for English sources', () => {
    expect(buildGlossaryPrompt([abdomen, absorb], 'en', 'tsn')).toBe(
      'Use this English → Setswana glossary for domain terms:\n- abdomen → mpa\n- absorb → gapa'
    );
  });

  it('is empty without entries', () => {
    expect(buildGlossaryPrompt([], 'tsn', 'en')).toBe('');
  });
});

describe('Translator', () => {
  it('sends the glossary hints with a Setswana message', async () => {
    const client = new FakeChatClient(['  The abdomen hurts. ']);
    const translator = new Translator(client, createGlossary(), 'test-model');

    const result = await translator.translate('Mpa e a opa', 'tsn', 'en');

    expect(result).toBe('The abdomen hurts.');
    expect(client.requests).toHaveLength(1);

    const [request] = client.requests;
    expect(request.model).toBe('test-model');
    expect(request.temperature).toBe(0);
    expect(request.maxTokens).toBe(256);
    expect(request.messages[1]).toEqual({ role: 'user', content: 'Mpa e a opa' });

    const system = request.messages[0];
    expect(system.role).toBe('system');
    expect(system.content?.startsWith(TRANSLATION_SYSTEM_PROMPT)).toBe(true);
    expect(system.content?.endsWith(
      '\n\nUse this Setswana → English glossary for domain terms:\n- mpa → abdomen'
    )).toBe(true);
  });

  it('sends English hints when translating into Setswana', async () => {
    const client = new FakeChatClient(['mpa']);
    const translator = new Translator(client, createGlossary(), 'test-model');

    await translator.translate('abdomen', 'en', 'tsn');

    const system = client.requests[0].messages[0].content ?? '';
    expect(system).toContain('Translate from English into Setswana');
    expect(system.endsWith('\n\nUse this English → Setswana glossary for domain terms:\n- abdomen → mpa')).toBe(true);
  });

  it('leaves out the glossary block when nothing matches', () => {
    const translator = new Translator(new FakeChatClient(), createGlossary(), 'test-model');
    const system = translator.systemPrompt('hello world', 'en', 'tsn');

    expect(system).not.toContain('glossary for domain terms');
    expect(system.startsWith(TRANSLATION_SYSTEM_PROMPT)).toBe(true);
  });

  it('returns the text unchanged for the same language', async () => {
    const client = new FakeChatClient();
    const translator = new Translator(client, createGlossary(), 'test-model');

    expect(await translator.translate('Mpa', 'tsn', 'tsn')).toBe('Mpa');
    expect(client.requests).toHaveLength(0);
  });

  it('rejects unsupported directions', async () => {
    const client = new FakeChatClient();
    const translator = new Translator(client, createGlossary(), 'test-model');

    await expect(translator.translate('Bonjour', 'fr', 'en')).rejects.toThrow(ConfigurationError);
    await expect(translator.translate('Hello', 'en', 'fr')).rejects.toThrow(
      'Unsupported translation direction: en -> fr'
    );
    expect(client.requests).toHaveLength(0);
  });

  it('returns an empty string when the model sends no content', async () => {
    const client = new FakeChatClient([{ role: 'assistant', content: null }]);
    const translator = new Translator(client, createGlossary(), 'test-model');

    expect(await translator.translate('Mpa', 'tsn', 'en')).toBe('');
  });

  it('works without a glossary', async () => {
    const glossary = new GlossaryService({ scorer: new ExactMatchScorer(), loadEntries: () => [] });
    const client = new FakeChatClient(['dummy translation']);
    const translator = new Translator(client, glossary, 'test-model');

    expect(await translator.translate('Mpa', 'tsn', 'en')).toBe('dummy translation');
    expect(client.requests[0].messages[0].content).not.toContain('glossary');
  });
});

describe('AdviceService', () => {
  it('asks for short advice in English', async () => {
    const client = new FakeChatClient(['Plant after the first rains. ']);
    const advice = new AdviceService(client, 'advice-model');

    expect(await advice.ask('When should I plant maize?')).toBe('Plant after the first rains.');

    const [request] = client.requests;
    expect(request.model).toBe('advice-model');
    expect(request.temperature).toBe(0.2);
    expect(request.messages).toEqual([
      { role: 'system', content: ADVICE_SYSTEM_PROMPT },
      { role: 'user', content: 'When should I plant maize?' },
    ]);
  });
});

import { ConfigurationError } from './errors.js';
import type { ChatClient } from './ai.js';
import type { GlossaryService } from './glossary.js';
import type { GlossaryEntry, LangCode } from '../types/index.js';

export const TRANSLATION_SYSTEM_PROMPT =
  'You are a professional translator specialising in agricultural communication ' +
  'between English and Setswana (South African Tswana). ' +
  'Translate the user\'s message accurately and faithfully, without adding, removing, ' +
  'or interpreting information. Maintain the user\'s tone and level of formality. ' +
  'Use natural, rural Setswana phrasing where appropriate. ' +
  'If a term is ambiguous, choose the most practical farming-related meaning based on context. ' +
  'If you are uncertain, provide your best direct translation without explanation.';

const DIRECTION_INSTRUCTIONS: Record<`${LangCode}->${LangCode}`, string> = {
  'tsn->en':
    'Translate from Setswana (South African Tswana) into English. ' +
    'Do not add explanations, just translate.',
  'en->tsn':
    'Translate from English into Setswana (South African Tswana). ' +
    'Keep it natural and easy for rural farmers to understand. ' +
    'Do not add explanations, just translate.',
  // Same-language pairs never reach the model
  'tsn->tsn': '',
  'en->en': '',
};

const LANGUAGE_NAMES: Record<LangCode, string> = {
  en: 'English',
  tsn: 'Setswana',
};

function formatEntry(entry: GlossaryEntry, source: LangCode): string {
  if (source === 'tsn') {
    const variants = entry.setswanaVariants.length > 0
      ? ` (${entry.setswanaVariants.join(', ')})`
      : '';
    return `- ${entry.setswanaPreferred}${variants} → ${entry.englishLabel}`;
  }
  return `- ${entry.englishLabel} → ${entry.setswanaPreferred}`;
}

/**
 * Glossary block appended to the translation system prompt.
 * Empty string when there is nothing to inject.
 *
 * @example
 * Use this Setswana → English glossary for domain terms:
 * - gapa (gabisa, gapa godimo) → absorb
 */
export function buildGlossaryPrompt(entries: readonly GlossaryEntry[], source: LangCode, target: LangCode): string {
  if (entries.length === 0) return '';

  const header = `Use this ${LANGUAGE_NAMES[source]} → ${LANGUAGE_NAMES[target]} glossary for domain terms:`;
  return [header, ...entries.map(entry => formatEntry(entry, source))].join('\n');
}

function assertLangCode(value: string, direction: string): asserts value is LangCode {
  if (value !== 'en' && value !== 'tsn') {
    throw new ConfigurationError(`Unsupported translation direction: ${direction}`);
  }
}

/**
 * English ↔ Setswana translation through the LLM, with glossary hints
 */
export class Translator {
  readonly backend = 'llm+glossary';

  constructor(
    private readonly client: ChatClient,
    private readonly glossary: GlossaryService,
    readonly model: string
  ) {}

  /**
   * Build the system prompt for a direction and source text
   */
  systemPrompt(text: string, source: LangCode, target: LangCode): string {
    const parts = [TRANSLATION_SYSTEM_PROMPT, DIRECTION_INSTRUCTIONS[`${source}->${target}`]];
    const glossaryBlock = buildGlossaryPrompt(this.glossary.findTerms(text, source), source, target);

    const prompt = parts.join(' ');
    return glossaryBlock ? `${prompt}\n\n${glossaryBlock}` : prompt;
  }

  /**
   * Translate between English ("en") and Setswana ("tsn").
   * Returns the text unchanged when source and target match.
   */
  async translate(text: string, source: string, target: string): Promise<string> {
    if (source === target) {
      return text;
    }

    assertLangCode(source, `${source} -> ${target}`);
    assertLangCode(target, `${source} -> ${target}`);

    const response = await this.client.complete({
      model: this.model,
      messages: [
        { role: 'system', content: this.systemPrompt(text, source, target) },
        { role: 'user', content: text },
      ],
      temperature: 0,
      maxTokens: 256, // Short translations
    });

    return (response.content ?? '').trim();
  }
}

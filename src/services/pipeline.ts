import type { AdviceService } from './advice.js';
import type { FarmAgent } from './agent.js';
import type { TurnStore } from './storage.js';
import type { Translator } from './translation.js';
import type { LangCode, NewTurn } from '../types/index.js';

export const FALLBACK_REPLY =
  'Sorry, we could not answer your question right now. Please try again later.';

/**
 * How answers are produced:
 * - agent: one tool-using model call does detection, translation and advice
 * - translate: translate in, ask for advice in English, translate back
 */
export type PipelineEngine =
  | { mode: 'agent'; agent: FarmAgent }
  | { mode: 'translate'; translator: Translator; advice: AdviceService; sourceLanguage?: LangCode };

export interface PipelineResult {
  reply: string;
  incomingId: number;
  outgoingId: number;
  turnId: number;
}

type TurnContent = Omit<NewTurn, 'phone' | 'incomingId' | 'outgoingId'>;

/**
 * Handles one inbound SMS end to end and records the exchange
 */
export class MessagePipeline {
  constructor(
    private readonly store: TurnStore,
    private readonly engine: PipelineEngine
  ) {}

  get mode(): PipelineEngine['mode'] {
    return this.engine.mode;
  }

  async handle(phone: string, text: string): Promise<PipelineResult> {
    const incomingId = this.store.addMessage(phone, 'in', text);

    let content: TurnContent;
    try {
      content = await this.generate(text);
    } catch (error) {
      // The farmer still gets a reply; the failure goes back to the caller
      this.store.addMessage(phone, 'out', FALLBACK_REPLY);
      console.error(`[Pipeline] Failed to answer message #${incomingId}:`, error);
      throw error;
    }

    const reply = content.answerUserLang || FALLBACK_REPLY;
    const outgoingId = this.store.addMessage(phone, 'out', reply);
    const turnId = this.store.addTurn({ ...content, phone, incomingId, outgoingId });

    console.log(`[Pipeline] Turn #${turnId} (${this.engine.mode}, lang=${content.langDetected ?? '-'})`);
    return { reply, incomingId, outgoingId, turnId };
  }

  private async generate(text: string): Promise<TurnContent> {
    const engine = this.engine;

    if (engine.mode === 'agent') {
      const response = await engine.agent.run(text);
      return {
        langDetected: response.detectedLanguage,
        questionRaw: text,
        questionEn: response.englishTranslation,
        answerEn: response.answerEnglish,
        answerUserLang: response.finalAnswerUserLanguage,
        llmModel: engine.agent.model,
        translationBackend: 'agent',
        reasoningSummary: response.reasoningSummary,
        safetyFlags: response.safetyFlags,
      };
    }

    const source = engine.sourceLanguage ?? 'tsn';
    const questionEn = await engine.translator.translate(text, source, 'en');
    const answerEn = await engine.advice.ask(questionEn);
    const answerUserLang = await engine.translator.translate(answerEn, 'en', source);

    return {
      langDetected: source,
      questionRaw: text,
      questionEn,
      answerEn,
      answerUserLang,
      llmModel: engine.advice.model,
      translationBackend: engine.translator.backend,
      reasoningSummary: null,
      safetyFlags: null,
    };
  }
}

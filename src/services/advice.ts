import type { ChatClient } from './ai.js';

export const ADVICE_SYSTEM_PROMPT =
  'You are an agricultural assistant helping smallholder farmers near ' +
  'Johannesburg, South Africa. Farmers send you brief questions by SMS ' +
  'about crops and livestock. Reply in simple English with short, clear, ' +
  'practical advice: ideally 2–4 short sentences at most. Focus on low-cost, ' +
  'low-risk actions the farmer can take. If you are not sure, or the problem ' +
  'sounds serious or life-threatening for people or animals, say that you are ' +
  'not sure and recommend talking to a local agricultural extension officer ' +
  'or an experienced farmer. Do NOT give exact chemical or medicine dosages, ' +
  'spray recipes, or injection instructions. Do NOT pretend to be completely ' +
  'certain when you are not.';

/**
 * Short English advice for an English question
 */
export class AdviceService {
  constructor(
    private readonly client: ChatClient,
    readonly model: string
  ) {}

  async ask(questionEn: string): Promise<string> {
    const response = await this.client.complete({
      model: this.model,
      messages: [
        { role: 'system', content: ADVICE_SYSTEM_PROMPT },
        { role: 'user', content: questionEn },
      ],
      temperature: 0.2,
      maxTokens: 256, // Short, focused answers
    });

    return (response.content ?? '').trim();
  }
}

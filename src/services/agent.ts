import { AgentResponseError, WebSearchError } from './errors.js';
import type { AssistantMessage, ChatClient, ChatMessage, ToolCall, ToolDefinition } from './ai.js';
import type { WebSearchClient } from './webSearch.js';
import type { AgentResponse, AgentSafetyFlags, DetectedLanguage } from '../types/index.js';

export const WEB_SEARCH_TOOL_NAME = 'web_search';

// Tool rounds before the model is told to stop searching and answer
const MAX_TOOL_ROUNDS = 3;

export const AGENT_SYSTEM_PROMPT = `You are an agricultural assistant helping smallholder farmers near Johannesburg, South Africa.

Farmers send you short messages, usually in Setswana (South African Tswana), sometimes in English
or a mix of the two. Messages may contain spelling mistakes or informal language.

For EACH message you receive, you MUST:

1. Detect the language:
   - "tsn" = mostly Setswana (South African Tswana)
   - "en" = mostly English
   - "mixed" = significant mixture of Setswana and English
   - "other" = something else

2. Translate the message into clear English in the field "english_translation".
   - Be as faithful as possible to the farmer's meaning.
   - If you are guessing about a word, still give your best translation.

3. Think carefully about the best, simple, low-risk advice in English.
   - Assume the farmer is near Johannesburg / Gauteng unless information suggests otherwise.
   - Focus on low-cost, low-risk actions.
   - Use 2-4 short sentences in English.

3a. Web search:
   - If a tool called "${WEB_SEARCH_TOOL_NAME}" is available, use it whenever the answer depends on
     specific agronomic facts (planting windows, pests, diseases, local regulations) or you are not
     confident you know the correct information.
   - Prefer 1-3 focused searches over many noisy ones, with a short, clear query in English.
   - If search results are unclear, say you are not fully sure and recommend talking to a local
     extension officer or experienced farmer.

4. Safety rules (VERY IMPORTANT):
   - Do NOT give exact chemical or medicine dosages, spray recipes, or injection instructions.
   - Do NOT pretend to be completely certain when you are not.
   - If the situation seems serious or unclear, recommend talking to a local agricultural extension
     officer or an experienced farmer.
   - Use the field "safety_flags" to indicate:
     - "mentions_dosage": true if you even talk about doses/amounts (you should avoid exact ones).
     - "needs_human_review": true if a local professional should definitely be consulted.

5. Convert your English answer into the language the farmer used:
   - If detected_language is "tsn" or "mixed": reply in Setswana (South African Tswana),
     using simple, natural rural phrasing.
   - If detected_language is "en": reply in simple English.
   - If detected_language is "other": choose English and clearly say you only support English
     and Setswana, then give your best attempt.

6. Summarise your reasoning process in 1-3 sentences in "reasoning_summary".
   This is for internal review, NOT for the farmer.

7. Style and length rules:
   - All text fields must be plain text only: no markdown, bullet points, numbered lists or emojis.
   - Keep "final_answer_user_language" to at most 2 short sentences and under 280 characters,
     on a single line.

You must output ONLY a single valid JSON object with the following fields:

- detected_language: "tsn" | "en" | "mixed" | "other"
- source_text: the original message exactly as you received it
- english_translation: your best translation of the question into English
- intent: a short label for what the farmer is asking (e.g. "crop_planting_time")
- answer_english: your English answer (2-4 short sentences, simple language)
- final_answer_user_language: the answer in the farmer's language (Setswana or English)
- safety_flags: an object with boolean fields "mentions_dosage" and "needs_human_review"
- reasoning_summary: 1-3 sentences explaining your reasoning, for internal use only

Your FINAL response (after any tool calls) must be ONLY this JSON object as plain text.`;

const STOP_SEARCHING_PROMPT =
  'You have already used the search tool several times. ' +
  'Now stop calling tools and respond with your FINAL JSON object only.';

export const WEB_SEARCH_TOOL: ToolDefinition = {
  type: 'function',
  function: {
    name: WEB_SEARCH_TOOL_NAME,
    description: 'Search the web for current agronomic information. Use short, focused English queries.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query in English' },
      },
      required: ['query'],
    },
  },
};

const DETECTED_LANGUAGES: readonly DetectedLanguage[] = ['tsn', 'en', 'mixed', 'other'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDetectedLanguage(value: unknown): value is DetectedLanguage {
  return DETECTED_LANGUAGES.some(lang => lang === value);
}

function requireString(data: Record<string, unknown>, field: string, raw: string): string {
  const value = data[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new AgentResponseError(`Agent response is missing "${field}"`, raw);
  }
  return value.trim();
}

function optionalString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value.trim() : fallback;
}

function parseSafetyFlags(value: unknown): AgentSafetyFlags {
  const flags = isRecord(value) ? value : {};
  return {
    mentionsDosage: flags.mentions_dosage === true,
    needsHumanReview: flags.needs_human_review === true,
  };
}

/**
 * Parse and validate the agent's final JSON answer.
 * A surrounding ```json fence is tolerated; anything else that is not a
 * JSON object with the required fields raises AgentResponseError.
 */
export function parseAgentResponse(raw: string, sourceText: string): AgentResponse {
  const fenced = raw.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  const jsonText = fenced ? fenced[1] : raw.trim();

  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch (error) {
    throw new AgentResponseError(`Agent did not return valid JSON: ${error}`, raw);
  }

  if (!isRecord(data)) {
    throw new AgentResponseError('Agent response is not a JSON object', raw);
  }

  if (!isDetectedLanguage(data.detected_language)) {
    throw new AgentResponseError(`Invalid detected_language "${String(data.detected_language)}"`, raw);
  }

  return {
    detectedLanguage: data.detected_language,
    sourceText: optionalString(data.source_text, sourceText),
    englishTranslation: requireString(data, 'english_translation', raw),
    intent: optionalString(data.intent, ''),
    answerEnglish: requireString(data, 'answer_english', raw),
    finalAnswerUserLanguage: requireString(data, 'final_answer_user_language', raw),
    safetyFlags: parseSafetyFlags(data.safety_flags),
    reasoningSummary: optionalString(data.reasoning_summary, ''),
  };
}

function parseQuery(call: ToolCall): string | null {
  try {
    const args: unknown = JSON.parse(call.function.arguments);
    return isRecord(args) && typeof args.query === 'string' && args.query.trim()
      ? args.query.trim()
      : null;
  } catch {
    return null;
  }
}

/**
 * Single-call agent: detects language, translates, answers (searching the
 * web when it decides to) and returns a structured record of the exchange.
 */
export class FarmAgent {
  constructor(
    private readonly client: ChatClient,
    readonly model: string,
    private readonly search: WebSearchClient | null = null
  ) {}

  async run(userText: string): Promise<AgentResponse> {
    const messages: ChatMessage[] = [
      { role: 'system', content: AGENT_SYSTEM_PROMPT },
      { role: 'user', content: userText },
    ];

    const final = await this.runWithTools(messages);
    return parseAgentResponse(final.content ?? '', userText);
  }

  /**
   * Let the model call the search tool until it answers without tool calls,
   * for at most MAX_TOOL_ROUNDS rounds.
   */
  private async runWithTools(messages: ChatMessage[]): Promise<AssistantMessage> {
    const tools = this.search ? [WEB_SEARCH_TOOL] : [];
    const history: ChatMessage[] = [...messages];

    for (let round = 0; round < MAX_TOOL_ROUNDS; round++) {
      const reply = await this.client.complete({
        model: this.model,
        messages: history,
        temperature: 0.4,
        tools,
      });
      history.push(reply);

      if (!reply.tool_calls || reply.tool_calls.length === 0) {
        return reply;
      }

      for (const call of reply.tool_calls) {
        history.push({
          role: 'tool',
          tool_call_id: call.id,
          content: await this.runTool(call),
        });
      }
    }

    // Still calling tools: force a final answer without them
    return this.client.complete({
      model: this.model,
      messages: [...history, { role: 'user', content: STOP_SEARCHING_PROMPT }],
      temperature: 0.4,
      jsonResponse: true,
    });
  }

  private async runTool(call: ToolCall): Promise<string> {
    if (call.function.name !== WEB_SEARCH_TOOL_NAME || !this.search) {
      return `Unknown tool: ${call.function.name}`;
    }

    const query = parseQuery(call);
    if (!query) {
      return 'Invalid arguments: expected {"query": string}';
    }

    try {
      const result = await this.search.search(query);
      console.log(`[Agent] web_search "${query}" -> ${result.results.length} results`);
      return JSON.stringify(result);
    } catch (error) {
      if (!(error instanceof WebSearchError)) throw error;
      console.error('[Agent] web_search failed:', error.message);
      return `Search failed: ${error.message}`;
    }
  }
}

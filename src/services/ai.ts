import { config } from '../config/index.js';
import { LlmRequestError } from './errors.js';

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    /** JSON-encoded arguments as produced by the model */
    arguments: string;
  };
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: ToolCall[];
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | AssistantMessage
  | { role: 'tool'; content: string; tool_call_id: string };

export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  tools?: ToolDefinition[];
  /** Ask for a JSON object response (supported by most models) */
  jsonResponse?: boolean;
}

/**
 * Anything that can answer a chat-completions request.
 * Tests pass a fake; production uses OpenRouterClient.
 */
export interface ChatClient {
  complete(request: ChatRequest): Promise<AssistantMessage>;
}

export interface OpenRouterClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Content may come back as a plain string or as a list of typed parts
 * (some providers return [{ type: 'text', text: '...' }]).
 */
function extractContent(content: unknown): string | null {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return null;

  const text = content
    .map(part => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .join('');
  return text || null;
}

function parseToolCalls(value: unknown): ToolCall[] | undefined {
  if (!Array.isArray(value)) return undefined;

  const calls: ToolCall[] = [];
  for (const item of value) {
    if (!isRecord(item) || !isRecord(item.function)) continue;
    const { name, arguments: args } = item.function;
    if (typeof item.id !== 'string' || typeof name !== 'string') continue;

    calls.push({
      id: item.id,
      type: 'function',
      function: { name, arguments: typeof args === 'string' ? args : '{}' },
    });
  }
  return calls.length > 0 ? calls : undefined;
}

/**
 * Pull the assistant message out of a chat-completions response body
 */
export function parseCompletion(data: unknown): AssistantMessage {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) {
    throw new LlmRequestError('Chat completion returned no choices');
  }

  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    throw new LlmRequestError('Chat completion returned a malformed choice');
  }

  const toolCalls = parseToolCalls(choice.message.tool_calls);
  return {
    role: 'assistant',
    content: extractContent(choice.message.content),
    ...(toolCalls ? { tool_calls: toolCalls } : {}),
  };
}

/**
 * OpenAI-compatible chat completions over OpenRouter
 */
export class OpenRouterClient implements ChatClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenRouterClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? config.openrouter.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.openrouter.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: ChatRequest): Promise<AssistantMessage> {
    if (!this.apiKey) {
      throw new LlmRequestError('OpenRouter not configured: OPENROUTER_API_KEY not set');
    }
    if (!request.model) {
      throw new LlmRequestError('OpenRouter not configured: no model set for this request');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'X-Title': 'SMS Farm Assistant',
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
          ...(request.tools && request.tools.length > 0 ? { tools: request.tools } : {}),
          ...(request.jsonResponse ? { response_format: { type: 'json_object' } } : {}),
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new LlmRequestError(`OpenRouter API error (${response.status}): ${errorBody}`, response.status);
      }

      const data: unknown = await response.json();
      return parseCompletion(data);
    } catch (error) {
      if (error instanceof LlmRequestError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new LlmRequestError(`OpenRouter request timed out after ${this.timeoutMs}ms`);
      }
      // Connection failures and unparseable bodies are upstream failures too
      const message = error instanceof Error ? error.message : String(error);
      throw new LlmRequestError(`OpenRouter request failed: ${message}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Get configuration status message
 */
export function getConfigStatus(): string {
  const issues: string[] = [];
  if (!config.openrouter.apiKey) issues.push('OPENROUTER_API_KEY not set');
  if (!config.openrouter.model) issues.push('OPENROUTER_MODEL not set');
  return issues.length > 0 ? issues.join(', ') : 'configured';
}

/**
 * Raised for programming or configuration mistakes, such as asking the
 * glossary for a direction it does not index. Never degraded to a fallback.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Upstream chat-completions request failed or returned nothing usable
 */
export class LlmRequestError extends Error {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'LlmRequestError';
  }
}

/**
 * The agent's final message was not the JSON object it was asked for
 */
export class AgentResponseError extends Error {
  constructor(
    message: string,
    public rawContent: string
  ) {
    super(message);
    this.name = 'AgentResponseError';
  }
}

export class WebSearchError extends Error {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'WebSearchError';
  }
}

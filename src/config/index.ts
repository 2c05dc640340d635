import 'dotenv/config';
import { resolve } from 'path';

export type PipelineMode = 'agent' | 'translate';

// Parse and validate CORS origins
function parseCorsOrigins(): string[] {
  const origins = process.env.CORS_ORIGINS?.split(',').map(o => o.trim()).filter(Boolean)
    || ['http://localhost:5173'];

  if (origins.includes('*')) {
    console.warn('WARNING: CORS is configured to allow all origins (*). This is a security risk in production.');
  }

  return origins;
}

function parsePipelineMode(): PipelineMode {
  const mode = (process.env.PIPELINE_MODE || 'agent').trim().toLowerCase();
  return mode === 'translate' ? 'translate' : 'agent';
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Resolve an optional path setting against the working directory.
 * An empty value means "not configured".
 */
function optionalPath(value: string | undefined, fallback: string): string {
  const raw = value === undefined ? fallback : value.trim();
  return raw ? resolve(process.cwd(), raw) : '';
}

export const config = {
  port: parseInt(process.env.PORT || '5000', 10),
  corsOrigins: parseCorsOrigins(),

  databasePath: optionalPath(process.env.DATABASE_PATH, 'data/sms-farm-assistant.sqlite'),

  glossary: {
    // Missing file is fine: translation runs without glossary hints
    csvPath: optionalPath(process.env.GLOSSARY_CSV_PATH, 'data/glossary.csv'),
    maxTerms: numberFromEnv(process.env.GLOSSARY_MAX_TERMS, 30),
    minScore: numberFromEnv(process.env.GLOSSARY_MIN_SCORE, 80),
    cacheSize: 5000, // Maximum number of cached fuzzy lookups, both directions together
  },

  pipeline: {
    mode: parsePipelineMode(),
  },

  // OpenRouter AI settings (OpenAI-compatible chat completions)
  openrouter: {
    apiKey: process.env.OPENROUTER_API_KEY || '',
    // Advice model, e.g. openai/gpt-4o-mini
    model: process.env.OPENROUTER_MODEL || '',
    translationModel: process.env.OPENROUTER_TRANSLATION_MODEL || process.env.OPENROUTER_MODEL || '',
    // Reasoning + tool-calling model for the single-call agent
    agentModel: process.env.OPENROUTER_AGENT_MODEL || process.env.OPENROUTER_MODEL || '',
    baseUrl: 'https://openrouter.ai/api/v1',
    timeoutMs: 60_000,
  },

  tavily: {
    apiKey: process.env.TAVILY_API_KEY || '',
    baseUrl: 'https://api.tavily.com',
  },

  // Input validation
  validation: {
    maxMessageLength: 1600, // Ten concatenated SMS segments
  },
} as const;

/**
 * Validate required configuration at startup.
 * Exits the process if critical configuration is missing.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.openrouter.apiKey) {
    errors.push('OPENROUTER_API_KEY is required');
  }

  if (config.pipeline.mode === 'agent' && !config.openrouter.agentModel) {
    errors.push('OPENROUTER_AGENT_MODEL (or OPENROUTER_MODEL) is required in agent mode');
  }

  if (config.pipeline.mode === 'translate') {
    if (!config.openrouter.model) errors.push('OPENROUTER_MODEL is required in translate mode');
    if (!config.openrouter.translationModel) errors.push('OPENROUTER_TRANSLATION_MODEL is required in translate mode');
  }

  if (!config.databasePath) {
    errors.push('DATABASE_PATH must not be empty');
  }

  // Web search is optional - only warn if not set
  if (!config.tavily.apiKey) {
    console.warn('Note: TAVILY_API_KEY not set. The agent will answer without web search.');
  }

  if (!config.glossary.csvPath) {
    console.warn('Note: GLOSSARY_CSV_PATH is empty. Translations will run without glossary hints.');
  }

  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach(err => console.error(`  - ${err}`));
    console.error('\nPlease set the required environment variables in .env');
    process.exit(1);
  }

  console.log(`Configuration validated successfully (pipeline mode: ${config.pipeline.mode})`);
}

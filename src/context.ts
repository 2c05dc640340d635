import { config, type PipelineMode } from './config/index.js';
import { OpenRouterClient, type ChatClient } from './services/ai.js';
import { AdviceService } from './services/advice.js';
import { FarmAgent } from './services/agent.js';
import { GlossaryService } from './services/glossary.js';
import { MessagePipeline, type PipelineEngine } from './services/pipeline.js';
import { createSimilarityScorer } from './services/similarity.js';
import { openDatabase, TurnStore } from './services/storage.js';
import { Translator } from './services/translation.js';
import { TavilySearchClient, type WebSearchClient } from './services/webSearch.js';

/**
 * Services shared by the server and the scripts, built once at startup
 */
export interface AppContext {
  glossary: GlossaryService;
  store: TurnStore;
  translator: Translator;
  pipeline: MessagePipeline;
}

export interface AppContextOptions {
  databasePath?: string;
  glossaryCsvPath?: string;
  mode?: PipelineMode;
  chatClient?: ChatClient;
  search?: WebSearchClient | null;
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const glossary = new GlossaryService({
    csvPath: options.glossaryCsvPath ?? config.glossary.csvPath,
    scorer: createSimilarityScorer(),
    maxTerms: config.glossary.maxTerms,
    minScore: config.glossary.minScore,
    cacheSize: config.glossary.cacheSize,
  });

  const store = new TurnStore(openDatabase(options.databasePath ?? config.databasePath));
  const client = options.chatClient ?? new OpenRouterClient({ apiKey: config.openrouter.apiKey });
  const translator = new Translator(client, glossary, config.openrouter.translationModel);

  const search = options.search !== undefined
    ? options.search
    : config.tavily.apiKey ? new TavilySearchClient({ apiKey: config.tavily.apiKey }) : null;

  const mode = options.mode ?? config.pipeline.mode;
  const engine: PipelineEngine = mode === 'agent'
    ? { mode, agent: new FarmAgent(client, config.openrouter.agentModel, search) }
    : { mode, translator, advice: new AdviceService(client, config.openrouter.model) };

  return {
    glossary,
    store,
    translator,
    pipeline: new MessagePipeline(store, engine),
  };
}

/**
 * Language codes handled by the glossary and translator.
 * "tsn" is Setswana (South African Tswana).
 */
export type LangCode = 'en' | 'tsn';

/**
 * A single English–Setswana glossary term pair
 */
export interface GlossaryEntry {
  readonly englishLabel: string;
  readonly englishPos: string | null;
  readonly setswanaPreferred: string;
  readonly setswanaVariants: readonly string[];
  readonly setswanaPos: string | null;
}

/**
 * Read-only lookup structure derived from the full entry list.
 * Keys are normalized surface forms.
 */
export interface GlossaryIndex {
  readonly entries: readonly GlossaryEntry[];
  readonly setswanaLookup: ReadonlyMap<string, readonly GlossaryEntry[]>;
  readonly englishLookup: ReadonlyMap<string, readonly GlossaryEntry[]>;
  /** Key sets of the lookups, in insertion order, for fuzzy scans */
  readonly setswanaForms: readonly string[];
  readonly englishForms: readonly string[];
}

/**
 * Per-token result for POST /glossary/preview and the preview script
 */
export interface TokenPreview {
  token: string;
  normalizedToken: string;
  entries: GlossaryEntry[];
}

export type MessageDirection = 'in' | 'out';

/**
 * Stored SMS message
 */
export interface MessageRecord {
  id: number;
  phone: string;
  direction: MessageDirection;
  text: string;
  createdAt: string;
}

/**
 * Raw `turns` row as returned by SQLite
 */
export interface TurnRow {
  id: number;
  phone: string;
  incoming_id: number | null;
  outgoing_id: number | null;
  lang_detected: string | null;
  question_raw: string | null;
  question_en: string | null;
  answer_en: string | null;
  answer_user_lang: string | null;
  llm_model: string | null;
  translation_backend: string | null;
  reasoning_summary: string | null;
  safety_flags_json: string | null;
  created_at: string;
}

/**
 * One question/answer exchange with everything needed for later review
 */
export interface Turn {
  id: number;
  phone: string;
  incomingId: number | null;
  outgoingId: number | null;
  langDetected: string | null;
  questionRaw: string | null;
  questionEn: string | null;
  answerEn: string | null;
  answerUserLang: string | null;
  llmModel: string | null;
  translationBackend: string | null;
  reasoningSummary: string | null;
  safetyFlags: AgentSafetyFlags | null;
  createdAt: string;
}

export type NewTurn = Omit<Turn, 'id' | 'createdAt'>;

export type DetectedLanguage = 'tsn' | 'en' | 'mixed' | 'other';

export interface AgentSafetyFlags {
  mentionsDosage: boolean;
  needsHumanReview: boolean;
}

/**
 * Structured output of the single-call agent
 */
export interface AgentResponse {
  detectedLanguage: DetectedLanguage;
  sourceText: string;
  englishTranslation: string;
  intent: string;
  answerEnglish: string;
  finalAnswerUserLanguage: string;
  safetyFlags: AgentSafetyFlags;
  reasoningSummary: string;
}

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type {
  AgentSafetyFlags,
  MessageDirection,
  MessageRecord,
  NewTurn,
  Turn,
  TurnRow,
} from '../types/index.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    phone TEXT NOT NULL,
    direction TEXT NOT NULL CHECK (direction IN ('in', 'out')),
    text TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS turns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    phone TEXT NOT NULL,
    incoming_id INTEGER REFERENCES messages(id),
    outgoing_id INTEGER REFERENCES messages(id),
    lang_detected TEXT,
    question_raw TEXT,
    question_en TEXT,
    answer_en TEXT,
    answer_user_lang TEXT,
    llm_model TEXT,
    translation_backend TEXT,
    reasoning_summary TEXT,
    safety_flags_json TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_turns_created_at ON turns (created_at);
  CREATE INDEX IF NOT EXISTS idx_messages_phone ON messages (phone);
`;

interface MessageRow {
  id: number;
  phone: string;
  direction: MessageDirection;
  text: string;
  created_at: string;
}

/**
 * Open (and create if needed) the SQLite database.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

function parseSafetyFlags(json: string | null): AgentSafetyFlags | null {
  if (!json) return null;

  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null) return null;

  return {
    mentionsDosage: 'mentionsDosage' in parsed && parsed.mentionsDosage === true,
    needsHumanReview: 'needsHumanReview' in parsed && parsed.needsHumanReview === true,
  };
}

/**
 * Convert a database row to a Turn
 */
function rowToTurn(row: TurnRow): Turn {
  return {
    id: row.id,
    phone: row.phone,
    incomingId: row.incoming_id,
    outgoingId: row.outgoing_id,
    langDetected: row.lang_detected,
    questionRaw: row.question_raw,
    questionEn: row.question_en,
    answerEn: row.answer_en,
    answerUserLang: row.answer_user_lang,
    llmModel: row.llm_model,
    translationBackend: row.translation_backend,
    reasoningSummary: row.reasoning_summary,
    safetyFlags: parseSafetyFlags(row.safety_flags_json),
    createdAt: row.created_at,
  };
}

/**
 * Messages and turns, stored in SQLite
 */
export class TurnStore {
  private readonly insertMessageStmt: Database.Statement<[string, MessageDirection, string, string]>;
  private readonly insertTurnStmt: Database.Statement<Record<string, string | number | null>>;
  private readonly recentTurnsStmt: Database.Statement<[number], TurnRow>;
  private readonly messageStmt: Database.Statement<[number], MessageRow>;

  constructor(private readonly db: Database.Database) {
    db.exec(SCHEMA);

    this.insertMessageStmt = db.prepare<[string, MessageDirection, string, string]>(`
      INSERT INTO messages (phone, direction, text, created_at)
      VALUES (?, ?, ?, ?)
    `);

    this.insertTurnStmt = db.prepare<Record<string, string | number | null>>(`
      INSERT INTO turns (
        phone, incoming_id, outgoing_id, lang_detected, question_raw, question_en,
        answer_en, answer_user_lang, llm_model, translation_backend,
        reasoning_summary, safety_flags_json, created_at
      ) VALUES (
        @phone, @incoming_id, @outgoing_id, @lang_detected, @question_raw, @question_en,
        @answer_en, @answer_user_lang, @llm_model, @translation_backend,
        @reasoning_summary, @safety_flags_json, @created_at
      )
    `);

    this.recentTurnsStmt = db.prepare<[number], TurnRow>(`
      SELECT * FROM turns ORDER BY created_at DESC, id DESC LIMIT ?
    `);

    this.messageStmt = db.prepare<[number], MessageRow>('SELECT * FROM messages WHERE id = ?');
  }

  /**
   * Store an SMS and return its id
   */
  addMessage(phone: string, direction: MessageDirection, text: string): number {
    const result = this.insertMessageStmt.run(phone, direction, text, new Date().toISOString());
    return Number(result.lastInsertRowid);
  }

  getMessage(id: number): MessageRecord | null {
    const row = this.messageStmt.get(id);
    if (!row) return null;
    return {
      id: row.id,
      phone: row.phone,
      direction: row.direction,
      text: row.text,
      createdAt: row.created_at,
    };
  }

  /**
   * Store a turn and return its id
   */
  addTurn(turn: NewTurn): number {
    const result = this.insertTurnStmt.run({
      phone: turn.phone,
      incoming_id: turn.incomingId,
      outgoing_id: turn.outgoingId,
      lang_detected: turn.langDetected,
      question_raw: turn.questionRaw,
      question_en: turn.questionEn,
      answer_en: turn.answerEn,
      answer_user_lang: turn.answerUserLang,
      llm_model: turn.llmModel,
      translation_backend: turn.translationBackend,
      reasoning_summary: turn.reasoningSummary,
      safety_flags_json: turn.safetyFlags ? JSON.stringify(turn.safetyFlags) : null,
      created_at: new Date().toISOString(),
    });
    return Number(result.lastInsertRowid);
  }

  /**
   * Most recent turns, newest first
   */
  recentTurns(limit: number): Turn[] {
    return this.recentTurnsStmt.all(limit).map(rowToTurn);
  }

  close(): void {
    this.db.close();
  }
}

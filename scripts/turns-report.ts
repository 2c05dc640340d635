import { writeFileSync } from 'fs';
import { parseArgs } from 'util';
import { config } from '../src/config/index.js';
import { openDatabase, TurnStore } from '../src/services/storage.js';
import type { Turn } from '../src/types/index.js';

const CSV_COLUMNS = [
  'id',
  'created_at',
  'phone',
  'lang_detected',
  'question_raw',
  'question_en',
  'answer_en',
  'answer_user_lang',
  'llm_model',
  'translation_backend',
  'tag', // Left blank for manual review: ok, weird, wrong, unsafe...
] as const;

function display(value: string | null): string {
  return value === null ? '' : value.trim();
}

/**
 * Quote a CSV cell when it contains a delimiter, quote or line break
 */
export function csvCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function turnsToCsv(turns: Turn[]): string {
  const rows = turns.map(turn => [
    turn.id,
    turn.createdAt,
    turn.phone,
    turn.langDetected ?? '',
    display(turn.questionRaw),
    display(turn.questionEn),
    display(turn.answerEn),
    display(turn.answerUserLang),
    turn.llmModel ?? '',
    turn.translationBackend ?? '',
    '',
  ]);

  return [CSV_COLUMNS.join(','), ...rows.map(row => row.map(csvCell).join(','))].join('\n') + '\n';
}

/**
 * Human-readable block for one turn
 */
export function formatTurn(turn: Turn): string[] {
  return [
    '-'.repeat(80),
    `Turn #${turn.id} | phone=${turn.phone} | lang=${turn.langDetected || '-'} | at=${turn.createdAt}`,
    '',
    `Q_RAW: ${display(turn.questionRaw)}`,
    `Q_EN:  ${display(turn.questionEn)}`,
    '',
    `A_EN:  ${display(turn.answerEn)}`,
    `A_USR: ${display(turn.answerUserLang)}`,
    '',
  ];
}

/**
 * Print or export recent turns.
 *
 * Usage: npm run turns -- [--limit 20] [--csv turns.csv]
 */
export function main(argv: string[] = process.argv.slice(2)): void {
  const { values } = parseArgs({
    args: argv,
    options: {
      limit: { type: 'string', default: '20' },
      csv: { type: 'string' },
    },
  });

  const limit = parseInt(values.limit ?? '20', 10);
  if (Number.isNaN(limit) || limit < 1) {
    console.error('Error: --limit must be a positive integer');
    process.exit(1);
  }

  const store = new TurnStore(openDatabase(config.databasePath));
  try {
    const turns = store.recentTurns(limit);

    if (values.csv) {
      writeFileSync(values.csv, turnsToCsv(turns), 'utf-8');
      console.log(`Exported ${turns.length} turns to ${values.csv}`);
      return;
    }

    for (const turn of turns) {
      console.log(formatTurn(turn).join('\n'));
    }
  } finally {
    store.close();
  }
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main();
}

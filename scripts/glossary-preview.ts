import { parseArgs } from 'util';
import { config } from '../src/config/index.js';
import { GlossaryService, isLangCode } from '../src/services/glossary.js';
import type { TokenPreview } from '../src/types/index.js';

/**
 * Render per-token matches for the terminal.
 *
 * token: Gabisa
 *   gapa  <->  absorb (variants: gabisa, gapa godimo)
 */
export function formatPreview(matches: TokenPreview[]): string[] {
  if (matches.length === 0) {
    return ['No glossary matches.'];
  }

  const lines: string[] = [];
  for (const match of matches) {
    lines.push(`token: ${match.token}`);
    for (const entry of match.entries) {
      const variants = entry.setswanaVariants.join(', ');
      const variantPart = variants ? ` (variants: ${variants})` : '';
      lines.push(`  ${entry.setswanaPreferred}  <->  ${entry.englishLabel}${variantPart}`);
    }
    lines.push('');
  }
  return lines;
}

/**
 * Print which glossary entries each word of a text would match.
 *
 * Usage: npm run glossary:preview -- "<text>" [--source tsn|en] [--glossary path]
 */
export function main(argv: string[] = process.argv.slice(2)): void {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      source: { type: 'string', default: 'tsn' },
      glossary: { type: 'string' },
    },
  });

  const text = positionals.join(' ').trim();
  if (!text) {
    console.error('Usage: glossary-preview "<text>" [--source tsn|en] [--glossary path]');
    process.exit(1);
  }

  const source = values.source ?? 'tsn';
  if (!isLangCode(source)) {
    console.error(`Error: --source must be "tsn" or "en", got "${source}"`);
    process.exit(1);
  }

  const glossary = new GlossaryService({
    csvPath: values.glossary ?? config.glossary.csvPath,
    minScore: config.glossary.minScore,
  });

  for (const line of formatPreview(glossary.previewMatches(text, source))) {
    console.log(line);
  }
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main();
}

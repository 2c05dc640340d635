import { createInterface } from 'readline/promises';
import { validateConfig } from '../src/config/index.js';
import { createAppContext } from '../src/context.js';

// Pseudo phone number so terminal turns are easy to filter out
export const CLI_PHONE = '+999000000_cli';

const EXIT_COMMANDS = new Set(['/q', '/quit', '/exit']);

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.has(input.trim().toLowerCase());
}

/**
 * Interactive chat through the full pipeline, logged like real SMS turns.
 */
export async function main(): Promise<void> {
  validateConfig();

  const context = createAppContext();
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  console.log(`Terminal chat (pipeline mode: ${context.pipeline.mode}). Type /quit to exit.\n`);

  try {
    while (!closed) {
      let input: string;
      try {
        input = (await rl.question('you> ')).trim();
      } catch (error) {
        // Ctrl+D closes the interface while a question is pending
        if (closed) break;
        throw error;
      }
      if (!input) continue;
      if (isExitCommand(input)) break;

      const result = await context.pipeline.handle(CLI_PHONE, input);
      console.log(`bot> ${result.reply}\n`);
    }
  } finally {
    rl.close();
    context.store.close();
  }
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Chat failed:', err);
    process.exit(1);
  });
}

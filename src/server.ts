import { config, validateConfig } from './config/index.js';
import { createApp } from './app.js';
import { createAppContext } from './context.js';

// Validate required configuration on startup
validateConfig();

const context = createAppContext();

// Build the glossary index before the first message arrives
context.glossary.getIndex();

const app = createApp(context);

const server = app.listen(config.port, () => {
  console.log(`Server listening at http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    context.store.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

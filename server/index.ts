import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { ConfigError } from './errors';
import { colors, logger } from './logger';
import { createInsightsService } from './services/llmService';
import { SessionStore } from './services/sessionStore';
import { createTranscriber } from './services/transcriptionService';

// Load environment variables
dotenv.config();

const WEB_ROOT = fileURLToPath(new URL('../dist/web', import.meta.url));

const readConfig = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }
};

async function main() {
  const config = readConfig();

  const store = new SessionStore(config.saveRoot);
  await store.ensureRoot();

  const app = createApp({
    config,
    transcriber: createTranscriber(config),
    insights: createInsightsService(config),
    store,
    webRoot: path.resolve(WEB_ROOT)
  });

  console.log(`${colors.cyan}Session Scribe${colors.reset}`);
  console.log(`${colors.gray}Provider: ${config.provider} | Transcribe: ${config.transcribeModel} | Preview: ${config.previewModel} | Text: ${config.textModel}${colors.reset}`);
  console.log(`${colors.gray}Language: ${config.language || 'auto'} | Live draft: ${config.liveDraft ? 'on' : 'off'}${colors.reset}`);
  console.log(`${colors.gray}Saving to: ${config.saveRoot}${colors.reset}`);

  const server = app.listen(config.port, config.host, () => {
    logger.success(`==> Listening on http://${config.host}:${config.port}`);
  });
  server.on('error', (error) => {
    logger.error('Server failed', error);
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  logger.error('Start-up failed', error);
  process.exit(1);
});

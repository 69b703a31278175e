import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createGeminiTextGenerator } from './services/geminiService.js';
import { InMemoryHouseholdStore } from './services/householdStore.js';
import { loadSeedData } from './services/seedLoader.js';
import { configureLogger, createLogger, loggerSettingsFor } from './utils/logger.js';

dotenv.config();

const log = createLogger('Server');

const config = loadConfig();
configureLogger(loggerSettingsFor(config.nodeEnv));
const store = new InMemoryHouseholdStore(loadSeedData(config.seedDataPath));
const app = createApp({
  config,
  generate: createGeminiTextGenerator(config.gemini),
  store,
});

app.listen(config.port, () => {
  log.info(`Larder API running on http://localhost:${config.port}`, { env: config.nodeEnv });
});

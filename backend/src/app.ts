import cors from 'cors';
import express, { type Express } from 'express';
import type { AppConfig } from './config.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createAiRateLimiter } from './middleware/rateLimiter.js';
import { createAiRouter } from './routes/ai.js';
import { createGroceryListRouter } from './routes/groceryLists.js';
import { ApprovalService } from './services/approvalService.js';
import type { TextGenerator } from './services/geminiService.js';
import type { HouseholdStore } from './services/householdStore.js';
import { MealAssistantService } from './services/mealAssistantService.js';

export interface AppDeps {
  config: AppConfig;
  generate: TextGenerator;
  store: HouseholdStore;
}

export function createApp({ config, generate, store }: AppDeps): Express {
  const assistant = new MealAssistantService({ config, generate, store });
  const approval = new ApprovalService({ matching: config.matching, store });

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/ai', createAiRateLimiter(config.aiRateLimitPerMinute), createAiRouter({ assistant, approval, store }));
  app.use('/api/grocery-lists', createGroceryListRouter(store));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(errorHandler);

  return app;
}

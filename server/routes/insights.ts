import { Router } from 'express';
import type { Insights } from '../../types';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { InsightsService } from '../services/llmService';
import { summarizeBodySchema } from './schemas';

export interface InsightsRouterDeps {
  insights: InsightsService;
  log: Logger;
}

export const createInsightsRouter = ({ insights, log }: InsightsRouterDeps): Router => {
  const router = Router();

  router.post('/summarize', async (req, res) => {
    const { text } = summarizeBodySchema.parse(req.body ?? {});
    if (!text || !text.trim()) {
      const empty: Insights = { summary: '', notes: [] };
      res.json(empty);
      return;
    }

    try {
      const result = await insights.summarize(text);
      res.json(result);
    } catch (error) {
      log.error('Summary failed', error);
      res.status(500).json({ summary: '', notes: [], error: errorMessage(error) });
    }
  });

  return router;
};

import type { Request, Response } from 'express';
import type { ContextPipeline } from '../services/contextPipeline.service';
import { PromptNarrativeRenderer } from '../services/narrative.service';
import { isRecord } from '../lib/shared';
import { createLogger } from '../lib/serverLogs';

const log = createLogger('context');

export const MAX_QUERY_LENGTH = 2000;

export type ContextRequest = {
  query: string;
  includeSentiment: boolean;
  includeCalendar: boolean;
  includeNews: boolean;
  returnPrompt: boolean;
};

export function parseContextRequest(body: unknown): ContextRequest | string {
  if (!isRecord(body)) return 'Body must be a JSON object';
  const { query } = body;
  if (typeof query !== 'string' || !query.trim()) return '"query" must be a non-empty string';
  if (query.length > MAX_QUERY_LENGTH) return `"query" must be at most ${MAX_QUERY_LENGTH} characters`;

  for (const flag of ['includeSentiment', 'includeCalendar', 'includeNews', 'returnPrompt']) {
    if (body[flag] !== undefined && typeof body[flag] !== 'boolean') return `"${flag}" must be a boolean`;
  }

  return {
    query,
    includeSentiment: body.includeSentiment !== false,
    includeCalendar: body.includeCalendar !== false,
    includeNews: body.includeNews !== false,
    returnPrompt: body.returnPrompt === true,
  };
}

export function createContextController(pipeline: ContextPipeline, renderer = new PromptNarrativeRenderer()) {
  return async function contextController(req: Request, res: Response) {
    const parsed = parseContextRequest(req.body);
    if (typeof parsed === 'string') {
      res.status(400).json({ success: false, timestamp: new Date().toISOString(), error: parsed });
      return;
    }

    try {
      const context = await pipeline.run(parsed.query, {
        includeSentiment: parsed.includeSentiment,
        includeCalendar: parsed.includeCalendar,
        includeNews: parsed.includeNews,
      });
      res.json({
        success: true,
        timestamp: new Date().toISOString(),
        context,
        ...(parsed.returnPrompt ? { prompt: renderer.render(context, parsed.query) } : {}),
      });
    } catch (e) {
      log.error('controller error', e);
      res.status(500).json({
        success: false,
        timestamp: new Date().toISOString(),
        error: 'Internal server error',
      });
    }
  };
}

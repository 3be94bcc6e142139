import type { Response, Router } from 'express';
import express from 'express';
import { ChatInput, ChatOutput, SearchInput } from '../schemas/chat.js';
import { SearchResponse } from '../schemas/product.js';
import { handleChat, handleSearch } from '../core/assistant.js';
import type { PipelineDeps } from '../core/graph.js';

// Aborts the pipeline when the client goes away before we answer.
function abortOnDisconnect(res: Response): AbortController {
  const ac = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) ac.abort();
  });
  return ac;
}

export const router = (deps: PipelineDeps): Router => {
  const { log } = deps;
  const r = express.Router();

  r.post('/search', async (req, res) => {
    const parsed = SearchInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const ac = abortOnDisconnect(res);
    try {
      const out = await handleSearch(parsed.data, { deps, signal: ac.signal });
      if (ac.signal.aborted) return;
      return res.json(SearchResponse.parse(out));
    } catch (err) {
      log.error({ err: err instanceof Error ? err.message : String(err) }, '/search failed');
      return res.status(500).json({ query: parsed.data.query, results: [], error: 'internal_error' });
    }
  });

  r.post('/chat', async (req, res) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const ac = abortOnDisconnect(res);
    try {
      const out = await handleChat(parsed.data, { deps, signal: ac.signal });
      if (ac.signal.aborted) return;
      return res.json(ChatOutput.parse(out));
    } catch (err) {
      log.error({ err: err instanceof Error ? err.message : String(err) }, '/chat failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  return r;
};

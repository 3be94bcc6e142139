import express from 'express';
import type { PipelineDeps } from '../core/graph.js';
import { router } from './routes.js';

function resOnFinish(res: express.Response, cb: () => void) {
  res.on('finish', cb);
}

export function createApp(deps: PipelineDeps): express.Express {
  const { log } = deps;
  const app = express();

  app.use(express.json({ limit: '64kb' }));

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({
      ok: true,
      sources: {
        catalog: deps.catalog ? 'configured' : 'disabled',
        web: deps.web ? 'configured' : 'disabled',
        priceLookup: deps.web?.hasPriceLookup ? 'configured' : 'disabled',
      },
    });
  });

  app.use('/', router(deps));

  // Malformed JSON bodies land here.
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);
    const status = err instanceof SyntaxError ? 400 : 500;
    if (status === 500) log.error({ err: err instanceof Error ? err.message : String(err) }, 'unhandled error');
    res.status(status).json({ error: status === 400 ? 'invalid_json' : 'internal_error' });
  });

  return app;
}

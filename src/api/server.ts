import 'dotenv/config';
import { loadConfig, type AppConfig } from '../config/app.js';
import { ConfigurationError } from '../core/errors.js';
import { createPipelineDeps } from '../core/deps.js';
import { getPrompt } from '../core/prompts.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();

function start(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.fatal({ issues: err.issues }, err.message);
      process.exit(1);
    }
    throw err;
  }

  const deps = createPipelineDeps(config, log);
  const app = createApp(deps);
  const port = Number(process.env.PORT ?? 3000);

  Promise.all([getPrompt('router_classifier'), getPrompt('answer_explainer')])
    .catch(() => void 0)
    .finally(() => {
      app.listen(port, () =>
        log.info(
          { port, catalog: Boolean(deps.catalog), web: Boolean(deps.web), llm: Boolean(deps.llm) },
          'HTTP server started',
        ),
      );
    });
}

start();

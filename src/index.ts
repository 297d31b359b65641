import 'dotenv/config';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { FirecrawlSearch } from './collaborators/firecrawlSearch.js';
import { OpenAIGenerator } from './collaborators/openaiGenerator.js';
import { createLogger } from './logging/logger.js';
import { FileCheckpointStore } from './sessions/checkpointStore.js';
import { WorkflowEngine } from './workflow/engine.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const engine = new WorkflowEngine({
  store: new FileCheckpointStore(config.dataDir),
  collaborators: {
    generator: new OpenAIGenerator({
      apiKey: config.openaiApiKey,
      model: config.openaiModel,
      baseURL: config.openaiBaseUrl,
    }),
    search: new FirecrawlSearch({
      apiKey: config.firecrawlApiKey,
      apiUrl: config.firecrawlApiUrl,
      limit: config.searchLimit,
    }),
  },
  logger,
  defaults: config.workflow,
});

// Sessions left `running` by a previous process pick up from their last checkpoint
if (config.resumeOnStartup) {
  await engine.recoverInterrupted();
}

const app = createApp(engine, logger);

app.listen(config.port, config.bind, () => {
  logger.info({ bind: config.bind, port: config.port, dataDir: config.dataDir }, 'research-workflow listening');
});

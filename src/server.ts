import "dotenv/config";

import { loadConfig } from "./config";
import { createLogger } from "./lib/logger";
import { createPipelineDeps } from "./services/factory";
import { createApp } from "./app";

const config = loadConfig();
const logger = createLogger("voice-calendar", config.logLevel);

// Uploads need AssemblyAI; without a key the text endpoints still work
const deps = createPipelineDeps(config, logger, { withTranscriber: Boolean(config.assemblyAiApiKey) });
const app = createApp(deps, logger);

app.listen(config.port, () => logger.info(`API listening on http://localhost:${config.port}`));

import "dotenv/config";
import { createApp } from "./app";
import { FactCheckPipeline } from "./agents/pipeline";
import { getGenerator } from "./llm";
import { env, loadPipelineConfig } from "./services/env";
import { createLogger, setLogLevel } from "./services/logger";
import { getSearch } from "./services/search";

setLogLevel(env.LOG_LEVEL);

const logger = createLogger("server");

const pipeline = new FactCheckPipeline(
  { generator: getGenerator(), search: getSearch() },
  loadPipelineConfig(env)
);

createApp(pipeline).listen(Number(env.PORT), () => {
  logger.info(`API listening on http://localhost:${env.PORT}`, {
    llm: env.LLM_PROVIDER,
    search: env.SEARCH_PROVIDER
  });
});

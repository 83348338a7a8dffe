import { assertConfig, config } from "./config";
import { createEngine } from "./engine";
import { OpenAiClient } from "./llm/openaiClient";
import { buildApp } from "./serverApp";

const llm = new OpenAiClient();
const { store, pipeline } = createEngine({ llm });
const app = buildApp({ store, pipeline });

const start = async (): Promise<void> => {
  assertConfig();
  await llm.assertModelAvailable();
  store.start();
  app.addHook("onClose", async () => {
    store.stop();
  });
  await app.listen({ port: config.port, host: "0.0.0.0" });
};

start().catch((error) => {
  app.log.error(error);
  process.exit(1);
});

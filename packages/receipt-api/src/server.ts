import { createApp } from "./app.js";
import { readApiConfigFromEnv } from "./config/env.js";
import { consoleLogger } from "./logger.js";
import { createRowSink } from "./sinks/row-sink.js";
import { InMemoryTransactionStore } from "./storage/in-memory-transaction-store.js";

function main(): void {
  const config = readApiConfigFromEnv();
  const rowSink = createRowSink(config);
  const app = createApp({
    config,
    store: new InMemoryTransactionStore(),
    rowSink,
    logger: consoleLogger,
  });

  app.listen(config.port, () => {
    consoleLogger.info(`listening on :${config.port} (row sink ${rowSink.mode})`);
  });
}

main();

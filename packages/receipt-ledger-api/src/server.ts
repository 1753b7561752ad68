import { createConsoleLogger, loadTaxonomy } from "@receipt-ledger/contracts";
import { createApp } from "./app.js";
import { readApiConfigFromEnv } from "./config/env.js";
import { InMemoryReceiptStore } from "./storage/in-memory-receipt-store.js";

function main(): void {
  const config = readApiConfigFromEnv();
  const logger = createConsoleLogger("receipt-ledger-api");
  const taxonomy = loadTaxonomy(config.taxonomyPath);
  const store = new InMemoryReceiptStore({ taxonomy, logger });
  const app = createApp({ config, store, taxonomy, logger });

  app.listen(config.port, () => {
    logger.info(`listening on :${config.port}`);
  });
}

main();

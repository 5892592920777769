// scripts/ingest.ts — CLI entrypoint: ingest SOURCE_ROOT (or the first argument) and log a summary.

// Loads .env before the logger reads LOG_LEVEL
import "dotenv/config";

import { getDataSourceParams } from "../src/config/env.js";
import { logger } from "../src/config/logger.js";
import { ingest } from "../src/ingest/filesystem-data-source.js";

const params = getDataSourceParams();
const sourceRoot = process.argv[2];
if (sourceRoot) params.source_root = sourceRoot;

ingest(params)
  .then((result) => {
    for (const [name, collection] of Object.entries(result)) {
      const binary = [...collection.values()].filter((item) => item.isBinary).length;
      logger.info({ collection: name, total: collection.size, binary }, "Collection ready");
    }
  })
  .catch((err: unknown) => {
    logger.error({ err }, "Ingestion failed");
    process.exit(1);
  });

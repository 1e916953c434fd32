/**
 * Target classification tool server
 * ---------------------------------
 * Serves the classification engine over JSON-RPC (`POST /mcp`, methods
 * `tools/list` and `tools/call`) and a REST-style GET wrapper
 * (`GET /mcp/:toolName`).
 *
 * Environment:
 *   CLASSIFY_TARGETS_PATH   targets reference table (required)
 *   CLASSIFY_FAMILIES_PATH  families reference table (required)
 *   CLASSIFY_SEP            field separator of both tables (default ",")
 *   CLASSIFY_ENCODING       text encoding (default "utf-8")
 *   CLASSIFY_EC_PRECISION, CLASSIFY_MAX_CHAIN_DEPTH, ... see src/classification/config.ts
 *   PORT                    default 8788
 *   LOG_LEVEL               debug | info | warn | error
 */

import { loadConfig, ConfigError } from './src/classification/index.js';
import { loadClassifierFromFiles } from './src/io/reference_files.js';
import { toBufferEncoding, toSeparator } from './src/io/delimited.js';
import { buildTools } from './src/server/tools.js';
import { createApp } from './src/server/app.js';
import { createLogger, setLogLevel } from './src/log.js';

const log = createLogger('classification-mcp');

async function start(): Promise<void> {
  // -------- Config --------
  const cfg = loadConfig();
  setLogLevel(cfg.server.logLevel);
  const { targetsPath, familiesPath, port } = cfg.server;
  if (!targetsPath || !familiesPath) {
    throw new ConfigError('Set CLASSIFY_TARGETS_PATH and CLASSIFY_FAMILIES_PATH to the reference tables.');
  }

  const classifier = await loadClassifierFromFiles(
    targetsPath,
    familiesPath,
    { sep: toSeparator(cfg.server.sep), encoding: toBufferEncoding(cfg.server.encoding) },
    cfg.classifier
  );

  const app = createApp(buildTools(classifier));
  app.listen(port, () => log.info(`Classification MCP listening on http://localhost:${port}/mcp`));
}

start().catch((e: unknown) => {
  log.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
});

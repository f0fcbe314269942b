import { startServer } from "./http/server.js";
import { loadConfig } from "./config.js";
import { createSearchEngine } from "./core/index.js";
import { createLogger, levelFromName, setLogLevel } from "./logger.js";

const config = loadConfig();
setLogLevel(levelFromName(config.logLevel));
const log = createLogger("server");

const engine = createSearchEngine({ dataDir: config.dataDir, backupRetention: config.backupRetention });

// a snapshot that exists but cannot be read (and has no usable backup) is fatal;
// serving an empty index here would hide the data loss
const started = await engine.start();
if (!started.ok) {
  log.fatal(`Refusing to start: ${started.error.message}`);
  process.exit(1);
}

const { server, port } = await startServer({ engine, config, port: config.port, host: config.host });
log.info(`listening on ${config.host}:${port}`);

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  log.info(`${signal} received, shutting down`);

  await new Promise<void>((resolve) => server.close(() => resolve()));
  const saved = await engine.stop();
  if (!saved.ok) {
    log.error(`Final save failed: ${saved.error.message}`);
    process.exit(1);
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error("Shutdown failed:", err);
      process.exit(1);
    });
  });
}

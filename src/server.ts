import { loadServerConfig } from './config.js';
import { loadMarkers } from './loader.js';
import { createApp } from './app.js';

const STOP_TIMEOUT_MS = 5000;

/**
 * Start the server
 */
function bootstrap() {
  const { config, warnings } = loadServerConfig();
  for (const warning of warnings) {
    console.warn(warning);
  }

  console.log(`Scanning markers in: ${config.rootDir}`);
  const data = loadMarkers({ rootDir: config.rootDir });

  console.log(`Scanned ${data.sources.length} files, ${data.catalogue.tags.length} tags, ${data.catalogue.references.length} refs`);

  if (data.skippedLines > 0) {
    console.warn(`Skipped ${data.skippedLines} undecodable lines`);
  }
  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const app = createApp(data);

  const server = app.listen(config.port, () => {
    console.log(`Label scan API listening on http://localhost:${config.port}`);
  });

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal}: no longer accepting connections`);

    const deadline = setTimeout(() => {
      console.error(`Open connections still held after ${STOP_TIMEOUT_MS}ms, exiting`);
      process.exit(1);
    }, STOP_TIMEOUT_MS);
    deadline.unref();

    server.close(err => {
      if (err) {
        console.error(`Error while stopping: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);
}

bootstrap();

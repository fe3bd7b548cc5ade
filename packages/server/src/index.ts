import {
  loadConfig,
  createLogger,
  describeError,
  FileArtifactStore,
  HttpScheduleSource,
  Publisher,
  RefreshScheduler,
} from "@timetable-ics/core";
import { createServer } from "./server.js";

const log = createLogger("main");

async function main() {
  const config = loadConfig();

  const publisher = new Publisher(new FileArtifactStore(config.outputPath));
  const source = new HttpScheduleSource({
    baseUrl: config.scheduleBaseUrl,
    acceptLanguage: config.scheduleAcceptLanguage,
  });
  const scheduler = new RefreshScheduler({ config, source, publisher });

  // Serve whatever was published last before the first pass finishes
  const server = await createServer({
    outputPath: config.outputPath,
    scheduler,
  });
  await server.listen({ host: config.server.host, port: config.server.port });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down");
    scheduler.stop();
    await server.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ err }, "Error during shutdown");
        process.exit(1);
      });
    });
  }

  await scheduler.start();
}

main().catch((err: unknown) => {
  log.fatal(describeError(err), "Fatal error");
  process.exit(1);
});

import { buildServer } from "./app.js";
import { loadConfig, type ProxyConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { FileInteractionRepository } from "./interactionRepository.js";

const start = async () => {
  let config: ProxyConfig;
  let repository: FileInteractionRepository;
  try {
    config = loadConfig();
    repository = new FileInteractionRepository(config.storage.path);
  } catch (error) {
    console.error(`Failed to start proxy: ${errorMessage(error)}`);
    process.exit(1);
  }

  const app = buildServer({ config, repository });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, "shutting down proxy server");
    try {
      await app.close();
      app.log.info({ recordings: repository.count() }, "proxy server stopped");
      process.exit(0);
    } catch (error) {
      app.log.error(error);
      process.exit(1);
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }

  try {
    app.log.info(
      {
        recordingsDir: config.storage.path,
        mode: config.mode.default,
        recordings: repository.count(),
      },
      "starting proxy server"
    );
    await app.listen({ port: config.server.port, host: config.server.host });
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
};

void start();

import Fastify from "fastify";
import { registerAdminRoutes } from "./adminRoutes.js";
import { defaultConfig, type ProxyConfig } from "./config.js";
import {
  FileInteractionRepository,
  type InteractionRepository,
} from "./interactionRepository.js";
import { ModeController } from "./modeController.js";
import { Player } from "./player.js";
import { ProxyHandler } from "./proxyHandler.js";
import { Recorder, type FetchImpl } from "./recorder.js";
import { RequestHistory, Statistics } from "./statistics.js";

export interface BuildServerOptions {
  config?: ProxyConfig;
  repository?: InteractionRepository;
  fetchImpl?: FetchImpl;
  modeController?: ModeController;
}

export const buildServer = (options: BuildServerOptions = {}) => {
  const config = options.config ?? defaultConfig();
  const app = Fastify({
    logger: { level: config.logLevel },
    bodyLimit: config.server.bodyLimit,
  });

  const repository =
    options.repository ?? new FileInteractionRepository(config.storage.path);
  const modeController = options.modeController ?? new ModeController(config.mode.default);
  const statistics = new Statistics();
  const history = new RequestHistory();

  const proxyHandler = new ProxyHandler({
    modeController,
    recorder: new Recorder(repository, {
      fetchImpl: options.fetchImpl,
      timeoutMs: config.upstream.timeoutMs,
      redactRequestHeaders: config.storage.redactRequestHeaders,
    }),
    player: new Player(repository),
    statistics,
    history,
  });

  registerAdminRoutes(app, { repository, modeController, statistics, history });

  // Proxied bodies are kept as raw bytes whatever their content type.
  app.register(async (proxy) => {
    proxy.removeAllContentTypeParsers();
    proxy.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
      done(null, body);
    });

    proxy.setErrorHandler(async (error, request, reply) => {
      request.log.warn({ err: error }, "unreadable request body");
      return reply.code(400).send({ error: `Failed to read request body: ${error.message}` });
    });

    proxy.all("/*", (request, reply) => proxyHandler.handle(request, reply));
  });

  return app;
};

export type ProxyServer = ReturnType<typeof buildServer>;

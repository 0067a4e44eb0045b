import type { FastifyInstance } from "fastify";
import { errorMessage, InteractionNotFoundError, InvalidModeError } from "./errors.js";
import { fingerprint, serializeInteraction } from "./interaction.js";
import type { InteractionRepository } from "./interactionRepository.js";
import type { ModeController } from "./modeController.js";
import type { RequestHistory, Statistics } from "./statistics.js";
import type { Interaction, RecordingSummary } from "./types.js";

export interface AdminRouteDeps {
  repository: InteractionRepository;
  modeController: ModeController;
  statistics: Statistics;
  history: RequestHistory;
  startedAt?: number;
}

export const formatUptime = (elapsedMs: number): string => {
  const totalSeconds = Math.round(elapsedMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h${minutes}m${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m${seconds}s`;
  }
  return `${seconds}s`;
};

const toSummary = (interaction: Interaction): RecordingSummary => ({
  id: fingerprint(interaction.request),
  uuid: interaction.id,
  timestamp: interaction.timestamp,
  method: interaction.request.method,
  url: interaction.request.url,
  target: interaction.metadata.target,
  status: interaction.response.statusCode,
  duration: interaction.metadata.durationMs,
});

const readModeField = (body: unknown): string | undefined => {
  if (typeof body !== "object" || body === null || !("mode" in body)) {
    return undefined;
  }
  return typeof body.mode === "string" ? body.mode : undefined;
};

export const registerAdminRoutes = (app: FastifyInstance, deps: AdminRouteDeps): void => {
  const { repository, modeController, statistics, history } = deps;
  const startedAt = deps.startedAt ?? Date.now();

  const switchMode = (value: string) => {
    const mode = modeController.setMode(value);
    app.log.info({ mode }, "mode switched");
    return { mode, message: `Switched to ${mode} mode` };
  };

  app.get("/health", async () => ({
    status: "healthy",
    time: new Date().toISOString(),
  }));

  app.get("/admin/status", async (_request, reply) => {
    let totalRecordings: number;
    try {
      totalRecordings = repository.count();
    } catch (error) {
      return reply.code(500).send({ error: `Failed to read recordings: ${errorMessage(error)}` });
    }

    return {
      mode: modeController.getMode(),
      ...statistics.snapshot(),
      uptime: formatUptime(Date.now() - startedAt),
      total_recordings: totalRecordings,
    };
  });

  app.get<{ Querystring: { mode?: string } }>("/admin/mode", async (request, reply) => {
    const requested = request.query.mode;
    if (!requested) {
      return { mode: modeController.getMode() };
    }

    try {
      return switchMode(requested);
    } catch (error) {
      if (error instanceof InvalidModeError) {
        return reply.code(400).send({ error: error.message });
      }
      throw error;
    }
  });

  app.post("/admin/mode", async (request, reply) => {
    const requested = readModeField(request.body);
    if (requested === undefined) {
      return reply.code(400).send({ error: "Invalid request body" });
    }

    try {
      return switchMode(requested);
    } catch (error) {
      if (error instanceof InvalidModeError) {
        return reply.code(400).send({ error: error.message });
      }
      throw error;
    }
  });

  app.get("/admin/history", async () => {
    const entries = history.list();
    return { count: entries.length, history: entries };
  });

  app.get("/admin/recordings", async (_request, reply) => {
    try {
      const recordings = repository.findAll().map(toSummary);
      return { count: recordings.length, recordings };
    } catch (error) {
      return reply.code(500).send({ error: `Failed to list recordings: ${errorMessage(error)}` });
    }
  });

  app.delete("/admin/recordings", async (_request, reply) => {
    try {
      repository.clear();
    } catch (error) {
      return reply.code(500).send({ error: `Failed to clear recordings: ${errorMessage(error)}` });
    }
    app.log.info("recordings cleared");
    return { message: "All recordings cleared successfully" };
  });

  app.get<{ Querystring: { id?: string } }>("/admin/recording", async (request, reply) => {
    const id = request.query.id;
    if (!id) {
      return reply.code(400).send({ error: "Missing recording ID" });
    }

    try {
      return serializeInteraction(repository.find(id));
    } catch (error) {
      if (error instanceof InteractionNotFoundError) {
        return reply.code(404).send({ error: `Recording not found: ${error.message}` });
      }
      return reply.code(500).send({ error: `Failed to read recordings: ${errorMessage(error)}` });
    }
  });
};

import { validateHeaderName, validateHeaderValue } from "node:http";
import type { FastifyReply, FastifyRequest } from "fastify";
import { errorMessage, RecordingNotFoundError } from "./errors.js";
import { fingerprint, headersFromIncoming, hopByHopHeaders } from "./interaction.js";
import type { ModeController } from "./modeController.js";
import type { Player } from "./player.js";
import type { Recorder } from "./recorder.js";
import { SerialLock } from "./serialLock.js";
import type { RequestHistory, Statistics } from "./statistics.js";
import { resolveTargetUrl } from "./target.js";
import type { HeaderMap, InboundRequest, Interaction, ProxyMode } from "./types.js";

export interface ProxyHandlerDeps {
  modeController: ModeController;
  recorder: Recorder;
  player: Player;
  statistics: Statistics;
  history: RequestHistory;
  lock?: SerialLock;
}

const toBodyBuffer = (body: unknown): Buffer | undefined | null => {
  if (typeof body === "undefined" || body === null) {
    return undefined;
  }
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === "string") {
    return Buffer.from(body, "utf8");
  }
  return null;
};

type OutgoingHeaders = Array<[string, string | string[]]>;

/** Throws when a stored header could not be written to the socket. */
const toOutgoingHeaders = (headers: HeaderMap): OutgoingHeaders => {
  const outgoing: OutgoingHeaders = [];
  for (const [key, values] of Object.entries(headers)) {
    if (hopByHopHeaders.has(key.toLowerCase()) || values.length === 0) {
      continue;
    }
    validateHeaderName(key);
    for (const value of values) {
      validateHeaderValue(key, value);
    }
    outgoing.push([key, values.length === 1 ? values[0] : values]);
  }
  return outgoing;
};

const sendError = (reply: FastifyReply, statusCode: number, message: string): FastifyReply =>
  reply.code(statusCode).send({ error: message });

/**
 * Record/playback dispatch for every proxied request. All requests pass
 * through one lock, upstream call included, so they are handled strictly
 * in arrival order.
 */
export class ProxyHandler {
  private readonly deps: ProxyHandlerDeps;
  private readonly lock: SerialLock;

  constructor(deps: ProxyHandlerDeps) {
    this.deps = deps;
    this.lock = deps.lock ?? new SerialLock();
  }

  handle(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    return this.lock.runExclusive(() => this.dispatch(request, reply));
  }

  private async dispatch(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
    const target = new URL(request.url, "http://localhost").searchParams.get("target");
    if (!target) {
      return sendError(reply, 400, "Missing 'target' query parameter");
    }

    try {
      resolveTargetUrl(target);
    } catch (error) {
      return sendError(reply, 400, `Invalid target URL: ${errorMessage(error)}`);
    }

    const body = toBodyBuffer(request.body);
    if (body === null) {
      return sendError(reply, 400, "Failed to read request body");
    }

    const inbound: InboundRequest = {
      method: request.method,
      target,
      headers: headersFromIncoming(request.headers),
      body,
    };

    const mode = this.deps.modeController.getMode();
    const started = Date.now();
    let interaction: Interaction;
    let headers: OutgoingHeaders;

    if (mode === "record") {
      try {
        interaction = await this.deps.recorder.record(inbound);
        headers = toOutgoingHeaders(interaction.response.headers);
      } catch (error) {
        request.log.error({ err: error, target }, "record failed");
        return sendError(reply, 500, `Record failed: ${errorMessage(error)}`);
      }
      this.deps.statistics.incrementRecord();
    } else {
      try {
        interaction = this.deps.player.play(inbound);
        headers = toOutgoingHeaders(interaction.response.headers);
      } catch (error) {
        if (error instanceof RecordingNotFoundError) {
          this.deps.statistics.incrementMiss();
          request.log.warn({ target, fingerprint: error.fingerprint }, "no recording found");
          return sendError(reply, 404, `No recording found: ${error.message}`);
        }
        request.log.error({ err: error, target }, "playback failed");
        return sendError(reply, 500, `Playback failed: ${errorMessage(error)}`);
      }
      this.deps.statistics.incrementHit();
    }

    this.addToHistory(interaction, mode, Date.now() - started);
    request.log.info(
      {
        mode,
        method: interaction.request.method,
        target,
        status: interaction.response.statusCode,
        fingerprint: fingerprint(interaction.request),
      },
      "proxied request"
    );

    return writeResponse(
      reply,
      interaction.response.statusCode,
      headers,
      interaction.response.body
    );
  }

  private addToHistory(interaction: Interaction, mode: ProxyMode, duration: number): void {
    this.deps.history.add({
      id: fingerprint(interaction.request),
      timestamp: new Date().toISOString(),
      method: interaction.request.method,
      url: interaction.request.url,
      target: interaction.metadata.target,
      status: interaction.response.statusCode,
      duration,
      saved: mode === "record",
    });
  }
}

const writeResponse = (
  reply: FastifyReply,
  statusCode: number,
  headers: OutgoingHeaders,
  body: Buffer | undefined
): FastifyReply => {
  reply.code(statusCode);
  for (const [key, value] of headers) {
    reply.header(key, value);
  }
  return body ? reply.send(body) : reply.send();
};

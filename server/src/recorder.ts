import { randomUUID } from "node:crypto";
import { errorMessage, StorageError, UpstreamForwardError } from "./errors.js";
import { headersFromFetch, toOutboundHeaders, toRecordedRequest } from "./interaction.js";
import type { InteractionRepository } from "./interactionRepository.js";
import { redactHeaders } from "./redaction.js";
import { resolveTargetUrl } from "./target.js";
import type { InboundRequest, Interaction, RecordedResponse } from "./types.js";

export type FetchImpl = typeof fetch;

export interface RecorderOptions {
  fetchImpl?: FetchImpl;
  /** Upper bound for the whole upstream exchange. Unset means no timeout. */
  timeoutMs?: number;
  /** Replace sensitive request header values in the stored copy. */
  redactRequestHeaders?: boolean;
}

const bodylessMethods = new Set(["GET", "HEAD"]);

export class Recorder {
  private readonly repository: InteractionRepository;
  private readonly fetchImpl: FetchImpl;
  private readonly timeoutMs: number | undefined;
  private readonly redactRequestHeaders: boolean;

  constructor(repository: InteractionRepository, options: RecorderOptions = {}) {
    this.repository = repository;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs;
    this.redactRequestHeaders = options.redactRequestHeaders ?? false;
  }

  /**
   * Forwards the request to its target and stores the exchange. Nothing is
   * stored when the upstream call fails; a failed store is thrown as well.
   */
  async record(inbound: InboundRequest): Promise<Interaction> {
    const started = new Date();
    const request = toRecordedRequest(inbound);
    const response = await this.forward(inbound, request.method);

    const interaction: Interaction = {
      id: randomUUID(),
      timestamp: started.toISOString(),
      request: this.redactRequestHeaders
        ? { ...request, headers: redactHeaders(request.headers) }
        : request,
      response,
      metadata: {
        target: inbound.target,
        durationMs: Date.now() - started.getTime(),
      },
    };

    try {
      return this.repository.store(interaction);
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`failed to store interaction: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async forward(inbound: InboundRequest, method: string): Promise<RecordedResponse> {
    let upstream: Response;
    try {
      upstream = await this.fetchImpl(resolveTargetUrl(inbound.target).toString(), {
        method,
        headers: toOutboundHeaders(inbound.headers),
        body: bodylessMethods.has(method) || !inbound.body ? undefined : inbound.body,
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamForwardError(`failed to forward request: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let body: Buffer;
    try {
      body = Buffer.from(await upstream.arrayBuffer());
    } catch (error) {
      throw new UpstreamForwardError(`failed to read response body: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return {
      statusCode: upstream.status,
      headers: headersFromFetch(upstream.headers),
      body: body.length > 0 ? body : undefined,
    };
  }
}

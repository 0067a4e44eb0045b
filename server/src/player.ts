import {
  errorMessage,
  InteractionNotFoundError,
  RecordingNotFoundError,
  StorageError,
} from "./errors.js";
import { fingerprint, toRecordedRequest } from "./interaction.js";
import type { InteractionRepository } from "./interactionRepository.js";
import type { InboundRequest, Interaction } from "./types.js";

export class Player {
  private readonly repository: InteractionRepository;

  constructor(repository: InteractionRepository) {
    this.repository = repository;
  }

  /** Returns the stored interaction for the request, response untouched. */
  play(inbound: InboundRequest): Interaction {
    const request = toRecordedRequest(inbound);
    const key = fingerprint(request);

    try {
      return this.repository.find(key);
    } catch (error) {
      if (error instanceof InteractionNotFoundError) {
        throw new RecordingNotFoundError(request.method, request.url, key);
      }
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`failed to retrieve recording: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

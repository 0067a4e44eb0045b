export type ProxyMode = "record" | "playback";

export type HeaderMap = Record<string, string[]>;

export interface RecordedRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body?: Buffer;
}

export interface RecordedResponse {
  statusCode: number;
  headers: HeaderMap;
  body?: Buffer;
}

export interface InteractionMetadata {
  target: string;
  durationMs: number;
}

export interface Interaction {
  id: string;
  timestamp: string;
  request: RecordedRequest;
  response: RecordedResponse;
  metadata: InteractionMetadata;
}

/** On-disk JSON shape of an interaction. Bodies are base64. */
export interface StoredInteraction {
  id: string;
  timestamp: string;
  request: {
    method: string;
    url: string;
    headers: HeaderMap;
    body?: string;
  };
  response: {
    status_code: number;
    headers: HeaderMap;
    body?: string;
  };
  metadata: {
    target: string;
    duration_ms: number;
  };
}

/** A proxied request as the handler hands it to the recorder or player. */
export interface InboundRequest {
  method: string;
  target: string;
  headers: HeaderMap;
  body: Buffer | undefined;
}

export interface HistoryEntry {
  id: string;
  timestamp: string;
  method: string;
  url: string;
  target: string;
  status: number;
  duration: number;
  saved: boolean;
}

export interface StatisticsSnapshot {
  record_count: number;
  playback_hits: number;
  playback_misses: number;
}

export interface RecordingSummary {
  id: string;
  uuid: string;
  timestamp: string;
  method: string;
  url: string;
  target: string;
  status: number;
  duration: number;
}

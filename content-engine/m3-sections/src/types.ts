// Core types for M3-Sections module

export interface Section {
  title: string;
  /** Non-blank lines of the section, each followed by one space */
  body: string;
}

/**
 * Image bytes keyed by the uppercased section title
 */
export type SectionImageMap = Map<string, Buffer>;

export interface IllustrationClientConfig {
  apiUrl: string;
  apiKey: string;
  timeoutMs: number;
  width: number;
  height: number;
}

export interface IllustrationProgress {
  index: number;
  total: number;
  title: string;
}

export type FetchLike = (input: string, init: {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}) => Promise<{ ok: boolean; status: number; arrayBuffer(): Promise<ArrayBuffer> }>;

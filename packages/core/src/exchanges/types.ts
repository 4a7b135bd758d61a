import type { ServerDirectory } from '../schemas/config-schema';
import type { ScreeningTransport } from '../transport/types';
import type { XmlElement, XmlValue } from '../xml/response-parser';

/**
 * What every exchange needs to reach the vendor
 */
export interface ExchangeContext {
  transport: ScreeningTransport;
  servers: ServerDirectory;
}

/**
 * A 200 response, parsed. Submission responses are passed through as-is.
 */
export interface ParsedResponse {
  status: number;
  raw: string;
  document: XmlElement;
}

export interface StatusResult {
  fileNo: string;
  /** Set iff the vendor returned a status payload for the file */
  status?: 'Available';
  /** Set iff the vendor reported a per-file error */
  errorText?: string;
  rawStatusPayload?: XmlValue;
}

export type DownloadFailureReason = 'vendor' | 'transport' | 'empty';

export type DownloadResult =
  | { fileNo: string; outcome: 'written'; path: string }
  | { fileNo: string; outcome: 'failed'; reason: DownloadFailureReason; error: string };

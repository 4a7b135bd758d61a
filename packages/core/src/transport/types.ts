/**
 * Transport Types
 *
 * The only network seam of the library: one XML POST, one response.
 * Implementations return non-200 responses as data; the exchanges decide
 * what a status means.
 */

export interface TransportResponse {
  status: number;
  body: string;
}

export interface ScreeningTransport {
  /**
   * POST `body` with `Content-Type: application/xml`.
   * Rejects with RequestFailed when no response could be obtained.
   */
  post(url: string, body: string): Promise<TransportResponse>;
}

export const XML_CONTENT_TYPE = 'application/xml';

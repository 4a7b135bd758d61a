/**
 * Shared pieces of the three exchanges: the credential block, the POST
 * with status handling, and debug rendering of request bodies.
 */

import { RequestFailed } from '../errors';
import type { Credential } from '../schemas/request-schema';
import type { ScreeningTransport, TransportResponse } from '../transport/types';
import { Logger } from '../utils/logger';
import { xmlElement } from '../xml/escape';
import { formatXml } from '../xml/formatter';
import { parseXmlDocument } from '../xml/response-parser';
import type { ParsedResponse } from './types';

const REDACTED = '********';

export function redactCredential(credential: Credential): Credential {
  return { username: credential.username, password: REDACTED };
}

export function partnerInfo(credential: Credential): string {
  return `<PartnerInfo>${xmlElement('UserName', credential.username)}${xmlElement('Password', credential.password)}</PartnerInfo>`;
}

/**
 * Logs the pretty-printed request at debug level, rendered with the
 * password replaced.
 */
export function logRequestBody(
  component: string,
  render: (credential: Credential) => string,
  credential: Credential
): void {
  if (!Logger.isDebugEnabled()) {
    return;
  }
  const preview = render(redactCredential(credential));
  Logger.debug(`[${component}] Request body:\n${formatXml(preview)}`);
}

/**
 * POSTs once. Anything but HTTP 200 is logged with the raw body and raised
 * as RequestFailed; so is a transport that rejects with any other error.
 */
export async function postXml(
  transport: ScreeningTransport,
  url: string,
  body: string,
  component: string
): Promise<TransportResponse> {
  let response: TransportResponse;
  try {
    response = await transport.post(url, body);
  } catch (error) {
    if (error instanceof RequestFailed) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new RequestFailed(`Transport failure for ${url}: ${reason}`, { cause: error });
  }

  if (response.status !== 200) {
    Logger.error(`[${component}] ✗ HTTP ${response.status} from ${url}`);
    if (response.body) {
      Logger.error(`[${component}] ✗ Server error body:\n${response.body}`);
    }
    throw new RequestFailed(`Request to ${url} failed with HTTP ${response.status}`, {
      status: response.status,
      body: response.body,
    });
  }

  return response;
}

export function toParsedResponse(response: TransportResponse): ParsedResponse {
  return {
    status: response.status,
    raw: response.body,
    document: parseXmlDocument(response.body),
  };
}

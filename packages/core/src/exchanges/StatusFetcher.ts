/**
 * Status Fetcher
 *
 * Asks for the status of a batch of file numbers in one
 * `<ReportStatusRequest>` and maps each `<Report>` of the response to a
 * StatusResult, in the order the server returns them.
 */

import { ResponseParseError, ValidationError } from '../errors';
import type { ServerEnvironment } from '../schemas/config-schema';
import { CredentialSchema, FileNumberSchema, type Credential } from '../schemas/request-schema';
import { parseOrThrow } from '../schemas/schema-validator';
import { resolveEndpoint } from '../transport/endpoints';
import { Logger } from '../utils/logger';
import { xmlElement } from '../xml/escape';
import {
  childElements,
  childText,
  hasChild,
  rootElement,
  type XmlElement,
} from '../xml/response-parser';
import { logRequestBody, partnerInfo, postXml, toParsedResponse } from './envelope';
import type { ExchangeContext, StatusResult } from './types';

const COMPONENT = 'StatusFetcher';

export function toStatusResult(report: XmlElement): StatusResult {
  const result: StatusResult = { fileNo: childText(report, 'FileNo') ?? '' };

  const errorText = childText(report, 'ErrorText');
  if (errorText !== undefined) {
    result.errorText = errorText;
  }
  if (hasChild(report, 'ReportStatus')) {
    result.status = 'Available';
    result.rawStatusPayload = report.ReportStatus;
  }
  return result;
}

export class StatusRequestBuilder {
  private fileNumbers: string[] = [];

  get size(): number {
    return this.fileNumbers.length;
  }

  add(fileNumber: string): this {
    this.fileNumbers.push(parseOrThrow(FileNumberSchema, fileNumber, 'file number'));
    return this;
  }

  async addAll(fileNumbers: Iterable<string> | AsyncIterable<string>): Promise<this> {
    for await (const fileNumber of fileNumbers) {
      this.add(fileNumber);
    }
    return this;
  }

  build(credential: Credential): string {
    if (this.fileNumbers.length === 0) {
      throw new ValidationError('status request', [
        { path: 'fileNumbers', message: 'at least one file number is required' },
      ]);
    }
    const reports = this.fileNumbers
      .map(fileNumber => `<Report>${xmlElement('FileNo', fileNumber)}</Report>`)
      .join('');
    return `<ReportStatusRequest>${partnerInfo(credential)}${reports}</ReportStatusRequest>`;
  }

  /**
   * One POST for the whole batch; a failed request yields no partial results.
   */
  async send(
    context: ExchangeContext,
    server: ServerEnvironment,
    credential: Credential
  ): Promise<StatusResult[]> {
    const validCredential = parseOrThrow(CredentialSchema, credential, 'credential');
    const body = this.build(validCredential);
    const url = resolveEndpoint(context.servers, server, 'status');

    logRequestBody(COMPONENT, c => this.build(c), validCredential);
    Logger.info(`[${COMPONENT}] Fetching status for ${this.fileNumbers.length} file(s) from ${url}`);

    const response = await postXml(context.transport, url, body, COMPONENT);

    let results: StatusResult[];
    try {
      const { document } = toParsedResponse(response);
      const root = rootElement(document);
      results = root ? childElements(root.element, 'Report').map(toStatusResult) : [];
    } catch (error) {
      if (error instanceof ResponseParseError) {
        Logger.error(`[${COMPONENT}] ✗ ${error.message}`);
      }
      throw error;
    }

    const failed = results.filter(result => result.errorText !== undefined).length;
    Logger.info(`[${COMPONENT}] ✓ ${results.length} report(s) returned, ${failed} with errors`);
    return results;
  }
}

export async function fetchStatus(
  context: ExchangeContext,
  server: ServerEnvironment,
  credential: Credential,
  fileNumbers: Iterable<string> | AsyncIterable<string>
): Promise<StatusResult[]> {
  const builder = new StatusRequestBuilder();
  await builder.addAll(fileNumbers);
  return builder.send(context, server, credential);
}

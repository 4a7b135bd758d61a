/**
 * Report Downloader
 *
 * Fetches report PDFs one file number at a time. A vendor error or a failed
 * request for one file is recorded on that file's result and the loop moves
 * on; malformed response XML and file-system errors still abort the call.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { RequestFailed } from '../errors';
import type { ServerEnvironment } from '../schemas/config-schema';
import { CredentialSchema, FileNumberListSchema, type Credential } from '../schemas/request-schema';
import { parseOrThrow } from '../schemas/schema-validator';
import { resolveEndpoint } from '../transport/endpoints';
import type { TransportResponse } from '../transport/types';
import { Logger } from '../utils/logger';
import { xmlElement } from '../xml/escape';
import { childElements, childText, rootElement, type XmlElement } from '../xml/response-parser';
import { logRequestBody, partnerInfo, postXml, toParsedResponse } from './envelope';
import type { DownloadResult, ExchangeContext } from './types';

const COMPONENT = 'ReportDownloader';

export function buildReportCopyRequest(credential: Credential, fileNumber: string): string {
  return `<ReportCopyRequest>${partnerInfo(credential)}${xmlElement('FileNo', fileNumber)}</ReportCopyRequest>`;
}

/**
 * The payload sits either directly under the root or in its first `<Report>`.
 */
function reportNode(document: XmlElement): XmlElement {
  const root = rootElement(document);
  if (!root) {
    return {};
  }
  const [report] = childElements(root.element, 'Report');
  return report ?? root.element;
}

export function reportPdfPath(outputDirectory: string, fileNumber: string): string {
  return path.join(outputDirectory, `${fileNumber}.pdf`);
}

async function downloadOne(
  context: ExchangeContext,
  url: string,
  credential: Credential,
  outputDirectory: string,
  fileNumber: string
): Promise<DownloadResult> {
  logRequestBody(COMPONENT, c => buildReportCopyRequest(c, fileNumber), credential);

  let response: TransportResponse;
  try {
    response = await postXml(context.transport, url, buildReportCopyRequest(credential, fileNumber), COMPONENT);
  } catch (error) {
    if (!(error instanceof RequestFailed)) {
      throw error;
    }
    Logger.error(`[${COMPONENT}] ✗ ${fileNumber}: ${error.message}`);
    return { fileNo: fileNumber, outcome: 'failed', reason: 'transport', error: error.message };
  }

  const report = reportNode(toParsedResponse(response).document);

  const errorText = childText(report, 'ErrorText');
  if (errorText !== undefined) {
    Logger.warn(`[${COMPONENT}] ✗ ${fileNumber}: vendor reported "${errorText}"`);
    return { fileNo: fileNumber, outcome: 'failed', reason: 'vendor', error: errorText };
  }

  const payload = childText(report, 'ReportPDF')?.replace(/\s+/g, '');
  if (!payload) {
    Logger.warn(`[${COMPONENT}] ✗ ${fileNumber}: response carried no PDF`);
    return {
      fileNo: fileNumber,
      outcome: 'failed',
      reason: 'empty',
      error: 'Response contained neither a report nor an error',
    };
  }

  const target = reportPdfPath(outputDirectory, fileNumber);
  await fs.writeFile(target, Buffer.from(payload, 'base64'));
  Logger.info(`[${COMPONENT}] ✓ ${fileNumber} written to ${target}`);
  return { fileNo: fileNumber, outcome: 'written', path: target };
}

/**
 * Sequential, one request per file number. Existing `{fileNo}.pdf` files are
 * overwritten.
 */
export async function downloadReports(
  context: ExchangeContext,
  server: ServerEnvironment,
  credential: Credential,
  outputDirectory: string,
  fileNumbers: Iterable<string>
): Promise<DownloadResult[]> {
  const validCredential = parseOrThrow(CredentialSchema, credential, 'credential');
  const numbers = parseOrThrow(FileNumberListSchema, Array.from(fileNumbers), 'file numbers');
  const url = resolveEndpoint(context.servers, server, 'download');

  const directory = path.resolve(outputDirectory);
  await fs.ensureDir(directory);
  Logger.info(`[${COMPONENT}] Downloading ${numbers.length} report(s) into ${directory}`);

  const results: DownloadResult[] = [];
  for (const fileNumber of numbers) {
    results.push(await downloadOne(context, url, validCredential, directory, fileNumber));
  }

  const written = results.filter(result => result.outcome === 'written').length;
  Logger.info(`[${COMPONENT}] ✓ ${written}/${results.length} report(s) written`);
  return results;
}

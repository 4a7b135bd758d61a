/**
 * Report Submitter
 *
 * Collects applicants into a single `<ScreenRequest>` envelope and posts it
 * once. The response is returned parsed but otherwise uninterpreted: the
 * vendor does not say whether a rejected applicant fails the whole batch.
 */

import { ResponseParseError, ValidationError } from '../errors';
import type { ApplicantInput } from '../schemas/applicant-schema';
import type { ServerEnvironment } from '../schemas/config-schema';
import {
  CredentialSchema,
  SubmissionTargetSchema,
  type Credential,
  type SubmissionTarget,
} from '../schemas/request-schema';
import { parseOrThrow } from '../schemas/schema-validator';
import { resolveEndpoint } from '../transport/endpoints';
import { Logger } from '../utils/logger';
import { encodeApplicant } from '../xml/applicant-encoder';
import { escapeXml, xmlElement } from '../xml/escape';
import { logRequestBody, partnerInfo, postXml, toParsedResponse } from './envelope';
import type { ExchangeContext, ParsedResponse } from './types';

const COMPONENT = 'ReportSubmitter';

export class ScreenRequestBuilder {
  private target: SubmissionTarget;
  private fragments: string[] = [];

  constructor(target: SubmissionTarget) {
    this.target = parseOrThrow(SubmissionTargetSchema, target, 'submission target');
  }

  get size(): number {
    return this.fragments.length;
  }

  /**
   * Validates and encodes one applicant; a ValidationError leaves the
   * builder unchanged.
   */
  add(applicant: ApplicantInput): this {
    this.fragments.push(encodeApplicant(applicant));
    return this;
  }

  async addAll(applicants: Iterable<ApplicantInput> | AsyncIterable<ApplicantInput>): Promise<this> {
    for await (const applicant of applicants) {
      this.add(applicant);
    }
    return this;
  }

  build(credential: Credential): string {
    if (this.fragments.length === 0) {
      throw new ValidationError('screen request', [
        { path: 'applicants', message: 'at least one applicant is required' },
      ]);
    }
    const { account, postBackUrl } = this.target;
    return (
      `<ScreenRequest>${partnerInfo(credential)}` +
      `<Account>${xmlElement('AcctNbr', account)}` +
      `<PostBackURL CredentialType='NONE'>${escapeXml(postBackUrl)}</PostBackURL>` +
      `${this.fragments.join('')}</Account></ScreenRequest>`
    );
  }

  async send(
    context: ExchangeContext,
    server: ServerEnvironment,
    credential: Credential
  ): Promise<ParsedResponse> {
    const validCredential = parseOrThrow(CredentialSchema, credential, 'credential');
    const body = this.build(validCredential);
    const url = resolveEndpoint(context.servers, server, 'submit');

    logRequestBody(COMPONENT, c => this.build(c), validCredential);
    Logger.info(`[${COMPONENT}] Submitting ${this.fragments.length} applicant(s) to ${url}`);

    const response = await postXml(context.transport, url, body, COMPONENT);
    try {
      const parsed = toParsedResponse(response);
      Logger.info(`[${COMPONENT}] ✓ Submission accepted (HTTP ${response.status})`);
      return parsed;
    } catch (error) {
      if (error instanceof ResponseParseError) {
        Logger.error(`[${COMPONENT}] ✗ ${error.message}`);
      }
      throw error;
    }
  }
}

/**
 * Submits every applicant in one request. `applicants` may be produced
 * incrementally; nothing is sent until all of them are validated.
 */
export async function submitReports(
  context: ExchangeContext,
  server: ServerEnvironment,
  credential: Credential,
  target: SubmissionTarget,
  applicants: Iterable<ApplicantInput> | AsyncIterable<ApplicantInput>
): Promise<ParsedResponse> {
  const builder = new ScreenRequestBuilder(target);
  await builder.addAll(applicants);
  return builder.send(context, server, credential);
}

/**
 * Screening Client
 *
 * Binds a validated config, a credential and a transport to the three
 * exchanges. Used by @bgscreen/cli; usable directly from code.
 *
 * @example
 * ```typescript
 * import { ScreeningClient, ConfigLoader } from '@bgscreen/core';
 *
 * const client = new ScreeningClient({
 *   config: ConfigLoader.load(),
 *   credential: ConfigLoader.loadCredential(),
 * });
 *
 * const statuses = await client.fetchStatus(['100234', '100235']);
 * ```
 */

import { ClientConfigSchema, type ClientConfig, type ClientConfigInput, type ServerEnvironment } from './schemas/config-schema';
import type { ApplicantInput } from './schemas/applicant-schema';
import { type Credential, type SubmissionTarget } from './schemas/request-schema';
import { parseOrThrow } from './schemas/schema-validator';
import { FetchTransport } from './transport/FetchTransport';
import type { ScreeningTransport } from './transport/types';
import { downloadReports } from './exchanges/ReportDownloader';
import { ScreenRequestBuilder } from './exchanges/ReportSubmitter';
import { fetchStatus } from './exchanges/StatusFetcher';
import type { DownloadResult, ExchangeContext, ParsedResponse, StatusResult } from './exchanges/types';
import { redactCredential } from './exchanges/envelope';
import { formatXml } from './xml/formatter';
import { Logger } from './utils/logger';

export interface ScreeningClientOptions {
  config: ClientConfigInput;
  credential: Credential;
  /** Defaults to a FetchTransport using config.timeoutMs */
  transport?: ScreeningTransport;
}

type Applicants = Iterable<ApplicantInput> | AsyncIterable<ApplicantInput>;

export class ScreeningClient {
  readonly config: ClientConfig;
  private credential: Credential;
  private context: ExchangeContext;

  constructor(options: ScreeningClientOptions) {
    this.config = parseOrThrow(ClientConfigSchema, options.config, 'client config');
    this.credential = options.credential;
    Logger.addSecret(this.credential.password);
    this.context = {
      transport: options.transport ?? new FetchTransport({ timeoutMs: this.config.timeoutMs }),
      servers: this.config.servers,
    };
  }

  get environment(): ServerEnvironment {
    return this.config.environment;
  }

  private submissionTarget(target?: Partial<SubmissionTarget>): SubmissionTarget {
    return {
      account: target?.account ?? this.config.account ?? '',
      postBackUrl: target?.postBackUrl ?? this.config.postBackUrl ?? '',
    };
  }

  private async collect(applicants: Applicants, target?: Partial<SubmissionTarget>): Promise<ScreenRequestBuilder> {
    const builder = new ScreenRequestBuilder(this.submissionTarget(target));
    return builder.addAll(applicants);
  }

  /**
   * Account and post-back URL default to the configured ones.
   */
  async submit(applicants: Applicants, target?: Partial<SubmissionTarget>): Promise<ParsedResponse> {
    const builder = await this.collect(applicants, target);
    return builder.send(this.context, this.environment, this.credential);
  }

  /**
   * The indented request body that `submit` would send, password masked.
   */
  async previewSubmission(applicants: Applicants, target?: Partial<SubmissionTarget>): Promise<string> {
    const builder = await this.collect(applicants, target);
    return formatXml(builder.build(redactCredential(this.credential)));
  }

  async fetchStatus(fileNumbers: Iterable<string> | AsyncIterable<string>): Promise<StatusResult[]> {
    return fetchStatus(this.context, this.environment, this.credential, fileNumbers);
  }

  async downloadReports(fileNumbers: Iterable<string>, outputDirectory?: string): Promise<DownloadResult[]> {
    return downloadReports(
      this.context,
      this.environment,
      this.credential,
      outputDirectory ?? this.config.outputDirectory,
      fileNumbers
    );
  }
}

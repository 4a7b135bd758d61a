/**
 * @bgscreen/core
 *
 * Client for the vendor's XML-over-HTTPS screening API: applicant encoding,
 * batch submission, status polling and report PDF download.
 */

// ============================================================================
// Client
// ============================================================================
export { ScreeningClient, type ScreeningClientOptions } from './ScreeningClient';

// ============================================================================
// Exchanges
// ============================================================================
export { ScreenRequestBuilder, submitReports } from './exchanges/ReportSubmitter';
export { StatusRequestBuilder, fetchStatus, toStatusResult } from './exchanges/StatusFetcher';
export {
  downloadReports,
  buildReportCopyRequest,
  reportPdfPath,
} from './exchanges/ReportDownloader';
export type {
  DownloadFailureReason,
  DownloadResult,
  ExchangeContext,
  ParsedResponse,
  StatusResult,
} from './exchanges/types';

// ============================================================================
// XML
// ============================================================================
export {
  APPLICANT_ELEMENTS,
  createApplicantRecord,
  digitsOnly,
  encodeApplicant,
  normalizePhone,
  type ApplicantElement,
} from './xml/applicant-encoder';
export { formatXml } from './xml/formatter';
export { escapeXml, xmlElement } from './xml/escape';
export {
  childElements,
  childText,
  parseXmlDocument,
  rootElement,
  type XmlElement,
  type XmlValue,
} from './xml/response-parser';

// ============================================================================
// Transport
// ============================================================================
export {
  ENDPOINT_PATHS,
  FetchTransport,
  MockTransport,
  resolveEndpoint,
  XML_CONTENT_TYPE,
  type FetchTransportConfig,
  type RecordedCall,
  type ScreeningOperation,
  type ScreeningTransport,
  type TransportResponse,
} from './transport';

// ============================================================================
// Schemas & Config
// ============================================================================
export * from './schemas';
export { ConfigLoader, DEFAULT_CONFIG_FILE, type LoadConfigOptions } from './utils/ConfigLoader';
export { EnvLoader } from './utils/env-loader';

// ============================================================================
// Errors & Logging
// ============================================================================
export {
  ConfigError,
  RequestFailed,
  ResponseParseError,
  ScreeningError,
  ValidationError,
  XmlSyntaxError,
  type ValidationIssue,
} from './errors';
export { Logger, parseVerbosity } from './utils/logger';

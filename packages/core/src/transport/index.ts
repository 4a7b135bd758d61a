export { type ScreeningTransport, type TransportResponse, XML_CONTENT_TYPE } from './types';
export { FetchTransport, type FetchTransportConfig } from './FetchTransport';
export { MockTransport, type RecordedCall } from './MockTransport';
export { ENDPOINT_PATHS, resolveEndpoint, type ScreeningOperation } from './endpoints';

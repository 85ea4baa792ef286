/**
 * Request types for the groundwater Sensor Observation Service.
 */

/** Endpoint and protocol settings injected into every request */
export interface SosServiceConfig {
  /** Service endpoint, without query string */
  baseUrl: string;
  /** SOS protocol version */
  version: string;
  /** Request timeout in milliseconds (0 = none) */
  timeout: number;
  /** Optional User-Agent header */
  userAgent?: string;
}

/** Fetches raw XML documents; implemented by SosClient, faked in tests */
export interface SosTransport {
  getXml(url: string): Promise<string>;
}

/**
 * Per-call pipeline settings, resolved once at the entry point and threaded
 * through every retrieval step.
 */

import { SosClient, type SosServiceConfig, type SosTransport } from "@gwsos/clients-core";
import { resolveServiceConfig } from "./config.js";
import { assertTimeZone } from "./ingestion/sos/datetime.js";
import type { ImportOptions } from "./ingestion/sos/importer.js";

/** Options accepted by the public entry points */
export interface FetchOptions {
  /** Convert timestamps to Date values (default: true) */
  parseDateTime?: boolean;
  /**
   * IANA zone for timestamps without an offset and for `tzCode`.
   * Default "" applies each record's embedded offset and reports UTC.
   */
  timezone?: string;
  /** Spatial reference for bounding-box requests */
  srsName?: string;
  /** Transport override (default: an SosClient built from `config`) */
  client?: SosTransport;
  /** Service config overrides */
  config?: Partial<SosServiceConfig>;
  /** Suppress progress logging */
  quiet?: boolean;
}

export interface RetrievalSettings extends ImportOptions {
  transport: SosTransport;
  config: SosServiceConfig;
  srsName?: string;
  quiet: boolean;
}

/**
 * @throws ConfigurationError for an unknown timezone or invalid config
 */
export function resolveSettings(options: FetchOptions = {}): RetrievalSettings {
  const timezone = options.timezone ?? "";
  assertTimeZone(timezone);
  const config = resolveServiceConfig(options.config);

  return {
    transport: options.client ?? new SosClient(config),
    config,
    parseDateTime: options.parseDateTime ?? true,
    timezone,
    srsName: options.srsName,
    quiet: options.quiet ?? false,
  };
}

export function logInfo(settings: Pick<RetrievalSettings, "quiet">, message: string): void {
  if (!settings.quiet) console.log(`[sos] ${message}`);
}

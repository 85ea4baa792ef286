/**
 * Service configuration.
 *
 * Resolution order: explicit overrides, then environment variables, then
 * built-in defaults.
 *
 * - GWSOS_BASE_URL    SOS endpoint
 * - GWSOS_TIMEOUT_MS  request timeout in milliseconds (0 = none)
 */

import { DEFAULT_SOS_VERSION, type SosServiceConfig } from "@gwsos/clients-core";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://cida.usgs.gov/ngwmn_cache/sos";

export const DEFAULT_SERVICE_CONFIG: Readonly<SosServiceConfig> = {
  baseUrl: DEFAULT_BASE_URL,
  version: DEFAULT_SOS_VERSION,
  timeout: 0,
};

function parseTimeout(raw: string): number {
  const timeout = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(timeout) || timeout < 0) {
    throw new ConfigurationError(`GWSOS_TIMEOUT_MS must be a non-negative integer, got "${raw}"`);
  }
  return timeout;
}

export function resolveServiceConfig(
  overrides: Partial<SosServiceConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): SosServiceConfig {
  const envTimeout = env["GWSOS_TIMEOUT_MS"];
  const config: SosServiceConfig = {
    baseUrl: overrides.baseUrl ?? env["GWSOS_BASE_URL"] ?? DEFAULT_SERVICE_CONFIG.baseUrl,
    version: overrides.version ?? DEFAULT_SERVICE_CONFIG.version,
    timeout: overrides.timeout ?? (envTimeout !== undefined ? parseTimeout(envTimeout) : DEFAULT_SERVICE_CONFIG.timeout),
  };
  if (overrides.userAgent) {
    config.userAgent = overrides.userAgent;
  }

  if (!config.baseUrl) {
    throw new ConfigurationError("Service base URL must not be empty");
  }
  if (!Number.isInteger(config.timeout) || config.timeout < 0) {
    throw new ConfigurationError(`Timeout must be a non-negative integer, got ${config.timeout}`);
  }
  return config;
}

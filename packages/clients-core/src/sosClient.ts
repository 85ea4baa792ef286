import type { FeatureSelector } from "@gwsos/types";
import { BaseClient } from "./baseClient.js";
import { buildFeatureOfInterestUrl, buildObservationUrl } from "./sosUrl.js";
import type { SosServiceConfig, SosTransport } from "./types.js";

export class SosClient implements SosTransport {
  private client: BaseClient;
  public readonly config: SosServiceConfig;

  constructor(config: SosServiceConfig) {
    this.config = config;
    this.client = new BaseClient({
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      userAgent: config.userAgent,
    });
  }

  /** URL of the GetObservation request for one feature */
  public observationUrl(featureId: string): string {
    return buildObservationUrl(this.config, featureId);
  }

  /** URL of the GetFeatureOfInterest request for a selector */
  public featureOfInterestUrl(selector: FeatureSelector, srsName?: string): string {
    return buildFeatureOfInterestUrl(this.config, selector, srsName);
  }

  /** Fetch a rendered SOS URL and return the raw XML document */
  public async getXml(url: string): Promise<string> {
    return this.client.getText(url);
  }
}

import axios, { type AxiosRequestConfig } from "axios";

export interface ClientConfig {
  /** Service endpoint (e.g., "https://cida.usgs.gov/ngwmn_cache/sos") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 0, no timeout) */
  timeout?: number;
  /** Optional User-Agent header */
  userAgent?: string;
}

/** Ordered query parameters; values are encoded when the URL is rendered */
export type QueryParams = ReadonlyArray<readonly [name: string, value: string]>;

/**
 * Render a request URL. Every parameter name and value is percent-encoded,
 * reserved characters included.
 */
export function renderUrl(baseUrl: string, query: QueryParams): string {
  const base = baseUrl.replace(/[?&]+$/, "");
  const search = query
    .map(([name, value]) => encodeURIComponent(name) + "=" + encodeURIComponent(value))
    .join("&");
  if (!search) return base;
  return base + (base.includes("?") ? "&" : "?") + search;
}

export class BaseClient {
  protected baseUrl: string;
  protected timeout: number;
  protected userAgent?: string;

  constructor(config: ClientConfig) {
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 0;
    this.userAgent = config.userAgent;
  }

  public buildUrl(query: QueryParams): string {
    return renderUrl(this.baseUrl, query);
  }

  protected buildConfig(): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      timeout: this.timeout,
      responseType: "text",
      headers: {
        Accept: "text/xml",
      },
    };

    if (this.userAgent) {
      config.headers = {
        ...config.headers,
        "User-Agent": this.userAgent,
      };
    }

    return config;
  }

  /** GET a fully rendered URL and return the body as text */
  public async getText(url: string): Promise<string> {
    const config = this.buildConfig();
    const response = await axios.get<string>(url, config);
    return response.data;
  }
}

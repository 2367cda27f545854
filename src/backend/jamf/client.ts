import https from "node:https";
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { extractDeviceId } from "./xml.js";

/** Classic API computer commands this client dispatches. */
export type ComputerCommand = "EnableRemoteDesktop";

export interface JamfClassicClientConfig {
  /** Server URL without a trailing slash, e.g. `https://jss.example.com:8443`. */
  baseUrl: string;
  username: string;
  password: string;
  /** Request timeout; the HTTP client's default applies when omitted. */
  timeoutMs?: number;
  /** Skip TLS certificate verification. Only for self-signed test servers. */
  allowInsecureTls?: boolean;
  /** Custom transport, used by tests to answer requests in-process. */
  adapter?: AxiosAdapter;
}

export type JamfApiErrorKind = "http" | "network";

/**
 * A failed Classic API call. Carries the request path and status, never the
 * credentials.
 */
export class JamfApiError extends Error {
  public readonly kind: JamfApiErrorKind;
  public readonly details: Record<string, unknown>;

  public constructor(kind: JamfApiErrorKind, message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "JamfApiError";
    this.kind = kind;
    this.details = details;
  }

  get status(): number | undefined {
    const status = this.details.status;
    return typeof status === "number" ? status : undefined;
  }
}

/**
 * Minimal client for the Jamf Pro Classic API (`/JSSResource`) using HTTP
 * Basic authentication.
 */
export class JamfClassicClient {
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(config: JamfClassicClientConfig) {
    this.baseUrl = config.baseUrl;
    this.http = axios.create({
      auth: { username: config.username, password: config.password },
      timeout: config.timeoutMs,
      httpsAgent: config.allowInsecureTls ? new https.Agent({ rejectUnauthorized: false }) : undefined,
      adapter: config.adapter,
      // A redirect is reported as its 3xx status, never followed.
      maxRedirects: 0,
      // Status handling is ours: every response resolves and is checked below.
      validateStatus: () => true,
    });
  }

  /**
   * Fetch the raw XML record of the computer with the given serial number.
   *
   * @throws JamfApiError on transport failure or a non-2xx status.
   */
  async getComputerXmlBySerial(serialNumber: string): Promise<string> {
    const path = `/JSSResource/computers/serialnumber/${encodeURIComponent(serialNumber)}`;
    const res = await this.request<string>(path, () =>
      this.http.get<string>(this.baseUrl + path, {
        headers: { accept: "application/xml" },
        responseType: "text",
      })
    );
    return typeof res.data === "string" ? res.data : "";
  }

  /**
   * Resolve a serial number to the server's internal device id.
   *
   * @returns the id, or `""` when the record carries none.
   * @throws JamfApiError on transport failure or a non-2xx status.
   */
  async lookupDeviceId(serialNumber: string): Promise<string> {
    return extractDeviceId(await this.getComputerXmlBySerial(serialNumber));
  }

  /**
   * Queue a computer command for the given device id.
   *
   * @returns the HTTP status of the accepted request.
   * @throws JamfApiError on transport failure or a non-2xx status.
   */
  async sendComputerCommand(command: ComputerCommand, deviceId: string): Promise<number> {
    const path = `/JSSResource/computercommands/command/${command}/id/${encodeURIComponent(deviceId)}`;
    const res = await this.request<unknown>(path, () => this.http.post(this.baseUrl + path));
    return res.status;
  }

  private async request<T>(path: string, send: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    let res: AxiosResponse<T>;
    try {
      res = await send();
    } catch (e) {
      if (axios.isAxiosError(e)) {
        throw new JamfApiError("network", `Request to ${path} failed: ${e.message}`, {
          path,
          code: e.code,
        });
      }
      throw e;
    }

    if (res.status < 200 || res.status >= 300) {
      throw new JamfApiError("http", `Request to ${path} returned HTTP ${res.status}`, {
        path,
        status: res.status,
        statusText: res.statusText,
      });
    }
    return res;
  }
}

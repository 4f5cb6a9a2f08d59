import fetch, { type Response } from "node-fetch";
import type {
  CommandEnvelope,
  DeviceListResponse,
  DeviceRecord,
  DeviceStatusResponse,
} from "./models.js";
import type { Logger } from "./logger.js";
import { isRecord } from "./utils.js";

/**
 * Device API surface used by the bridge.
 */
export interface DeviceApi {
  listDevices(): Promise<DeviceRecord[]>;
  getDeviceStatus(deviceId: string): Promise<DeviceStatusResponse>;
  sendCommands(deviceId: string, envelope: CommandEnvelope): Promise<unknown>;
}

export interface Options {
  token: string;
  baseUrl?: string;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  logger?: Logger;
}

/**
 * Non-2xx response. `body` holds the response text for diagnostics.
 */
export class ApiError extends Error {
  constructor(
    readonly method: string,
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${method} ${url} failed with status ${status}${body ? `: ${body}` : ""}`);
    this.name = "ApiError";
  }
}

function isDeviceRecord(item: unknown): item is DeviceRecord {
  return isRecord(item) && typeof item.deviceId === "string" && item.deviceId.length > 0;
}

export class SmartThingsApi implements DeviceApi {
  private readonly token: string;

  private readonly baseUrl: string;

  private readonly timeout: number;

  private readonly logger: Logger;

  constructor(options: Options) {
    this.token = options.token;
    // URL resolution drops the last path segment unless the base ends with "/"
    this.baseUrl = `${(options.baseUrl ?? "https://api.smartthings.com/v1").replace(/\/+$/, "")}/`;
    this.timeout = options.timeout ?? 20_000;
    this.logger = options.logger ?? console;
  }

  private async request(
    method: "get" | "post",
    endpoint: string,
    body?: unknown,
  ): Promise<Response> {
    const url = new URL(endpoint, this.baseUrl).href;
    this.logger.log(`${method.toUpperCase()} ${url}`);
    const response = await fetch(url, {
      method,
      headers: {
        authorization: `Bearer ${this.token}`,
        "content-type": "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeout),
    });
    if (!response.ok) {
      throw new ApiError(method.toUpperCase(), url, response.status, await response.text());
    }
    return response;
  }

  public async listDevices(): Promise<DeviceRecord[]> {
    const devices: DeviceRecord[] = [];
    let endpoint: string | undefined = "devices";
    while (endpoint != null) {
      const response = await this.request("get", endpoint);
      const page = (await response.json()) as DeviceListResponse;
      devices.push(...(page.items ?? []).filter(isDeviceRecord));
      endpoint = page._links?.next?.href ?? undefined;
    }
    return devices;
  }

  public async getDeviceStatus(deviceId: string): Promise<DeviceStatusResponse> {
    const response = await this.request(
      "get",
      `devices/${encodeURIComponent(deviceId)}/status`,
    );
    return (await response.json()) as DeviceStatusResponse;
  }

  public async sendCommands(
    deviceId: string,
    envelope: CommandEnvelope,
  ): Promise<unknown> {
    const response = await this.request(
      "post",
      `devices/${encodeURIComponent(deviceId)}/commands`,
      envelope,
    );
    const text = await response.text();
    return text.length > 0 ? (JSON.parse(text) as unknown) : {};
  }
}

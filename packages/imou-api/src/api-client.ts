import { createHash } from "node:crypto";
import { v4 as uuid } from "uuid";
import type { ImouClientConfig } from "./config.js";
import {
  ApiError,
  ConnectionFailedError,
  InvalidConfigurationError,
  InvalidResponseError,
  NotAuthorizedError,
  errorMessage,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  accessTokenSchema,
  apiEnvelopeSchema,
  expectShape,
  type AlarmQuery,
  type ApiData,
  type ImouDeviceApi,
} from "./types.js";

const API_VERSION = "1.0";
const TOKEN_EXPIRED_CODES = new Set(["TK1002", "TK1003"]);
const INVALID_CONFIGURATION_CODES = new Set(["OP1008", "SN1001"]);
const NOT_AUTHORIZED_CODES = new Set(["OP1009"]);

class TokenExpiredError extends ApiError {}

export interface SystemBlock {
  ver: string;
  sign: string;
  appId: string;
  time: number;
  nonce: string;
}

/** md5 over "time:<t>,nonce:<n>,appSecret:<s>", lower-case hex. */
export function signRequest(time: number, nonce: string, appSecret: string): string {
  return createHash("md5").update(`time:${time},nonce:${nonce},appSecret:${appSecret}`).digest("hex");
}

export class ImouApiClient implements ImouDeviceApi {
  private accessToken: string | null = null;
  private connected = false;

  constructor(
    private readonly config: ImouClientConfig,
    private readonly logger: Logger = createLogger("ImouApi"),
  ) {}

  getBaseUrl(): string {
    return this.config.baseUrl;
  }

  /** Request timeout in seconds. */
  getTimeout(): number {
    return this.config.timeout;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Obtain an access token; every other call does this first when needed. */
  async connect(): Promise<void> {
    this.connected = false;
    this.accessToken = null;
    const data = await this.call("accessToken", {}, false);
    const { accessToken } = expectShape(accessTokenSchema, data, "accessToken");
    this.accessToken = accessToken;
    this.connected = true;
    this.logger.debug(`Connected to ${this.config.baseUrl}`);
  }

  async deviceBaseList(): Promise<ApiData> {
    return this.call("deviceBaseList", {
      bindId: -1,
      limit: 128,
      type: "bindAndShare",
      needApInfo: false,
    });
  }

  async deviceBaseDetailList(deviceIds: string[]): Promise<ApiData> {
    return this.call("deviceBaseDetailList", {
      deviceList: deviceIds.map((deviceId) => ({ deviceId, channelList: "0" })),
    });
  }

  async deviceOnline(deviceId: string): Promise<ApiData> {
    return this.call("deviceOnline", { deviceId });
  }

  async getDeviceCameraStatus(deviceId: string, enableType: string): Promise<ApiData> {
    return this.call("getDeviceCameraStatus", { deviceId, channelId: "0", enableType });
  }

  async setDeviceCameraStatus(deviceId: string, enableType: string, enable: boolean): Promise<ApiData> {
    return this.call("setDeviceCameraStatus", { deviceId, channelId: "0", enableType, enable });
  }

  async getAlarmMessage(deviceId: string, query: AlarmQuery): Promise<ApiData> {
    return this.call("getAlarmMessage", {
      deviceId,
      channelId: query.channelId ?? "0",
      beginTime: query.beginTime,
      endTime: query.endTime,
      count: query.count,
    });
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private async call(method: string, params: Record<string, unknown>, authenticated = true): Promise<ApiData> {
    if (authenticated && !this.connected) {
      await this.connect();
    }

    try {
      return await this.send(method, params, authenticated);
    } catch (err) {
      // Tokens expire server-side; reconnect once and replay the request
      if (authenticated && err instanceof TokenExpiredError) {
        this.logger.debug(`Token expired during ${method}, reconnecting`);
        await this.connect();
        return this.send(method, params, authenticated);
      }
      throw err;
    }
  }

  private async send(method: string, params: Record<string, unknown>, authenticated: boolean): Promise<ApiData> {
    const time = Math.floor(Date.now() / 1000);
    const nonce = uuid();
    const system: SystemBlock = {
      ver: API_VERSION,
      sign: signRequest(time, nonce, this.config.appSecret),
      appId: this.config.appId,
      time,
      nonce,
    };
    const body = {
      system,
      params: authenticated ? { ...params, token: this.accessToken } : params,
      id: uuid(),
    };
    const url = `https://${this.config.baseUrl}/openapi/${method}`;
    this.logger.debug(`POST ${url} ${JSON.stringify(params)}`);

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeout * 1000),
      });
    } catch (err) {
      throw new ConnectionFailedError(`${method} request to ${this.config.baseUrl} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      throw new ApiError(`${method} failed: ${res.status} ${res.statusText}`);
    }

    const text = await res.text();
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      throw new InvalidResponseError(`${method}: unable to parse response ${text}`, { cause: err });
    }

    const { result } = expectShape(apiEnvelopeSchema, payload, "result.code");
    if (result.code !== "0") {
      const message = `${result.code}: ${result.msg ?? "unknown error"}`;
      if (TOKEN_EXPIRED_CODES.has(result.code)) throw new TokenExpiredError(message);
      if (INVALID_CONFIGURATION_CODES.has(result.code)) throw new InvalidConfigurationError(message);
      if (NOT_AUTHORIZED_CODES.has(result.code)) throw new NotAuthorizedError(message);
      throw new ApiError(message);
    }
    return result.data ?? {};
  }
}

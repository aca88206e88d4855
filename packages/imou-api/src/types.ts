import { z } from "zod";
import { InvalidResponseError } from "./errors.js";

/** Parsed `result.data` of an Open API call. */
export type ApiData = Record<string, unknown>;

export type Platform = "switch" | "sensor" | "binary_sensor";

export const PLATFORMS: readonly Platform[] = ["switch", "sensor", "binary_sensor"];

export interface AlarmQuery {
  count: number;
  /** "YYYY-MM-DD HH:mm:ss", device-local time */
  beginTime: string;
  endTime: string;
  channelId?: string;
}

/**
 * The subset of the Open API the device layer needs. `ImouApiClient`
 * implements it against the cloud; tests provide an in-process fake.
 */
export interface ImouDeviceApi {
  deviceBaseList(): Promise<ApiData>;
  deviceBaseDetailList(deviceIds: string[]): Promise<ApiData>;
  deviceOnline(deviceId: string): Promise<ApiData>;
  getDeviceCameraStatus(deviceId: string, enableType: string): Promise<ApiData>;
  setDeviceCameraStatus(deviceId: string, enableType: string, enable: boolean): Promise<ApiData>;
  getAlarmMessage(deviceId: string, query: AlarmQuery): Promise<ApiData>;

  getBaseUrl(): string;
  getTimeout(): number;
  isConnected(): boolean;
}

// ── Response Envelope ──────────────────────────────────────────────────────

export const apiEnvelopeSchema = z.object({
  result: z.object({
    code: z.string(),
    msg: z.string().optional(),
    data: z.record(z.unknown()).optional(),
  }),
});

export const accessTokenSchema = z.object({
  accessToken: z.string().min(1),
  expireTime: z.number().optional(),
});

// ── Device Payloads ────────────────────────────────────────────────────────

export const deviceBaseListSchema = z.object({
  count: z.number(),
  deviceList: z.array(z.unknown()),
});

export const deviceEntrySchema = z.object({ deviceId: z.string() }).passthrough();

export const deviceDetailListSchema = z.object({
  deviceList: z.array(z.unknown()),
});

export const deviceDetailSchema = z
  .object({
    catalog: z.string(),
    version: z.string(),
    name: z.string(),
    deviceModel: z.string(),
    status: z.string(),
    ability: z.string(),
  })
  .passthrough();

export const onlineStatusSchema = z.object({ onLine: z.string() }).passthrough();

export const cameraStatusSchema = z.object({ status: z.string() }).passthrough();

export const alarmMessageSchema = z.object({
  alarms: z.array(z.object({ time: z.number() }).passthrough()),
});

// ── Diagnostics ────────────────────────────────────────────────────────────

export interface EntityDiagnostics {
  name: string;
  description: string;
  state: boolean | string | null;
  isEnabled: boolean;
  isUpdated: boolean;
}

export interface DeviceDiagnostics {
  api: {
    baseUrl: string;
    timeout: number;
    isConnected: boolean;
  };
  device: {
    id: string;
    name: string;
    catalog: string;
    givenName: string;
    model: string;
    firmware: string;
    manufacturer: string;
    online: "yes" | "no";
  };
  capabilities: Array<{ name: string; description: string }>;
  switches: EntityDiagnostics[];
  sensors: EntityDiagnostics[];
  binarySensors: EntityDiagnostics[];
}

/**
 * Validate an API payload, turning any mismatch into an `InvalidResponseError`
 * that carries the raw payload.
 */
export function expectShape<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InvalidResponseError(`${what} not found in ${JSON.stringify(data)}`, { cause: result.error });
  }
  return result.data;
}

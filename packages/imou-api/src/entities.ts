import { BINARY_SENSORS, IMOU_SWITCHES, SENSORS } from "./constants.js";
import { createLogger, type Logger } from "./logger.js";
import {
  alarmMessageSchema,
  cameraStatusSchema,
  expectShape,
  onlineStatusSchema,
  type ImouDeviceApi,
  type Platform,
} from "./types.js";

const ALARM_LOOKBACK_MS = 30 * 24 * 60 * 60 * 1000;

/** One observable or controllable property of a device. */
export abstract class ImouEntity {
  abstract readonly platform: Platform;

  protected enabled = true;
  protected updated = false;

  constructor(
    protected readonly apiClient: ImouDeviceApi,
    protected readonly deviceId: string,
    protected readonly deviceName: string,
    protected readonly sensorType: string,
    protected readonly logger: Logger = createLogger("ImouEntity"),
  ) {}

  getDeviceId(): string {
    return this.deviceId;
  }

  getDeviceName(): string {
    return this.deviceName;
  }

  getName(): string {
    return this.sensorType;
  }

  abstract getDescription(): string;

  /** Current state as reported in diagnostics. */
  abstract getStateValue(): boolean | string | null;

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(value: boolean): void {
    this.enabled = value;
  }

  /** Whether the state has been fetched (or written) at least once. */
  isUpdated(): boolean {
    return this.updated;
  }

  /**
   * Refresh the state from the API. Disabled entities, and types the API has
   * no call for, are left untouched.
   */
  async update(): Promise<void> {
    if (!this.enabled) return;
    if (!(await this.refresh())) return;
    this.updated = true;
    this.logger.debug(`[${this.deviceName}] ${this.sensorType} updated: ${String(this.getStateValue())}`);
  }

  /** Fetch the state; false when nothing was fetched. */
  protected abstract refresh(): Promise<boolean>;
}

export class ImouSwitch extends ImouEntity {
  readonly platform = "switch" as const;
  private state = false;

  getDescription(): string {
    return IMOU_SWITCHES[this.sensorType] ?? this.sensorType;
  }

  getStateValue(): boolean {
    return this.state;
  }

  isOn(): boolean {
    return this.state;
  }

  async turnOn(): Promise<void> {
    await this.write(true);
  }

  async turnOff(): Promise<void> {
    await this.write(false);
  }

  async toggle(): Promise<void> {
    await this.write(!this.state);
  }

  protected async refresh(): Promise<boolean> {
    const data = await this.apiClient.getDeviceCameraStatus(this.deviceId, this.sensorType);
    const { status } = expectShape(cameraStatusSchema, data, "status");
    this.state = status === "on";
    return true;
  }

  private async write(enable: boolean): Promise<void> {
    await this.apiClient.setDeviceCameraStatus(this.deviceId, this.sensorType, enable);
    this.state = enable;
    this.updated = true;
    this.logger.debug(`[${this.deviceName}] ${this.sensorType} set to ${enable ? "on" : "off"}`);
  }
}

export class ImouSensor extends ImouEntity {
  readonly platform = "sensor" as const;
  private state: string | null = null;

  getDescription(): string {
    return SENSORS[this.sensorType] ?? this.sensorType;
  }

  getStateValue(): string | null {
    return this.state;
  }

  /** ISO-8601 timestamp of the most recent alarm, `null` if none in the last 30 days. */
  getState(): string | null {
    return this.state;
  }

  protected async refresh(): Promise<boolean> {
    if (this.sensorType !== "lastAlarm") return false;

    const end = new Date();
    const begin = new Date(end.getTime() - ALARM_LOOKBACK_MS);
    const data = await this.apiClient.getAlarmMessage(this.deviceId, {
      count: 1,
      beginTime: formatApiTime(begin),
      endTime: formatApiTime(end),
    });
    const { alarms } = expectShape(alarmMessageSchema, data, "alarms");
    const latest = alarms[0];
    this.state = latest ? new Date(latest.time * 1000).toISOString() : null;
    return true;
  }
}

export class ImouBinarySensor extends ImouEntity {
  readonly platform = "binary_sensor" as const;
  private state = false;

  getDescription(): string {
    return BINARY_SENSORS[this.sensorType] ?? this.sensorType;
  }

  getStateValue(): boolean {
    return this.state;
  }

  isOn(): boolean {
    return this.state;
  }

  protected async refresh(): Promise<boolean> {
    if (this.sensorType !== "online") return false;

    const data = await this.apiClient.deviceOnline(this.deviceId);
    const { onLine } = expectShape(onlineStatusSchema, data, "onLine");
    this.state = onLine === "1";
    return true;
  }
}

export type AnyImouEntity = ImouSwitch | ImouSensor | ImouBinarySensor;

/** Local wall-clock time in the "YYYY-MM-DD HH:mm:ss" form the alarm API takes. */
export function formatApiTime(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

import {
  ALWAYS_PRESENT_CAPABILITY,
  BINARY_SENSORS,
  IMOU_CAPABILITIES,
  IMOU_SWITCHES,
  MANUFACTURER,
  PLACEHOLDER,
  SENSORS,
  labelFor,
} from "./constants.js";
import { InvalidResponseError } from "./errors.js";
import { ImouBinarySensor, ImouSensor, ImouSwitch, type AnyImouEntity, type ImouEntity } from "./entities.js";
import { createLogger, type Logger } from "./logger.js";
import {
  PLATFORMS,
  deviceDetailListSchema,
  deviceDetailSchema,
  expectShape,
  onlineStatusSchema,
  type DeviceDiagnostics,
  type EntityDiagnostics,
  type ImouDeviceApi,
} from "./types.js";

interface EntitiesByPlatform {
  switch: ImouSwitch[];
  sensor: ImouSensor[];
  binary_sensor: ImouBinarySensor[];
}

/** A camera or sensor registered on the Imou account. */
export class ImouDevice {
  private catalog = PLACEHOLDER;
  private firmware = PLACEHOLDER;
  private name = PLACEHOLDER;
  private givenName = "";
  private deviceModel = PLACEHOLDER;
  private readonly manufacturer = MANUFACTURER;
  private online = false;
  private capabilities: string[] = [];
  private entities: EntitiesByPlatform = { switch: [], sensor: [], binary_sensor: [] };

  private initialized = false;
  private enabled = true;

  constructor(
    private readonly apiClient: ImouDeviceApi,
    private readonly deviceId: string,
    private readonly logger: Logger = createLogger("ImouDevice"),
  ) {}

  getDeviceId(): string {
    return this.deviceId;
  }

  /** The user-given name when set, else the name registered with Imou. */
  getName(): string {
    return this.givenName !== "" ? this.givenName : this.name;
  }

  setName(givenName: string): void {
    this.givenName = givenName;
  }

  getModel(): string {
    return this.deviceModel;
  }

  getManufacturer(): string {
    return this.manufacturer;
  }

  getFirmware(): string {
    return this.firmware;
  }

  getCatalog(): string {
    return this.catalog;
  }

  isOnline(): boolean {
    return this.online;
  }

  getCapabilities(): readonly string[] {
    return this.capabilities;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  setEnabled(value: boolean): void {
    this.enabled = value;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Every entity: switches, then sensors, then binary sensors. */
  getAllSensors(): AnyImouEntity[] {
    return PLATFORMS.flatMap((platform): AnyImouEntity[] => this.entities[platform]);
  }

  getSensorsByPlatform(platform: string): ImouEntity[] {
    if (!isPlatform(platform)) return [];
    return [...this.entities[platform]];
  }

  getSensorByName(name: string): AnyImouEntity | null {
    return this.getAllSensors().find((entity) => entity.getName() === name) ?? null;
  }

  /** Fetch the device details and create its entities. */
  async initialize(): Promise<void> {
    const response = await this.apiClient.deviceBaseDetailList([this.deviceId]);
    const { deviceList } = expectShape(deviceDetailListSchema, response, "deviceList");
    if (deviceList.length !== 1) {
      throw new InvalidResponseError(`deviceList not found in ${JSON.stringify(response)}`);
    }

    const raw = deviceList[0];
    const parsed = deviceDetailSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidResponseError(`missing parameter or error parsing in ${JSON.stringify(raw)}`, {
        cause: parsed.error,
      });
    }
    const detail = parsed.data;

    this.catalog = detail.catalog;
    this.firmware = detail.version;
    this.name = detail.name;
    this.deviceModel = detail.deviceModel;
    this.online = detail.status === "online";
    this.capabilities = detail.ability.split(",");
    // The API leaves motionDetect out of the ability list
    if (!this.capabilities.includes(ALWAYS_PRESENT_CAPABILITY)) {
      this.capabilities.push(ALWAYS_PRESENT_CAPABILITY);
    }

    const entities: EntitiesByPlatform = { switch: [], sensor: [], binary_sensor: [] };
    const lowered = this.capabilities.map((c) => c.toLowerCase());
    for (const switchType of Object.keys(IMOU_SWITCHES)) {
      if (lowered.includes(switchType.toLowerCase())) {
        entities.switch.push(new ImouSwitch(this.apiClient, this.deviceId, this.getName(), switchType, this.logger));
      }
    }
    entities.sensor.push(new ImouSensor(this.apiClient, this.deviceId, this.getName(), "lastAlarm", this.logger));
    entities.binary_sensor.push(
      new ImouBinarySensor(this.apiClient, this.deviceId, this.getName(), "online", this.logger),
    );
    this.entities = entities;

    this.logger.debug(`Retrieved device ${this.toString()}`);
    this.logger.debug(`Device details:\n${this.dump()}`);
    this.initialized = true;
  }

  /**
   * Refresh the online flag and, when the device is online, every entity in
   * turn. Returns false without calling the API when the device is disabled.
   */
  async getData(): Promise<boolean> {
    if (!this.enabled) return false;
    if (!this.initialized) {
      await this.initialize();
    }

    this.logger.debug(`[${this.getName()}] update requested`);
    const data = await this.apiClient.deviceOnline(this.deviceId);
    const { onLine } = expectShape(onlineStatusSchema, data, "onLine");
    this.online = onLine === "1";

    if (this.online) {
      for (const entity of this.getAllSensors()) {
        await entity.update();
      }
    }
    return true;
  }

  toString(): string {
    return `${this.name} (${this.deviceModel}, serial ${this.deviceId})`;
  }

  getDiagnostics(): DeviceDiagnostics {
    return {
      api: {
        baseUrl: this.apiClient.getBaseUrl(),
        timeout: this.apiClient.getTimeout(),
        isConnected: this.apiClient.isConnected(),
      },
      device: {
        id: this.deviceId,
        name: this.name,
        catalog: this.catalog,
        givenName: this.givenName,
        model: this.deviceModel,
        firmware: this.firmware,
        manufacturer: this.manufacturer,
        online: this.online ? "yes" : "no",
      },
      capabilities: this.capabilities.map((name) => ({
        name,
        description: labelFor(IMOU_CAPABILITIES, name),
      })),
      switches: this.entities.switch.map((e) => entityDiagnostics(e, IMOU_SWITCHES)),
      sensors: this.entities.sensor.map((e) => entityDiagnostics(e, SENSORS)),
      binarySensors: this.entities.binary_sensor.map((e) => entityDiagnostics(e, BINARY_SENSORS)),
    };
  }

  /** Multi-line, human-readable rendering of `getDiagnostics()`. */
  dump(): string {
    const data = this.getDiagnostics();
    const lines = [
      `- Device ID: ${data.device.id}`,
      `    Name: ${data.device.name}`,
      `    Catalog: ${data.device.catalog}`,
      `    Model: ${data.device.model}`,
      `    Firmware: ${data.device.firmware}`,
      `    Online: ${data.device.online}`,
      "    Capabilities:",
      ...data.capabilities.map((c) => `        - ${c.description}`),
      "    Switches:",
      ...data.switches.map(stateLine),
      "    Sensors:",
      ...data.sensors.map(stateLine),
      "    Binary Sensors:",
      ...data.binarySensors.map(stateLine),
    ];
    return lines.map((line) => `${line}\n`).join("");
  }
}

function isPlatform(value: string): value is keyof EntitiesByPlatform {
  return PLATFORMS.some((platform) => platform === value);
}

function entityDiagnostics(entity: ImouEntity, table: Readonly<Record<string, string>>): EntityDiagnostics {
  const name = entity.getName();
  return {
    name,
    description: labelFor(table, name),
    state: entity.getStateValue(),
    isEnabled: entity.isEnabled(),
    isUpdated: entity.isUpdated(),
  };
}

function stateLine(entity: EntityDiagnostics): string {
  return `        - ${entity.description}: ${String(entity.state)}`;
}

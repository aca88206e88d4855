import { ImouDevice } from "./device.js";
import { createLogger, type Logger } from "./logger.js";
import { deviceBaseListSchema, deviceEntrySchema, expectShape, type ImouDeviceApi } from "./types.js";

export class ImouDiscoveryService {
  constructor(
    private readonly apiClient: ImouDeviceApi,
    private readonly logger: Logger = createLogger("ImouDiscovery"),
    private readonly deviceLogger: Logger = createLogger("ImouDevice"),
  ) {}

  /**
   * List the devices registered on the account and initialize each one, in
   * the order the API returns them. Keys are display names; a later device
   * with the same name replaces the earlier one.
   */
  async discoverDevices(): Promise<Map<string, ImouDevice>> {
    this.logger.debug("Starting discovery");
    const response = await this.apiClient.deviceBaseList();
    const { count, deviceList } = expectShape(deviceBaseListSchema, response, "deviceList or count");
    this.logger.debug(`Discovered ${count} registered devices`);

    const devices = new Map<string, ImouDevice>();
    for (const entry of deviceList) {
      const { deviceId } = expectShape(deviceEntrySchema, entry, "deviceId");
      const device = new ImouDevice(this.apiClient, deviceId, this.deviceLogger);
      await device.initialize();
      this.logger.debug(`   - ${device.toString()}`);
      devices.set(device.getName(), device);
    }
    return devices;
  }
}

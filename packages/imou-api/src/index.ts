export { ImouApiClient, signRequest } from "./api-client.js";
export type { SystemBlock } from "./api-client.js";
export { loadConfig, parseConfig, clientConfigSchema, DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from "./config.js";
export type { ImouClientConfig, ImouClientConfigInput } from "./config.js";
export {
  IMOU_CAPABILITIES,
  IMOU_SWITCHES,
  SENSORS,
  BINARY_SENSORS,
  MANUFACTURER,
  PLACEHOLDER,
} from "./constants.js";
export { ImouDevice } from "./device.js";
export { ImouDiscoveryService } from "./discovery.js";
export { ImouEntity, ImouSwitch, ImouSensor, ImouBinarySensor, formatApiTime } from "./entities.js";
export type { AnyImouEntity } from "./entities.js";
export {
  ImouError,
  InvalidResponseError,
  ConnectionFailedError,
  ApiError,
  InvalidConfigurationError,
  NotAuthorizedError,
} from "./errors.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { PLATFORMS } from "./types.js";
export type {
  ApiData,
  AlarmQuery,
  Platform,
  ImouDeviceApi,
  DeviceDiagnostics,
  EntityDiagnostics,
} from "./types.js";

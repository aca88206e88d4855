import { readFileSync } from "node:fs";
import { z } from "zod";

export const MANUFACTURER = "Imou";
export const PLACEHOLDER = "N.A.";

/** Capability forced into every device: the API omits it for cameras that support it. */
export const ALWAYS_PRESENT_CAPABILITY = "motionDetect";

/**
 * Switchable features, keyed by the `enableType` the API expects.
 * Table order decides the order switches are created in.
 */
export const IMOU_SWITCHES: Readonly<Record<string, string>> = {
  motionDetect: "Motion Detection",
  headerDetect: "Human Detection",
  faceDetect: "Face Detection",
  mobileDetect: "Vehicle Detection",
  abAlarmSound: "Abnormal Alarm Sound",
  breathingLight: "Status Light",
  closeCamera: "Privacy Mode",
  linkDevAlarm: "Linked Device Alarm",
  linkageSiren: "Siren on Alarm",
  whiteLight: "Spotlight",
  infraredLight: "Infrared Light",
  smartTrack: "Smart Tracking",
  smartLocate: "Smart Positioning",
  localRecord: "Local Recording",
};

export const SENSORS: Readonly<Record<string, string>> = {
  lastAlarm: "Last Alarm",
};

export const BINARY_SENSORS: Readonly<Record<string, string>> = {
  online: "Online",
};

export const IMOU_CAPABILITIES: Readonly<Record<string, string>> = z
  .record(z.string())
  .parse(JSON.parse(readFileSync(new URL("../data/capabilities.json", import.meta.url), "utf-8")));

/** `"<label> (<name>)"` when the table knows the name, else the bare name. */
export function labelFor(table: Readonly<Record<string, string>>, name: string): string {
  return Object.hasOwn(table, name) ? `${table[name]} (${name})` : name;
}

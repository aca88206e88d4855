import { describe, it, expect } from "vitest";
import { ImouBinarySensor, ImouSensor, ImouSwitch, formatApiTime } from "../../src/entities.js";
import { InvalidResponseError } from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import type { AlarmQuery } from "../../src/types.js";
import { FakeImouApi } from "./fake-api.js";

describe("ImouSwitch", () => {
  it("reads its state from the camera status", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1", switches: { whiteLight: "on" } }]);
    const light = new ImouSwitch(api, "IPC1", "Front Door", "whiteLight");

    expect(light.isUpdated()).toBe(false);
    await light.update();

    expect(light.isOn()).toBe(true);
    expect(light.isUpdated()).toBe(true);
    expect(api.calls).toEqual([{ method: "getDeviceCameraStatus", args: ["IPC1", "whiteLight"] }]);
  });

  it("writes on, off and toggled states", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    const siren = new ImouSwitch(api, "IPC1", "Front Door", "linkageSiren");

    await siren.turnOn();
    expect(siren.isOn()).toBe(true);
    expect(siren.isUpdated()).toBe(true);

    await siren.toggle();
    expect(siren.isOn()).toBe(false);

    await siren.turnOff();
    expect(api.calls.map((c) => c.args)).toEqual([
      ["IPC1", "linkageSiren", true],
      ["IPC1", "linkageSiren", false],
      ["IPC1", "linkageSiren", false],
    ]);
    expect(api.devices.get("IPC1")?.switches).toEqual({ linkageSiren: "off" });
  });

  it("skips the API while disabled", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    const light = new ImouSwitch(api, "IPC1", "Front Door", "whiteLight");
    light.setEnabled(false);

    await light.update();

    expect(api.calls).toEqual([]);
    expect(light.isUpdated()).toBe(false);
    expect(light.isEnabled()).toBe(false);
  });

  it("rejects a status response without status", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    api.getDeviceCameraStatus = async () => ({ enable: true });
    const light = new ImouSwitch(api, "IPC1", "Front Door", "whiteLight");

    await expect(light.update()).rejects.toBeInstanceOf(InvalidResponseError);
    expect(light.isUpdated()).toBe(false);
  });

  it("exposes its identity", () => {
    const light = new ImouSwitch(new FakeImouApi(), "IPC1", "Front Door", "whiteLight");

    expect(light.getName()).toBe("whiteLight");
    expect(light.getDescription()).toBe("Spotlight");
    expect(light.getDeviceId()).toBe("IPC1");
    expect(light.getDeviceName()).toBe("Front Door");
    expect(light.platform).toBe("switch");
  });
});

describe("ImouSensor", () => {
  it("reports the most recent alarm as an ISO timestamp", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1", alarms: [{ time: 1700000000 }, { time: 1600000000 }] }]);
    const sensor = new ImouSensor(api, "IPC1", "Front Door", "lastAlarm");

    await sensor.update();

    expect(sensor.getState()).toBe("2023-11-14T22:13:20.000Z");
  });

  it("reports null when there are no alarms", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1", alarms: [] }]);
    const sensor = new ImouSensor(api, "IPC1", "Front Door", "lastAlarm");

    await sensor.update();

    expect(sensor.getState()).toBeNull();
    expect(sensor.isUpdated()).toBe(true);
  });

  it("asks for one alarm over a formatted time window", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    const sensor = new ImouSensor(api, "IPC1", "Front Door", "lastAlarm");

    await sensor.update();

    const [deviceId, query] = api.calls[0]?.args ?? [];
    expect(deviceId).toBe("IPC1");
    const { count, beginTime, endTime } = query as AlarmQuery;
    expect(count).toBe(1);
    expect(beginTime).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(endTime).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(beginTime < endTime).toBe(true);
  });

  it("stays stale for a sensor type the API has no call for", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    const sensor = new ImouSensor(api, "IPC1", "Front Door", "battery", silentLogger);

    await sensor.update();

    expect(api.calls).toEqual([]);
    expect(sensor.isUpdated()).toBe(false);
    expect(sensor.getState()).toBeNull();
  });

  it("rejects an alarm response without alarms", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    api.getAlarmMessage = async () => ({ nextAlarmId: "-1" });
    const sensor = new ImouSensor(api, "IPC1", "Front Door", "lastAlarm");

    await expect(sensor.update()).rejects.toThrow('alarms not found in {"nextAlarmId":"-1"}');
  });
});

describe("ImouBinarySensor", () => {
  it("reads the online flag", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1", onLine: "1" }]);
    const online = new ImouBinarySensor(api, "IPC1", "Front Door", "online");

    await online.update();

    expect(online.isOn()).toBe(true);
    expect(online.getDescription()).toBe("Online");
  });

  it("treats any other value as offline", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1", onLine: "4" }]);
    const online = new ImouBinarySensor(api, "IPC1", "Front Door", "online");

    await online.update();

    expect(online.isOn()).toBe(false);
  });

  it("stays stale for a binary sensor type the API has no call for", async () => {
    const api = new FakeImouApi([{ deviceId: "IPC1" }]);
    const motion = new ImouBinarySensor(api, "IPC1", "Front Door", "motion", silentLogger);

    await motion.update();

    expect(api.calls).toEqual([]);
    expect(motion.isUpdated()).toBe(false);
  });
});

describe("formatApiTime", () => {
  it("formats local wall-clock time", () => {
    expect(formatApiTime(new Date(2024, 0, 5, 3, 4, 5))).toBe("2024-01-05 03:04:05");
  });
});

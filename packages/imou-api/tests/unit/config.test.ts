import { describe, it, expect } from "vitest";
import { loadConfig, parseConfig } from "../../src/config.js";
import { InvalidConfigurationError } from "../../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults for the endpoint and timeout", () => {
    expect(loadConfig({ IMOU_APP_ID: "test-app", IMOU_APP_SECRET: "test-secret" })).toEqual({
      appId: "test-app",
      appSecret: "test-secret",
      baseUrl: "openapi.easy4ip.com",
      timeout: 10,
    });
  });

  it("reads the endpoint and timeout overrides", () => {
    const config = loadConfig({
      IMOU_APP_ID: "test-app",
      IMOU_APP_SECRET: "test-secret",
      IMOU_BASE_URL: "openapi-sg.easy4ip.com",
      IMOU_TIMEOUT: "30",
    });

    expect(config.baseUrl).toBe("openapi-sg.easy4ip.com");
    expect(config.timeout).toBe(30);
  });

  it("rejects missing credentials", () => {
    expect(() => loadConfig({ IMOU_APP_SECRET: "test-secret" })).toThrow(InvalidConfigurationError);
    expect(() => loadConfig({ IMOU_APP_SECRET: "test-secret" })).toThrow(/appId/);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() =>
      loadConfig({ IMOU_APP_ID: "test-app", IMOU_APP_SECRET: "test-secret", IMOU_TIMEOUT: "soon" }),
    ).toThrow(/timeout/);
  });
});

describe("parseConfig", () => {
  it("rejects a base URL with a scheme", () => {
    expect(() =>
      parseConfig({ appId: "test-app", appSecret: "test-secret", baseUrl: "https://openapi.easy4ip.com" }),
    ).toThrow(InvalidConfigurationError);
  });

  it("accepts a host with a port", () => {
    expect(parseConfig({ appId: "test-app", appSecret: "test-secret", baseUrl: "localhost:8443" }).baseUrl).toBe(
      "localhost:8443",
    );
  });
});

import { describe, expect, it } from "vitest";
import { DEFAULT_HOST, DEFAULT_PORT, loadConfig } from "./config.js";
import { ValidationError } from "../domain/errors.js";

describe("loadConfig", () => {
  it("binds all interfaces on port 80 by default", () => {
    expect(loadConfig({})).toEqual({ host: "0.0.0.0", port: 80 });
    expect(DEFAULT_HOST).toBe("0.0.0.0");
    expect(DEFAULT_PORT).toBe(80);
  });

  it("reads HOST and PORT", () => {
    expect(loadConfig({ HOST: "127.0.0.1", PORT: "8080" })).toEqual({ host: "127.0.0.1", port: 8080 });
  });

  it("trims surrounding whitespace", () => {
    expect(loadConfig({ HOST: " localhost ", PORT: " 3000 " })).toEqual({ host: "localhost", port: 3000 });
  });

  it("falls back to defaults for blank values", () => {
    expect(loadConfig({ HOST: "   ", PORT: "" })).toEqual({ host: DEFAULT_HOST, port: DEFAULT_PORT });
  });

  it("accepts port 0 for an ephemeral port", () => {
    expect(loadConfig({ PORT: "0" }).port).toBe(0);
  });

  it("accepts the highest port", () => {
    expect(loadConfig({ PORT: "65535" }).port).toBe(65_535);
  });

  it.each(["http", "-1", "80.5", "0x50", "1e3"])("rejects non-integer PORT %s", (raw) => {
    expect(() => loadConfig({ PORT: raw })).toThrow(ValidationError);
    expect(() => loadConfig({ PORT: raw })).toThrow(`PORT must be a decimal integer, got "${raw}"`);
  });

  it("rejects PORT above 65535 with metadata", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "70000" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      name: "ValidationError",
      message: "PORT must be between 0 and 65535, got 70000",
      metadata: { port: "70000" },
    });
  });
});

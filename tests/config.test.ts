import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { config, defineConfig, envName } from "../src/index.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lagrange-config-"));
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it("uses defaults when nothing is configured", () => {
    const resolved = config.load({ searchFrom: dir, env: {} });
    expect(resolved).toEqual({
      rational: false,
      maxDenominator: 1_000_000,
      precision: 12,
      name: "p",
      color: true,
      verbose: false,
    });
    expect(config.getConfigFilePath()).toBeUndefined();
  });

  it("reads .lagrangerc.json", () => {
    const file = write(".lagrangerc.json", JSON.stringify({ rational: true, maxDenominator: 1000 }));
    config.load({ searchFrom: dir, env: {} });
    expect(config.get("rational")).toBe(true);
    expect(config.get("maxDenominator")).toBe(1000);
    expect(config.get("precision")).toBe(12);
    expect(config.getConfigFilePath()).toBe(file);
  });

  it("reads the lagrange key of package.json", () => {
    write("package.json", JSON.stringify({ name: "points", lagrange: { name: "f" } }));
    config.load({ searchFrom: dir, env: {} });
    expect(config.get("name")).toBe("f");
  });

  it("reads YAML", () => {
    write(".lagrangerc.yaml", "precision: 6\nverbose: true\n");
    config.load({ searchFrom: dir, env: {} });
    expect(config.get("precision")).toBe(6);
    expect(config.get("verbose")).toBe(true);
  });

  it("lets environment variables override files", () => {
    write(".lagrangerc.json", JSON.stringify({ rational: false, precision: 8 }));
    config.load({
      searchFrom: dir,
      env: { LAGRANGE_RATIONAL: "1", LAGRANGE_MAX_DENOMINATOR: "1000", LAGRANGE_COLOR: "false" },
    });
    expect(config.getAll()).toEqual({
      rational: true,
      maxDenominator: 1000,
      precision: 8,
      name: "p",
      color: false,
      verbose: false,
    });
  });

  it("warns about and ignores invalid values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const file = write(".lagrangerc.json", JSON.stringify({ precision: 0, foo: 1 }));
    config.load({ searchFrom: dir, env: { LAGRANGE_MAX_DENOMINATOR: "many" } });

    expect(config.get("precision")).toBe(12);
    expect(config.get("maxDenominator")).toBe(1_000_000);
    expect(warn.mock.calls.map((call) => call[0])).toEqual([
      `[lagrange] ${file}: ignoring unknown option "foo"`,
      `[lagrange] ${file}: ignoring invalid value for "precision": 0`,
      `[lagrange] environment: ignoring invalid value for "maxDenominator": "many"`,
    ]);
  });

  it("warns about a config file that is not an object", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const file = write(".lagrangerc.json", "[1, 2]");
    config.load({ searchFrom: dir, env: {} });
    expect(warn).toHaveBeenCalledWith(`[lagrange] ${file}: expected an object of options, ignoring it`);
    expect(config.get("rational")).toBe(false);
  });

  it("falls back to defaults when a config file cannot be parsed", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    write(".lagrangerc.json", "{ not json");
    config.load({ searchFrom: dir, env: {} });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[lagrange\] Failed to load config file:/);
    expect(config.get("maxDenominator")).toBe(1_000_000);
  });

  it("sets values programmatically and resets them", () => {
    config.load({ searchFrom: dir, env: {} });
    config.set({ rational: true, name: "g" });
    expect(config.get("rational")).toBe(true);
    expect(config.get("name")).toBe("g");

    config.reset();
    config.load({ searchFrom: dir, env: {} });
    expect(config.get("rational")).toBe(false);
    expect(config.get("name")).toBe("p");
  });

  it("rejects invalid programmatic values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    config.load({ searchFrom: dir, env: {} });
    config.set({ maxDenominator: 2.5 });
    expect(config.get("maxDenominator")).toBe(1_000_000);
    expect(warn).toHaveBeenCalledWith(`[lagrange] config.set(): ignoring invalid value for "maxDenominator": 2.5`);
  });

  it("names environment variables after options", () => {
    expect(envName("rational")).toBe("LAGRANGE_RATIONAL");
    expect(envName("maxDenominator")).toBe("LAGRANGE_MAX_DENOMINATOR");
  });

  it("defineConfig returns its argument", () => {
    const options = { rational: true };
    expect(defineConfig(options)).toBe(options);
  });
});

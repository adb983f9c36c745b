import { describe, expect, it } from "vitest";

import { ConfigError, ConfigEnv, acceleratorsFromConfig, defaultConvertConfig, resolveConfig } from "../src";

describe("resolveConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    expect(resolveConfig({}, {})).toEqual({
      threshold: 100,
      indent: "  ",
      advisories: true,
      accelerators: ["columnar", "blocks"],
    });
  });

  it("reads overrides from the environment", () => {
    const config = resolveConfig(
      {},
      {
        [ConfigEnv.Threshold]: "250",
        [ConfigEnv.Advisories]: "off",
        [ConfigEnv.Accelerators]: " blocks ",
      },
    );
    expect(config).toEqual({ ...defaultConvertConfig, threshold: 250, advisories: false, accelerators: ["blocks"] });
  });

  it("lets explicit options win over the environment", () => {
    const config = resolveConfig({ threshold: 10, indent: "\t" }, { [ConfigEnv.Threshold]: "250" });
    expect(config.threshold).toBe(10);
    expect(config.indent).toBe("\t");
  });

  it("ignores explicitly undefined options", () => {
    expect(resolveConfig({ threshold: undefined }, {}).threshold).toBe(100);
  });

  it("disables every accelerator with 'none'", () => {
    const config = resolveConfig({}, { [ConfigEnv.Accelerators]: "none" });
    expect(config.accelerators).toEqual([]);
    expect(acceleratorsFromConfig(config)).toEqual({ columnar: false, blocks: false });
  });

  it("rejects invalid values", () => {
    expect(() => resolveConfig({}, { [ConfigEnv.Threshold]: "many" })).toThrow(ConfigError);
    expect(() => resolveConfig({ threshold: -1 }, {})).toThrow(/threshold/);
    expect(() => resolveConfig({}, { [ConfigEnv.Advisories]: "sometimes" })).toThrow(/advisories/);
    expect(() => resolveConfig({}, { [ConfigEnv.Accelerators]: "gpu" })).toThrow(/accelerators\.0/);
  });
});

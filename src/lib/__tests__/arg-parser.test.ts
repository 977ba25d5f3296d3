import { describe, expect, it } from "vitest";
import { getConfigFromCli } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("getConfigFromCli", () => {
  it("takes the input module as its argument", () => {
    const config = runWithArgv(["node", "vtable-indexes", "module.json"]);
    expect(config).toEqual({ input: "module.json" });
  });

  it("reads output options", () => {
    const config = runWithArgv([
      "node",
      "vtable-indexes",
      "in.mpk",
      "-o",
      "out.bin",
      "--out-format",
      "msgpack",
      "--format",
      "msgpack",
    ]);
    expect(config.input).toBe("in.mpk");
    expect(config.out).toBe("out.bin");
    expect(config.format).toBe("msgpack");
    expect(config.outFormat).toBe("msgpack");
  });

  it("reads mode flags", () => {
    const config = runWithArgv([
      "node",
      "vtable-indexes",
      "module.json",
      "--check-assumptions",
      "--emit-types",
      "--check-binaryen",
      "--skip-transform",
    ]);
    expect(config.checkAssumptions).toBe(true);
    expect(config.emitTypes).toBe(true);
    expect(config.checkBinaryen).toBe(true);
    expect(config.skipTransform).toBe(true);
  });
});

import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { runVTableToIndexes } from "../../index.js";
import { createVTableFixture } from "../../ir/__tests__/fixtures.js";
import { readModuleFile, writeModuleFile } from "../../lib/module-file.js";
import { describeHeapTypes, run } from "../exec.js";

const withTempDir = async (body: (dir: string) => Promise<void>) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "vtable-indexes-cli-"));
  try {
    await body(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

const rewrittenTypes = [
  "(type $type0 (func (result i32)))",
  "(type $S2 (struct (field (ref null $S1))))",
  "(type $S1 (struct (field i32)))",
  "(type $F1 (func (param i32) (result i32)))",
];

describe("describeHeapTypes", () => {
  it("lists the rewritten types in collection order", () => {
    const { module } = createVTableFixture();
    runVTableToIndexes(module, { logger: () => {} });
    expect(describeHeapTypes(module)).toEqual(rewrittenTypes);
  });
});

describe("run", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rewrites a module file into another", async () => {
    await withTempDir(async (dir) => {
      const input = path.join(dir, "in.json");
      const out = path.join(dir, "out.msgpack");
      await writeModuleFile(input, createVTableFixture().module);

      await run({ input, out });

      const written = await readModuleFile(out);
      expect(describeHeapTypes(written)).toEqual(rewrittenTypes);
      expect([...written.typeNames.values()].map((names) => names.name).sort()).toEqual([
        "F1",
        "S1",
        "S2",
      ]);
    });
  });

  it("prints the types of an untransformed module", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await withTempDir(async (dir) => {
      const input = path.join(dir, "in.json");
      await writeModuleFile(input, createVTableFixture().module);

      await run({ input, skipTransform: true, emitTypes: true });

      expect(log).toHaveBeenCalledWith(
        [
          "(type $type0 (func (result i32)))",
          "(type $S2 (struct (field (ref null $S1))))",
          "(type $S1 (struct (field (ref $F1))))",
          "(type $F1 (func (param i32) (result i32)))",
        ].join("\n")
      );
    });
  });
});

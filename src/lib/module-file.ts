import { decode, encode } from "@msgpack/msgpack";
import fs from "node:fs/promises";
import path from "node:path";
import type { Module } from "../ir/module.js";
import { decodeModule, encodeModule } from "../ir/serialize.js";

export type ModuleFileFormat = "json" | "msgpack";

export const isModuleFileFormat = (value: string): value is ModuleFileFormat =>
  value === "json" || value === "msgpack";

/** Infers the file format from its extension, defaulting to JSON */
export const inferFormat = (filePath: string): ModuleFileFormat => {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".msgpack" || ext === ".mpk" ? "msgpack" : "json";
};

export const parseModule = (
  data: Uint8Array,
  format: ModuleFileFormat
): Module => {
  if (format === "msgpack") return decodeModule(decode(data));
  const text = new TextDecoder().decode(data);
  return decodeModule(JSON.parse(text));
};

export const serializeModule = (
  module: Module,
  format: ModuleFileFormat
): Uint8Array => {
  const encoded = encodeModule(module);
  if (format === "msgpack") return encode(encoded);
  return new TextEncoder().encode(`${JSON.stringify(encoded, undefined, 2)}\n`);
};

export const readModuleFile = async (
  filePath: string,
  format: ModuleFileFormat = inferFormat(filePath)
): Promise<Module> => {
  const data = await fs.readFile(filePath);
  return parseModule(new Uint8Array(data), format);
};

export const writeModuleFile = async (
  filePath: string,
  module: Module,
  format: ModuleFileFormat = inferFormat(filePath)
): Promise<void> => {
  await fs.writeFile(filePath, serializeModule(module, format));
};

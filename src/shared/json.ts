import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { validateAgainstSchema, type SchemaErrorFactory } from "../quality/schema_validator.ts";

export async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf-8");
  return JSON.parse(raw);
}

/**
 * Read a JSON file and, when `schemaPath` is given, validate it before handing
 * it back typed. Callers own the shape guarantee when no schema is passed.
 */
export async function loadJson<T>(
  filePath: string,
  schemaPath?: string,
  toError?: SchemaErrorFactory
): Promise<T> {
  const data = await readJson(filePath);
  if (schemaPath) {
    await validateAgainstSchema(data, path.resolve(schemaPath), toError);
  }
  return data as T;
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

import { readFile } from "node:fs/promises";
import path from "node:path";
import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
  validateFormats: false
});
const validatorBySchemaPath = new Map<string, ValidateFunction>();

async function getValidator(schemaPath: string): Promise<ValidateFunction> {
  const resolvedSchemaPath = path.resolve(schemaPath);
  const cached = validatorBySchemaPath.get(resolvedSchemaPath);
  if (cached) {
    return cached;
  }
  const raw = await readFile(resolvedSchemaPath, "utf-8");
  const schema = JSON.parse(raw) as object;
  const validate = ajv.compile(schema);
  validatorBySchemaPath.set(resolvedSchemaPath, validate);
  return validate;
}

function formatSchemaError(error: ErrorObject): string {
  const where = error.instancePath || "/";
  return `${where} ${error.message ?? "validation error"}`;
}

/**
 * Validate `data` and return one `"<json-pointer> <message>"` entry per
 * violation. An empty list means the data is valid.
 */
export async function collectSchemaErrors(data: unknown, schemaPath: string): Promise<string[]> {
  const validate = await getValidator(schemaPath);
  if (validate(data)) {
    return [];
  }
  return (validate.errors ?? []).map(formatSchemaError);
}

export type SchemaErrorFactory = (message: string) => Error;

export async function validateAgainstSchema(
  data: unknown,
  schemaPath: string,
  toError: SchemaErrorFactory = (message) => new Error(message)
): Promise<void> {
  const errors = await collectSchemaErrors(data, schemaPath);
  if (errors.length === 0) {
    return;
  }
  throw toError(
    `Schema validation failed (${path.basename(schemaPath)}): ${errors.join("; ")}`
  );
}

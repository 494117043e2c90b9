import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, strictRequired: false, allowUnionTypes: true });
  add(ajv);

  return ajv;
}

/** Compile `<schemaDir>/<name>.schema.json`. */
export async function compileSchema(name: string, schemaDir: string = SCHEMA_DIR): Promise<{ ajv: AjvInstance; validate: AjvValidateFn }> {
  const filePath = path.join(schemaDir, `${name}.schema.json`);
  const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const ajv = await loadAjv();
  return { ajv, validate: ajv.compile(schema) };
}

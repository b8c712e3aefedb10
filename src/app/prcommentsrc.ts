import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { SchemaObject, ValidateFunction } from "ajv";
import YAML from "yaml";
import type { OutputMode, WalkStrategy } from "../types.js";

export const PRCOMMENTSRC_FILENAME = ".prcommentsrc";

export interface PrCommentsRc {
  version: 1;
  defaults?: {
    strategy?: WalkStrategy;
    output?: OutputMode;
    perPage?: number;
    maxPages?: number;
    maxComments?: number;
    maxRetries?: number;
    timeoutSeconds?: number;
  };
  endpoints?: {
    apiUrl?: string;
    graphqlUrl?: string;
  };
}

let cachedValidator: ValidateFunction<PrCommentsRc> | null = null;

function getSchemaPath(): string {
  const current = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(current, "../../docs/prcommentsrc.schema.json");
}

function ensureValidator(): ValidateFunction<PrCommentsRc> {
  if (cachedValidator) return cachedValidator;
  const schema: unknown = JSON.parse(fs.readFileSync(getSchemaPath(), "utf8"));
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema for ${PRCOMMENTSRC_FILENAME} is not a JSON object.`);
  }
  const ajv = new Ajv2020({ allErrors: true, strict: true });
  cachedValidator = ajv.compile<PrCommentsRc>(schema);
  return cachedValidator;
}

export function readPrCommentsRc(root: string): PrCommentsRc | null {
  const filePath = path.join(root, PRCOMMENTSRC_FILENAME);
  if (!fs.existsSync(filePath)) return null;
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read ${PRCOMMENTSRC_FILENAME}: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new Error(`Invalid YAML in ${PRCOMMENTSRC_FILENAME}: ${describeError(error)}`);
  }

  if (!parsed || typeof parsed !== "object") {
    throw new Error(`${PRCOMMENTSRC_FILENAME} must contain a YAML object.`);
  }

  const validate = ensureValidator();
  if (!validate(parsed)) {
    const errors = (validate.errors ?? []).map((err) => `${err.instancePath || "(root)"}: ${err.message}`);
    throw new Error(`Invalid ${PRCOMMENTSRC_FILENAME}: ${errors.join("; ") || "(unknown schema error)"}`);
  }
  return parsed;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

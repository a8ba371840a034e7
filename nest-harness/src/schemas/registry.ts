import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

/** `<package>/schemas`, from both `src/schemas` and `dist/schemas`. */
export const SCHEMA_DIR = join(__dirname, '..', '..', 'schemas');

export type RepositoryConfig = {
  mirrors: string[];
};

export type NestPaths = {
  root: string;
  available: string;
  downloaded: string;
  installed: string;
};

export type NestConfig = {
  paths: NestPaths;
  repositories: Record<string, RepositoryConfig>;
};

function loadSchema(name: string): SchemaObject {
  const schemaPath = join(SCHEMA_DIR, `${name}.schema.json`);
  const parsed: SchemaObject | null = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Schema ${schemaPath} is not a JSON object`);
  }
  return parsed;
}

let nestConfigValidator: ValidateFunction<NestConfig> | undefined;

export function getNestConfigValidator(): ValidateFunction<NestConfig> {
  nestConfigValidator ??= ajv.compile<NestConfig>(loadSchema('nest-config'));
  return nestConfigValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors: Array<{ path: string; message: string }>;
}

export function validateNestConfig(data: unknown): ValidationResult {
  const validator = getNestConfigValidator();
  const valid = validator(data);
  return {
    valid,
    errors: valid
      ? []
      : (validator.errors ?? []).map((e) => ({
          path: e.instancePath || '/',
          message: e.message ?? 'Unknown error',
        })),
  };
}

/** Type guard form, for readers of a config file. */
export function isNestConfig(data: unknown): data is NestConfig {
  return getNestConfigValidator()(data);
}

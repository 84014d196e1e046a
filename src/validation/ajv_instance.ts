/**
 * Ajv validation instance with schema validators
 * Config files and upstream payloads are checked against schemas/
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { EsgFetchConfigFile } from '@/core/config';
import type { EsgChartResponse } from '@/esg/parse';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (uri, date, ...)
addFormats(ajv);

// Lazy-loaded validators
let configValidator: ValidateFunction<EsgFetchConfigFile> | null = null;
let esgChartValidator: ValidateFunction<EsgChartResponse> | null = null;

export function getConfigValidator(): ValidateFunction<EsgFetchConfigFile> {
  if (!configValidator) {
    const schema = loadSchema('esg_fetch_config.v1');
    configValidator = ajv.compile<EsgFetchConfigFile>(schema);
  }
  return configValidator;
}

export function getEsgChartValidator(): ValidateFunction<EsgChartResponse> {
  if (!esgChartValidator) {
    const schema = loadSchema('esg_chart_response.v1');
    esgChartValidator = ajv.compile<EsgChartResponse>(schema);
  }
  return esgChartValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateConfigFile(data: unknown): ValidationResult<EsgFetchConfigFile> {
  return runValidator(getConfigValidator(), data);
}

export function validateEsgChart(data: unknown): ValidationResult<EsgChartResponse> {
  return runValidator(getEsgChartValidator(), data);
}

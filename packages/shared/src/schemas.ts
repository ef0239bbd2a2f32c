/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for run requests and pipeline results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { PipelineResult, RunRequest } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Validators are compiled lazily on first use
let runRequestValidator: ValidateFunction<RunRequest> | null = null;
let pipelineResultValidator: ValidateFunction<PipelineResult> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
    // Absolute path fallback
    `/app/docs/contracts/${schemaName}`,
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getRunRequestValidator(): ValidateFunction<RunRequest> {
  if (!runRequestValidator) {
    runRequestValidator = ajv.compile<RunRequest>(loadSchema('run_request.schema.json'));
  }
  return runRequestValidator;
}

function getPipelineResultValidator(): ValidateFunction<PipelineResult> {
  if (!pipelineResultValidator) {
    pipelineResultValidator = ajv.compile<PipelineResult>(loadSchema('pipeline_result.schema.json'));
  }
  return pipelineResultValidator;
}

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function validateWith<T>(
  validate: ValidateFunction<T>,
  label: string,
  data: unknown
): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a POST /runs body against run_request.schema.json
 */
export function validateRunRequest(data: unknown): ValidationResult<RunRequest> {
  return validateWith(getRunRequestValidator(), 'RunRequest', data);
}

/**
 * Validate a PipelineResult against pipeline_result.schema.json
 */
export function validatePipelineResult(data: unknown): ValidationResult<PipelineResult> {
  return validateWith(getPipelineResultValidator(), 'PipelineResult', data);
}

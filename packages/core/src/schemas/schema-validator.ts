/**
 * Schema Validator
 *
 * Zod-backed validation for applicant batches, request parameters and the
 * client config file, plus the YAML/JSON loader shared by the file checks.
 */

import { z, ZodError } from 'zod';
import * as yaml from 'js-yaml';
import * as fs from 'fs';
import { ValidationError, type ValidationIssue } from '../errors';
import { ApplicantListSchema, type ApplicantRecord } from './applicant-schema';
import { ClientConfigSchema, type ClientConfig } from './config-schema';

/**
 * Validation result for a single file
 */
export interface FileValidationResult<T> {
  valid: boolean;
  filePath: string;
  errors?: ValidationIssue[];
  data?: T;
}

export function formatZodIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || 'root',
    message: issue.message,
  }));
}

/**
 * Parses `data` with `schema`, throwing a ValidationError naming `subject`
 * and every failing path.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  subject: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(subject, formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * Loads a YAML file (JSON is a YAML subset, so .json files load too)
 */
export function loadStructuredFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return yaml.load(content);
  } catch (error) {
    throw new Error(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function validateFile<S extends z.ZodTypeAny>(
  schema: S,
  filePath: string
): FileValidationResult<z.output<S>> {
  let data: unknown;
  try {
    data = loadStructuredFile(filePath);
  } catch (error) {
    return {
      valid: false,
      filePath,
      errors: [{ path: 'file', message: error instanceof Error ? error.message : String(error) }],
    };
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    return { valid: false, filePath, errors: formatZodIssues(result.error) };
  }
  return { valid: true, filePath, data: result.data };
}

/**
 * Validates a file holding a list of applicants, or `{ applicants: [...] }`.
 * Error paths start with the applicant's index in the list.
 */
export function validateApplicantsFile(filePath: string): FileValidationResult<ApplicantRecord[]> {
  return validateFile(ApplicantListSchema, filePath);
}

export function validateConfigFile(filePath: string): FileValidationResult<ClientConfig> {
  return validateFile(ClientConfigSchema, filePath);
}

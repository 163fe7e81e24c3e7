import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { JsonObject, JsonValue } from '../models/jsonrpc';
import { ErrorCode, semanticError } from './errors';

// Tool input contracts are JSON Schema (that is what tools/list publishes), so tool
// arguments go through Ajv; method params are checked with the Zod schemas in
// schemas/index.ts. Both report failures in the same issue shape.

export interface ValidationIssue {
  path: string;
  message: string;
  keyword: string;
}

export type ValidationOutcome = { ok: true } | { ok: false; errors: ValidationIssue[] };
export type ArgumentValidator = (data: JsonValue) => ValidationOutcome;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

interface ValidationCounters { zodSuccess: number; zodFailure: number; ajvSuccess: number; ajvFailure: number }
const validationCounters: ValidationCounters = { zodSuccess: 0, zodFailure: 0, ajvSuccess: 0, ajvFailure: 0 };

function fromAjv(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(err => ({
    path: err.instancePath || '/',
    message: err.message ?? 'invalid',
    keyword: err.keyword,
  }));
}

function fromZod(e: ZodError): ValidationIssue[] {
  return e.issues.map(issue => ({
    path: '/' + issue.path.join('/'),
    message: issue.message,
    keyword: issue.code,
  }));
}

export function issuesToJson(issues: ValidationIssue[]): JsonValue {
  return issues.map(i => ({ path: i.path, message: i.message, keyword: i.keyword }));
}

/** Compile a JSON Schema once; throws when the schema itself is invalid. */
export function compileSchema(schema: JsonObject): ArgumentValidator {
  const compiled: ValidateFunction = ajv.compile(schema);
  return (data: JsonValue) => {
    if(compiled(data)){
      validationCounters.ajvSuccess++;
      return { ok: true };
    }
    validationCounters.ajvFailure++;
    return { ok: false, errors: fromAjv(compiled.errors) };
  };
}

/**
 * Validate method params against a Zod schema. Absent params read as `{}`; failures
 * throw an InvalidParams semantic error carrying the issue list.
 */
export function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: JsonValue | undefined, method: string): T {
  const result = schema.safeParse(params ?? {});
  if(result.success){
    validationCounters.zodSuccess++;
    return result.data;
  }
  validationCounters.zodFailure++;
  return semanticError(ErrorCode.InvalidParams, 'Invalid params', { method, errors: issuesToJson(fromZod(result.error)) });
}

export function getValidationMetrics(){ return { ...validationCounters }; }

/**
 * @fileoverview Validation gate for generated documents
 *
 * Structural checks use a zod schema of the parts of OpenAPI 3.x this tool
 * relies on; semantic checks cover what a schema cannot express. Callers can
 * add their own rules per API or for every API.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { z } from 'zod';
import { isJsonObject, ownValue, type JsonObject, type JsonValue } from '../core/json.js';
import type { ApiIdent } from '../versions/api_ident.js';
import { formatSemver, type Semver } from '../versions/semver.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ValidationFinding {
  /** JSON pointer-ish location, e.g. `paths./pets/{id}.get`. */
  path: string;
  message: string;
}

export type ValidationOutcome = { ok: true } | { ok: false; findings: ValidationFinding[] };

export interface ValidationContext {
  readonly ident: ApiIdent;
  readonly version: Semver;
  readonly isLatest: boolean;
  readonly isBlessed: boolean;
  reportError(message: string, path?: string): void;
}

export type ExtraValidator = (document: JsonObject, context: ValidationContext) => void;

export interface ValidationTarget {
  ident: ApiIdent;
  version: Semver;
  isLatest: boolean;
  isBlessed: boolean;
}

/** Anything that can judge one generated document. */
export type DocumentValidator = (document: JsonObject, target: ValidationTarget) => ValidationOutcome;

// ============================================================================
// STRUCTURAL SCHEMA
// ============================================================================

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const satisfies readonly `${OpenAPIV3.HttpMethods}`[];

const RefSchema = z.object({ $ref: z.string().min(1) }).passthrough();

const ParameterSchema = z
  .object({
    name: z.string().min(1),
    in: z.enum(['query', 'header', 'path', 'cookie']),
    required: z.boolean().optional(),
  })
  .passthrough();

const ParameterListSchema = z.array(z.union([RefSchema, ParameterSchema]));

const OperationSchema = z
  .object({
    operationId: z.string().min(1).optional(),
    parameters: ParameterListSchema.optional(),
    requestBody: z.record(z.unknown()).optional(),
    responses: z.record(z.unknown()).optional(),
  })
  .passthrough();

const PathItemSchema = z
  .object({
    parameters: ParameterListSchema.optional(),
    get: OperationSchema.optional(),
    put: OperationSchema.optional(),
    post: OperationSchema.optional(),
    delete: OperationSchema.optional(),
    options: OperationSchema.optional(),
    head: OperationSchema.optional(),
    patch: OperationSchema.optional(),
    trace: OperationSchema.optional(),
  })
  .passthrough();

export const OpenApiDocumentSchema = z
  .object({
    openapi: z.string().regex(/^3\.\d+(\.\d+)?$/, 'must be an OpenAPI 3.x version such as "3.0.3"'),
    info: z.object({ title: z.string(), version: z.string() }).passthrough().optional(),
    paths: z.record(z.string().startsWith('/', 'path templates must start with "/"'), PathItemSchema).optional(),
    components: z.object({ schemas: z.record(z.unknown()).optional() }).passthrough().optional(),
  })
  .passthrough();

// ============================================================================
// SEMANTIC CHECKS
// ============================================================================

function resolvePointer(document: JsonObject, ref: string): JsonValue | undefined {
  if (!ref.startsWith('#/')) return undefined;
  let current: JsonValue | undefined = document;
  for (const raw of ref.slice(2).split('/')) {
    const segment = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (!isJsonObject(current)) return undefined;
    current = ownValue(current, segment);
  }
  return current;
}

function collectRefs(value: JsonValue, location: string, out: Array<{ ref: string; path: string }>): void {
  if (Array.isArray(value)) {
    value.forEach((item, index) => collectRefs(item, `${location}[${index}]`, out));
    return;
  }
  if (!isJsonObject(value)) return;
  for (const [key, child] of Object.entries(value)) {
    if (key === '$ref' && typeof child === 'string') {
      out.push({ ref: child, path: location });
    } else {
      collectRefs(child, location ? `${location}.${key}` : key, out);
    }
  }
}

function parameterOf(document: JsonObject, value: JsonValue): JsonObject | undefined {
  if (!isJsonObject(value)) return undefined;
  if (typeof value.$ref === 'string') {
    const target = resolvePointer(document, value.$ref);
    return isJsonObject(target) ? target : undefined;
  }
  return value;
}

function checkSemantics(document: JsonObject): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  const refs: Array<{ ref: string; path: string }> = [];
  collectRefs(document, '', refs);
  for (const { ref, path } of refs) {
    if (ref.startsWith('#/') && resolvePointer(document, ref) === undefined) {
      findings.push({ path, message: `$ref ${ref} does not resolve` });
    }
  }

  const paths = document.paths;
  if (!isJsonObject(paths)) return findings;

  const operationIds = new Map<string, string>();
  for (const [template, pathItem] of Object.entries(paths)) {
    if (!isJsonObject(pathItem)) continue;
    const templateParams = [...template.matchAll(/\{([^}]+)\}/g)].map((match) => match[1] ?? '');
    const shared = Array.isArray(pathItem.parameters) ? pathItem.parameters : [];

    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (!isJsonObject(operation)) continue;
      const location = `paths.${template}.${method}`;

      if (typeof operation.operationId === 'string') {
        const previous = operationIds.get(operation.operationId);
        if (previous) {
          findings.push({
            path: location,
            message: `operationId "${operation.operationId}" is already used by ${previous}`,
          });
        } else {
          operationIds.set(operation.operationId, location);
        }
      }

      const own = Array.isArray(operation.parameters) ? operation.parameters : [];
      const declared = new Set<string>();
      for (const raw of [...shared, ...own]) {
        const parameter = parameterOf(document, raw);
        if (!parameter || parameter.in !== 'path' || typeof parameter.name !== 'string') continue;
        declared.add(parameter.name);
        if (parameter.required !== true) {
          findings.push({ path: location, message: `path parameter "${parameter.name}" must be required` });
        }
        if (!templateParams.includes(parameter.name)) {
          findings.push({
            path: location,
            message: `path parameter "${parameter.name}" does not appear in the path template`,
          });
        }
      }
      for (const name of templateParams) {
        if (!declared.has(name)) {
          findings.push({ path: location, message: `path template variable "{${name}}" is not declared` });
        }
      }
    }
  }

  return findings;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

export function validateDocument(document: JsonObject): ValidationOutcome {
  const structural = OpenApiDocumentSchema.safeParse(document);
  if (!structural.success) {
    return {
      ok: false,
      findings: structural.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }
  const findings = checkSemantics(document);
  return findings.length === 0 ? { ok: true } : { ok: false, findings };
}

/**
 * Built-in checks followed by every extra validator. Extra validators that
 * throw are reported as findings rather than aborting the run.
 */
export function createValidator(extraValidators: ExtraValidator[] = []): DocumentValidator {
  return (document, target) => {
    const base = validateDocument(document);
    const findings = base.ok ? [] : [...base.findings];

    for (const extra of extraValidators) {
      const context: ValidationContext = {
        ...target,
        reportError(message, path = '') {
          findings.push({ path, message });
        },
      };
      try {
        extra(document, context);
      } catch (error) {
        findings.push({
          path: '',
          message: `validator failed for v${formatSemver(target.version)}: ${getErrorMessage(error)}`,
        });
      }
    }

    return findings.length === 0 ? { ok: true } : { ok: false, findings };
  };
}

export function formatFinding(finding: ValidationFinding): string {
  return finding.path ? `${finding.path}: ${finding.message}` : finding.message;
}

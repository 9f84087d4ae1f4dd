/**
 * @fileoverview Semantic comparison of two OpenAPI documents
 *
 * `classify(older, newer)` walks operations, parameters, bodies and
 * responses, following `$ref`s on both sides, and records every difference
 * with the direction in which it breaks clients:
 *
 * - backward-incompatible: a client built against the older document fails
 *   against a server implementing the newer one (e.g. a removed operation, a
 *   newly required request field, a response that may carry new values)
 * - forward-incompatible: a client built against the newer document fails
 *   against a server implementing the older one (e.g. a new operation, a new
 *   optional request field, a response narrowed to fewer values)
 * - incompatible: breaks both ways (e.g. a type change)
 * - trivial: invisible on the wire (descriptions, schema names)
 *
 * Schemas are compared as sets of accepted values. The client produces
 * requests and the server produces responses, so widening a request schema is
 * forward-incompatible while widening a response schema is
 * backward-incompatible; narrowing is the reverse of each.
 */

import { hasOwnKey, isJsonObject, jsonEqual, ownValue, type JsonObject, type JsonValue } from '../core/json.js';
import type { DocumentContent } from '../spec_files/spec_file.js';
import { HTTP_METHODS } from '../validation/validator.js';

// ============================================================================
// TYPES
// ============================================================================

export type Relationship =
  | 'identical'
  | 'wire-compatible'
  | 'forward-compatible'
  | 'backward-compatible'
  | 'incompatible';

export type ChangeClass = 'trivial' | 'forward-incompatible' | 'backward-incompatible' | 'incompatible';

export interface DocumentChange {
  readonly class: ChangeClass;
  /** Where the change is, e.g. `GET /pets/{} response 200 (application/json).name`. */
  readonly path: string;
  readonly message: string;
}

export interface Classification {
  readonly relationship: Relationship;
  readonly changes: readonly DocumentChange[];
}

type Direction = 'request' | 'response';

/** Keywords that never change what goes over the wire. */
const ANNOTATION_KEYWORDS = new Set(['description', 'title', 'example', 'examples', 'deprecated', 'externalDocs', '$comment']);

/** Keywords compared explicitly by `compareSchema`. */
const STRUCTURAL_KEYWORDS = new Set([
  '$ref',
  'type',
  'nullable',
  'format',
  'enum',
  'properties',
  'required',
  'items',
  'additionalProperties',
  'allOf',
  'anyOf',
  'oneOf',
  'minimum',
  'maximum',
  'minLength',
  'maxLength',
  'minItems',
  'maxItems',
]);

const MAX_REF_DEPTH = 32;

// ============================================================================
// ENTRY POINT
// ============================================================================

export function classify(older: DocumentContent, newer: DocumentContent): Classification {
  if (older.contents === newer.contents) {
    return { relationship: 'identical', changes: [] };
  }

  const comparator = new Comparator(older.document, newer.document);
  comparator.compareDocuments();
  const changes = comparator.changes;
  const classes = new Set(changes.map((change) => change.class));

  if (classes.has('incompatible') || (classes.has('forward-incompatible') && classes.has('backward-incompatible'))) {
    return { relationship: 'incompatible', changes };
  }
  if (classes.has('forward-incompatible')) {
    return { relationship: 'backward-compatible', changes };
  }
  if (classes.has('backward-incompatible')) {
    return { relationship: 'forward-compatible', changes };
  }
  if (jsonEqual(older.document, newer.document)) {
    return { relationship: 'identical', changes: [] };
  }
  if (changes.length === 0) {
    return {
      relationship: 'wire-compatible',
      changes: [{ class: 'trivial', path: '', message: 'documents differ only in parts not visible on the wire' }],
    };
  }
  return { relationship: 'wire-compatible', changes };
}

/** True when a document classified against its blessed original may replace it. */
export function isAcceptable(relationship: Relationship): relationship is 'identical' | 'wire-compatible' {
  return relationship === 'identical' || relationship === 'wire-compatible';
}

export function describeChange(change: DocumentChange): string {
  const where = change.path ? ` at ${change.path}` : '';
  return `${change.class} change${where}: ${change.message}`;
}

// ============================================================================
// COMPARATOR
// ============================================================================

interface Resolved {
  value: JsonValue | undefined;
  /** Name of the last component followed, if any. */
  refName: string | undefined;
}

function resolvePointer(document: JsonObject, ref: string): JsonValue | undefined {
  if (!ref.startsWith('#/')) return undefined;
  let current: JsonValue | undefined = document;
  for (const raw of ref.slice(2).split('/')) {
    if (!isJsonObject(current)) return undefined;
    current = ownValue(current, raw.replace(/~1/g, '/').replace(/~0/g, '~'));
  }
  return current;
}

function resolve(document: JsonObject, value: JsonValue | undefined): Resolved {
  let current = value;
  let refName: string | undefined;
  for (let depth = 0; depth < MAX_REF_DEPTH && isJsonObject(current) && typeof current.$ref === 'string'; depth++) {
    const ref = current.$ref;
    refName = ref.slice(ref.lastIndexOf('/') + 1);
    current = resolvePointer(document, ref);
  }
  return { value: current, refName };
}

function normalizeTemplate(template: string): string {
  return template.replace(/\{[^}]*\}/g, '{}');
}

function typeSet(schema: JsonObject): Set<string> | undefined {
  const raw = schema.type;
  let types: string[] | undefined;
  if (typeof raw === 'string') types = [raw];
  else if (Array.isArray(raw)) types = raw.filter((entry): entry is string => typeof entry === 'string');
  if (!types) return undefined;
  const set = new Set(types);
  if (schema.nullable === true) set.add('null');
  return set;
}

function formatSet(set: Set<string>): string {
  return [...set].sort().join('|');
}

function isSubset(a: Set<string>, b: Set<string>): boolean {
  return [...a].every((entry) => b.has(entry));
}

function asNumber(value: JsonValue | undefined): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function stringList(value: JsonValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

class Comparator {
  readonly changes: DocumentChange[] = [];
  private readonly visited = new Set<string>();
  private readonly renames = new Set<string>();

  constructor(
    private readonly older: JsonObject,
    private readonly newer: JsonObject,
  ) {}

  private record(changeClass: ChangeClass, path: string, message: string): void {
    this.changes.push({ class: changeClass, path, message });
  }

  private widen(direction: Direction): ChangeClass {
    return direction === 'request' ? 'forward-incompatible' : 'backward-incompatible';
  }

  private narrow(direction: Direction): ChangeClass {
    return direction === 'request' ? 'backward-incompatible' : 'forward-incompatible';
  }

  // --------------------------------------------------------------------------
  // Documents and operations
  // --------------------------------------------------------------------------

  compareDocuments(): void {
    for (const key of ['title', 'description', 'termsOfService']) {
      const before = this.older.info;
      const after = this.newer.info;
      if (isJsonObject(before) && isJsonObject(after) && !jsonEqual(before[key], after[key])) {
        this.record('trivial', `info.${key}`, `${key} changed`);
      }
    }

    const olderPaths = this.pathIndex(this.older);
    const newerPaths = this.pathIndex(this.newer);

    for (const [normalized, before] of olderPaths) {
      const after = newerPaths.get(normalized);
      if (!after) {
        for (const method of this.methodsOf(before.item)) {
          this.record('backward-incompatible', `${method.toUpperCase()} ${before.template}`, 'operation removed');
        }
        continue;
      }
      if (before.template !== after.template) {
        this.record('trivial', after.template, `path parameters renamed (was ${before.template})`);
      }
      this.comparePathItems(before.template, before.item, after.template, after.item);
    }

    for (const [normalized, after] of newerPaths) {
      if (olderPaths.has(normalized)) continue;
      for (const method of this.methodsOf(after.item)) {
        this.record('forward-incompatible', `${method.toUpperCase()} ${after.template}`, 'operation added');
      }
    }
  }

  private pathIndex(document: JsonObject): Map<string, { template: string; item: JsonObject }> {
    const index = new Map<string, { template: string; item: JsonObject }>();
    const paths = document.paths;
    if (!isJsonObject(paths)) return index;
    for (const [template, raw] of Object.entries(paths)) {
      const item = resolve(document, raw).value;
      if (isJsonObject(item)) index.set(normalizeTemplate(template), { template, item });
    }
    return index;
  }

  private methodsOf(item: JsonObject): string[] {
    return HTTP_METHODS.filter((method) => isJsonObject(item[method]));
  }

  private comparePathItems(olderTemplate: string, olderItem: JsonObject, newerTemplate: string, newerItem: JsonObject): void {
    for (const method of HTTP_METHODS) {
      const before = olderItem[method];
      const after = newerItem[method];
      const location = `${method.toUpperCase()} ${newerTemplate}`;
      if (!isJsonObject(before) && !isJsonObject(after)) continue;
      if (!isJsonObject(after)) {
        this.record('backward-incompatible', `${method.toUpperCase()} ${olderTemplate}`, 'operation removed');
        continue;
      }
      if (!isJsonObject(before)) {
        this.record('forward-incompatible', location, 'operation added');
        continue;
      }
      this.compareOperations(location, olderTemplate, olderItem, before, newerTemplate, newerItem, after);
    }
  }

  private compareOperations(
    location: string,
    olderTemplate: string,
    olderItem: JsonObject,
    before: JsonObject,
    newerTemplate: string,
    newerItem: JsonObject,
    after: JsonObject,
  ): void {
    for (const key of ['operationId', 'summary', 'description', 'tags', 'deprecated']) {
      if (!jsonEqual(before[key], after[key])) {
        this.record('trivial', location, `${key} changed`);
      }
    }

    const olderSecurity = before.security ?? this.older.security;
    const newerSecurity = after.security ?? this.newer.security;
    if (!jsonEqual(olderSecurity, newerSecurity)) {
      this.record('incompatible', location, 'security requirements changed');
    }

    this.compareParameters(
      location,
      this.parametersOf(this.older, olderTemplate, olderItem, before),
      this.parametersOf(this.newer, newerTemplate, newerItem, after),
    );
    this.compareRequestBodies(location, before.requestBody, after.requestBody);
    this.compareResponses(location, before.responses, after.responses);
  }

  // --------------------------------------------------------------------------
  // Parameters
  // --------------------------------------------------------------------------

  /** Effective parameters keyed by location; path parameters by position. */
  private parametersOf(
    document: JsonObject,
    template: string,
    item: JsonObject,
    operation: JsonObject,
  ): Map<string, JsonObject> {
    const positions = [...template.matchAll(/\{([^}]+)\}/g)].map((match) => match[1] ?? '');
    const parameters = new Map<string, JsonObject>();
    const shared = Array.isArray(item.parameters) ? item.parameters : [];
    const own = Array.isArray(operation.parameters) ? operation.parameters : [];
    for (const raw of [...shared, ...own]) {
      const parameter = resolve(document, raw).value;
      if (!isJsonObject(parameter) || typeof parameter.name !== 'string' || typeof parameter.in !== 'string') continue;
      const key =
        parameter.in === 'path'
          ? `path #${positions.indexOf(parameter.name)}`
          : `${parameter.in} ${parameter.in === 'header' ? parameter.name.toLowerCase() : parameter.name}`;
      parameters.set(key, parameter);
    }
    return parameters;
  }

  private compareParameters(location: string, before: Map<string, JsonObject>, after: Map<string, JsonObject>): void {
    for (const [key, olderParam] of before) {
      const label = `${String(olderParam.in)} parameter "${String(olderParam.name)}"`;
      const newerParam = after.get(key);
      if (!newerParam) {
        this.record(this.narrow('request'), location, `${label} removed`);
        continue;
      }
      if (olderParam.name !== newerParam.name) {
        this.record('trivial', location, `${label} renamed to "${String(newerParam.name)}"`);
      }
      const wasRequired = olderParam.required === true;
      const isRequired = newerParam.required === true;
      if (!wasRequired && isRequired) {
        this.record(this.narrow('request'), location, `${label} is now required`);
      } else if (wasRequired && !isRequired) {
        this.record(this.widen('request'), location, `${label} is now optional`);
      }
      for (const annotation of ['description', 'example', 'examples', 'deprecated']) {
        if (!jsonEqual(olderParam[annotation], newerParam[annotation])) {
          this.record('trivial', location, `${label} ${annotation} changed`);
        }
      }
      if (olderParam.schema !== undefined || newerParam.schema !== undefined) {
        this.compareSchema(olderParam.schema, newerParam.schema, `${location} ${label}`, 'request');
      }
      if (olderParam.content !== undefined || newerParam.content !== undefined) {
        this.compareContent(olderParam.content, newerParam.content, `${location} ${label}`, 'request');
      }
    }

    for (const [key, newerParam] of after) {
      if (before.has(key)) continue;
      const label = `${String(newerParam.in)} parameter "${String(newerParam.name)}"`;
      if (newerParam.required === true) {
        this.record(this.narrow('request'), location, `required ${label} added`);
      } else {
        this.record(this.widen('request'), location, `optional ${label} added`);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Bodies
  // --------------------------------------------------------------------------

  private compareRequestBodies(location: string, rawBefore: JsonValue | undefined, rawAfter: JsonValue | undefined): void {
    const before = resolve(this.older, rawBefore).value;
    const after = resolve(this.newer, rawAfter).value;
    const path = `${location} request body`;
    if (!isJsonObject(before) && !isJsonObject(after)) return;
    if (!isJsonObject(after)) {
      this.record('backward-incompatible', path, 'request body removed');
      return;
    }
    if (!isJsonObject(before)) {
      this.record(after.required === true ? 'backward-incompatible' : 'forward-incompatible', path, 'request body added');
      return;
    }
    const wasRequired = before.required === true;
    const isRequired = after.required === true;
    if (!wasRequired && isRequired) this.record(this.narrow('request'), path, 'request body is now required');
    if (wasRequired && !isRequired) this.record(this.widen('request'), path, 'request body is now optional');
    if (!jsonEqual(before.description, after.description)) this.record('trivial', path, 'description changed');
    this.compareContent(before.content, after.content, path, 'request');
  }

  private compareResponses(location: string, rawBefore: JsonValue | undefined, rawAfter: JsonValue | undefined): void {
    const before = isJsonObject(rawBefore) ? rawBefore : {};
    const after = isJsonObject(rawAfter) ? rawAfter : {};

    for (const [status, olderRaw] of Object.entries(before)) {
      const path = `${location} response ${status}`;
      if (!hasOwnKey(after, status)) {
        this.record(this.narrow('response'), path, 'response removed');
        continue;
      }
      const olderResponse = resolve(this.older, olderRaw).value;
      const newerResponse = resolve(this.newer, ownValue(after, status)).value;
      if (!isJsonObject(olderResponse) || !isJsonObject(newerResponse)) continue;
      if (!jsonEqual(olderResponse.description, newerResponse.description)) {
        this.record('trivial', path, 'description changed');
      }
      this.compareContent(olderResponse.content, newerResponse.content, path, 'response');
    }

    for (const status of Object.keys(after)) {
      if (!hasOwnKey(before, status)) {
        this.record(this.widen('response'), `${location} response ${status}`, 'response added');
      }
    }
  }

  private compareContent(
    rawBefore: JsonValue | undefined,
    rawAfter: JsonValue | undefined,
    location: string,
    direction: Direction,
  ): void {
    const before = isJsonObject(rawBefore) ? rawBefore : {};
    const after = isJsonObject(rawAfter) ? rawAfter : {};
    for (const [mediaType, olderMedia] of Object.entries(before)) {
      const path = `${location} (${mediaType})`;
      const newerMedia = ownValue(after, mediaType);
      if (newerMedia === undefined) {
        this.record(this.narrow(direction), path, 'media type removed');
        continue;
      }
      const olderSchema = isJsonObject(olderMedia) ? olderMedia.schema : undefined;
      const newerSchema = isJsonObject(newerMedia) ? newerMedia.schema : undefined;
      this.compareSchema(olderSchema, newerSchema, path, direction);
    }
    for (const mediaType of Object.keys(after)) {
      if (!hasOwnKey(before, mediaType)) {
        this.record(this.widen(direction), `${location} (${mediaType})`, 'media type added');
      }
    }
  }

  // --------------------------------------------------------------------------
  // Schemas
  // --------------------------------------------------------------------------

  private compareSchema(
    rawBefore: JsonValue | undefined,
    rawAfter: JsonValue | undefined,
    location: string,
    direction: Direction,
  ): void {
    const before = resolve(this.older, rawBefore);
    const after = resolve(this.newer, rawAfter);

    if (before.refName !== undefined && after.refName !== undefined) {
      const key = `${direction}:${before.refName}->${after.refName}`;
      if (this.visited.has(key)) return;
      this.visited.add(key);
      if (before.refName !== after.refName && !this.renames.has(key)) {
        this.renames.add(key);
        this.record('trivial', location, `schema ${before.refName} renamed to ${after.refName}`);
      }
    }

    const olderSchema = before.value;
    const newerSchema = after.value;
    if (olderSchema === undefined && newerSchema === undefined) return;
    if (olderSchema === undefined || newerSchema === undefined) {
      this.record('incompatible', location, olderSchema === undefined ? 'schema added' : 'schema removed');
      return;
    }
    if (!isJsonObject(olderSchema) || !isJsonObject(newerSchema)) {
      if (!jsonEqual(olderSchema, newerSchema)) this.record('incompatible', location, 'schema changed');
      return;
    }

    for (const annotation of ANNOTATION_KEYWORDS) {
      if (!jsonEqual(olderSchema[annotation], newerSchema[annotation])) {
        this.record('trivial', location, `${annotation} changed`);
      }
    }

    if (!this.compareTypes(olderSchema, newerSchema, location, direction)) return;

    if (!jsonEqual(olderSchema.format, newerSchema.format)) {
      this.record('incompatible', location, `format changed from ${String(olderSchema.format)} to ${String(newerSchema.format)}`);
    }

    this.compareEnums(olderSchema.enum, newerSchema.enum, location, direction);
    this.compareBounds(olderSchema, newerSchema, location, direction);
    this.compareProperties(olderSchema, newerSchema, location, direction);
    this.compareAdditionalProperties(olderSchema.additionalProperties, newerSchema.additionalProperties, location, direction);

    if (olderSchema.items !== undefined || newerSchema.items !== undefined) {
      this.compareSchema(olderSchema.items, newerSchema.items, `${location}[]`, direction);
    }

    for (const keyword of ['allOf', 'anyOf', 'oneOf']) {
      const olderList = olderSchema[keyword];
      const newerList = newerSchema[keyword];
      if (olderList === undefined && newerList === undefined) continue;
      if (!Array.isArray(olderList) || !Array.isArray(newerList) || olderList.length !== newerList.length) {
        this.record('incompatible', location, `${keyword} variants changed`);
        continue;
      }
      olderList.forEach((variant, index) => {
        this.compareSchema(variant, newerList[index], `${location} ${keyword}[${index}]`, direction);
      });
    }

    for (const key of new Set([...Object.keys(olderSchema), ...Object.keys(newerSchema)])) {
      if (STRUCTURAL_KEYWORDS.has(key) || ANNOTATION_KEYWORDS.has(key)) continue;
      if (!jsonEqual(ownValue(olderSchema, key), ownValue(newerSchema, key))) {
        this.record('incompatible', location, `${key} changed`);
      }
    }
  }

  /** Returns false when the types are unrelated and deeper comparison is meaningless. */
  private compareTypes(olderSchema: JsonObject, newerSchema: JsonObject, location: string, direction: Direction): boolean {
    const before = typeSet(olderSchema);
    const after = typeSet(newerSchema);
    if (!before && !after) return true;
    if (!before) {
      this.record(this.narrow(direction), location, `type constrained to ${formatSet(after ?? new Set())}`);
      return true;
    }
    if (!after) {
      this.record(this.widen(direction), location, `type constraint ${formatSet(before)} removed`);
      return true;
    }
    if (formatSet(before) === formatSet(after)) return true;
    if (isSubset(before, after)) {
      this.record(this.widen(direction), location, `type widened from ${formatSet(before)} to ${formatSet(after)}`);
      return true;
    }
    if (isSubset(after, before)) {
      this.record(this.narrow(direction), location, `type narrowed from ${formatSet(before)} to ${formatSet(after)}`);
      return true;
    }
    this.record('incompatible', location, `type changed from ${formatSet(before)} to ${formatSet(after)}`);
    return false;
  }

  private compareEnums(
    rawBefore: JsonValue | undefined,
    rawAfter: JsonValue | undefined,
    location: string,
    direction: Direction,
  ): void {
    if (rawBefore === undefined && rawAfter === undefined) return;
    if (!Array.isArray(rawBefore)) {
      this.record(this.narrow(direction), location, 'values restricted to an enum');
      return;
    }
    if (!Array.isArray(rawAfter)) {
      this.record(this.widen(direction), location, 'enum restriction removed');
      return;
    }
    const added = rawAfter.filter((value) => !rawBefore.some((existing) => jsonEqual(existing, value)));
    const removed = rawBefore.filter((value) => !rawAfter.some((candidate) => jsonEqual(candidate, value)));
    if (added.length > 0) {
      this.record(this.widen(direction), location, `enum values added: ${added.map((v) => JSON.stringify(v)).join(', ')}`);
    }
    if (removed.length > 0) {
      this.record(this.narrow(direction), location, `enum values removed: ${removed.map((v) => JSON.stringify(v)).join(', ')}`);
    }
  }

  private compareBounds(olderSchema: JsonObject, newerSchema: JsonObject, location: string, direction: Direction): void {
    const lower = ['minimum', 'minLength', 'minItems'];
    const upper = ['maximum', 'maxLength', 'maxItems'];
    for (const keyword of [...lower, ...upper]) {
      const before = asNumber(olderSchema[keyword]);
      const after = asNumber(newerSchema[keyword]);
      if (before === after) continue;
      const isLower = lower.includes(keyword);
      let widened: boolean;
      if (before === undefined) widened = false;
      else if (after === undefined) widened = true;
      else widened = isLower ? after < before : after > before;
      this.record(
        widened ? this.widen(direction) : this.narrow(direction),
        location,
        `${keyword} changed from ${before ?? 'unset'} to ${after ?? 'unset'}`,
      );
    }
  }

  private compareProperties(olderSchema: JsonObject, newerSchema: JsonObject, location: string, direction: Direction): void {
    const before = isJsonObject(olderSchema.properties) ? olderSchema.properties : {};
    const after = isJsonObject(newerSchema.properties) ? newerSchema.properties : {};
    const requiredBefore = new Set(stringList(olderSchema.required));
    const requiredAfter = new Set(stringList(newerSchema.required));

    for (const [name, olderProperty] of Object.entries(before)) {
      const path = `${location}.${name}`;
      if (!hasOwnKey(after, name)) {
        this.record(
          requiredBefore.has(name) ? this.widen(direction) : this.narrow(direction),
          path,
          `${requiredBefore.has(name) ? 'required' : 'optional'} property removed`,
        );
        continue;
      }
      if (!requiredBefore.has(name) && requiredAfter.has(name)) {
        this.record(this.narrow(direction), path, 'property is now required');
      } else if (requiredBefore.has(name) && !requiredAfter.has(name)) {
        this.record(this.widen(direction), path, 'property is now optional');
      }
      this.compareSchema(olderProperty, ownValue(after, name), path, direction);
    }

    for (const name of Object.keys(after)) {
      if (hasOwnKey(before, name)) continue;
      if (requiredAfter.has(name)) {
        this.record(this.narrow(direction), `${location}.${name}`, 'required property added');
      } else {
        this.record(this.widen(direction), `${location}.${name}`, 'optional property added');
      }
    }
  }

  private compareAdditionalProperties(
    rawBefore: JsonValue | undefined,
    rawAfter: JsonValue | undefined,
    location: string,
    direction: Direction,
  ): void {
    const before = rawBefore ?? true;
    const after = rawAfter ?? true;
    if (isJsonObject(before) && isJsonObject(after)) {
      this.compareSchema(before, after, `${location}.*`, direction);
      return;
    }
    if (jsonEqual(before, after)) return;
    if (before === false) {
      this.record(this.widen(direction), location, 'additional properties now allowed');
    } else if (after === false) {
      this.record(this.narrow(direction), location, 'additional properties no longer allowed');
    } else {
      this.record('incompatible', location, 'additional properties changed');
    }
  }
}

/**
 * Maps parsed JSON onto typed records.
 * A record is either built whole or not at all: any failure is a MappingError
 * naming the shape and the offending field.
 */

import type { ZodError } from "zod";
import { MappingError, mappingError } from "../domain/errors.js";
import { type RecordShape, Shapes } from "../domain/schemas.js";
import type { JsonValue, RawRecords, ResourceKind, TypedRecords } from "../domain/types.js";

/** "route_mileages[0].route_segments[2].carrier" */
function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>(
    (acc, part) => (typeof part === "number" ? `${acc}[${part}]` : acc ? `${acc}.${part}` : part),
    ""
  );
}

function toMappingError(shape: string, error: ZodError, prefix: readonly (string | number)[]): MappingError {
  const issue = error.issues[0];
  const field = formatPath([...prefix, ...(issue?.path ?? [])]);
  if (issue?.code === "invalid_type" && issue.received === "undefined") {
    return mappingError(shape, field, `missing required field "${field}"`, error);
  }
  if (field === "" || /^\[\d+\]$/.test(field)) {
    return mappingError(shape, field, issue?.message ?? "invalid record", error);
  }
  return mappingError(shape, field, `field "${field}": ${issue?.message ?? "invalid value"}`, error);
}

function parse<T>(json: unknown, shape: RecordShape<T>, prefix: readonly (string | number)[]): T {
  const result = shape.schema.safeParse(json);
  if (!result.success) {
    throw toMappingError(shape.name, result.error, prefix);
  }
  return result.data;
}

/** Map a single JSON object */
export function mapOne<T>(json: unknown, shape: RecordShape<T>): T {
  return parse(json, shape, []);
}

/** Map a JSON array, keeping its order. A lone object maps to a one-element list. */
export function mapMany<T>(json: unknown, shape: RecordShape<T>): T[] {
  if (!Array.isArray(json)) {
    return [parse(json, shape, [])];
  }
  return json.map((item: unknown, index) => parse(item, shape, [index]));
}

/** Object in, record out; array in, records out in the same order. */
export function mapJson<T>(json: unknown, shape: RecordShape<T>): T | T[] {
  return Array.isArray(json) ? mapMany(json, shape) : mapOne(json, shape);
}

export const RESOURCE_SHAPES: { [K in ResourceKind]: RecordShape<TypedRecords[K]> } = {
  route: Shapes.Route,
  location: Shapes.Location,
  shipment: Shapes.Shipment,
  waybill: Shapes.Waybill,
  equipment: Shapes.Equipment,
  case: Shapes.Case,
};

export type OutputFormat = "typed" | "raw";

export type RecordMap = { [K in ResourceKind]: unknown };

/** Turns a response body into what the client hands back for each resource */
export interface RecordDecoder<R extends RecordMap> {
  readonly format: OutputFormat;
  one<K extends ResourceKind>(kind: K, json: JsonValue): R[K];
  many<K extends ResourceKind>(kind: K, json: JsonValue): R[K][];
}

export class TypedRecordDecoder implements RecordDecoder<TypedRecords> {
  readonly format = "typed";

  one<K extends ResourceKind>(kind: K, json: JsonValue): TypedRecords[K] {
    const shape: RecordShape<TypedRecords[K]> = RESOURCE_SHAPES[kind];
    return mapOne(json, shape);
  }

  many<K extends ResourceKind>(kind: K, json: JsonValue): TypedRecords[K][] {
    const shape: RecordShape<TypedRecords[K]> = RESOURCE_SHAPES[kind];
    return mapMany(json, shape);
  }
}

/** Hands back the parsed JSON untouched */
export class RawRecordDecoder implements RecordDecoder<RawRecords> {
  readonly format = "raw";

  one(_kind: ResourceKind, json: JsonValue): JsonValue {
    return json;
  }

  many(_kind: ResourceKind, json: JsonValue): JsonValue[] {
    return Array.isArray(json) ? json : [json];
  }
}

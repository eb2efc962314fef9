/**
 * Runtime validation of endpoint arguments using Zod.
 * Checked before any token exchange or request is made.
 */

import { z } from "zod";
import { validationError } from "../domain/errors.js";
import type { CaseQuery, LocationQuery, RouteQuery, ShipmentQuery, WaybillQuery } from "./types.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const idSchema = z.string().trim().min(1, "must not be empty");
const idListSchema = z.array(idSchema);

export const routeQuerySchema: Schema<RouteQuery> = z
  .object({
    originId: idSchema,
    destinationId: idSchema,
    originCarrier: idSchema.optional(),
    destinationCarrier: idSchema.optional(),
    junctionAbbreviation: idSchema.optional(),
    junctionCarrier: idSchema.optional(),
  })
  .refine((q) => q.junctionCarrier === undefined || q.junctionAbbreviation !== undefined, {
    message: "junctionCarrier requires junctionAbbreviation",
    path: ["junctionCarrier"],
  });

export const locationQuerySchema: Schema<LocationQuery> = z.object({
  splc: z.string().trim().min(1).max(9).regex(/^\d+$/, "must be digits").optional(),
});

export const shipmentQuerySchema: Schema<ShipmentQuery> = z.object({
  equipmentIds: idListSchema.optional(),
  waybillIds: idListSchema.optional(),
  originIds: idListSchema.optional(),
  destinationIds: idListSchema.optional(),
  phaseCodes: idListSchema.optional(),
});

export const caseQuerySchema: Schema<CaseQuery> = z.object({
  created: z.union([z.date(), z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD")]).optional(),
  statusCodes: idListSchema.optional(),
  equipmentIds: idListSchema.optional(),
});

export const waybillQuerySchema: Schema<WaybillQuery> = z
  .object({
    shipmentIds: idListSchema.optional(),
    equipmentIds: idListSchema.optional(),
  })
  .refine((q) => (q.shipmentIds?.length ?? 0) + (q.equipmentIds?.length ?? 0) > 0, {
    message: "at least one shipment id or equipment id is required",
  });

/** Parse `input` or throw a ValidationError listing every problem */
export function validate<T>(schema: Schema<T>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const msg = result.error.errors
      .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
      .join("; ");
    throw validationError(`Invalid ${what}: ${msg}`, result.error);
  }
  return result.data;
}

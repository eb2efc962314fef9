/**
 * Runtime schemas for the typed records, using Zod.
 * Object schemas strip keys they do not declare, so fields the API adds later
 * never reach a record. Nothing is coerced: a string is never read as a number.
 */

import { z } from "zod";
import { createRoute } from "./route.js";
import type {
  Assessorial,
  BillOfLading,
  Case,
  CaseComment,
  CarrierLocation,
  CarrierTrain,
  Commodity,
  Equipment,
  EquipmentDimensions,
  EquipmentLength,
  EquipmentVolume,
  EquipmentWeight,
  Event,
  Location,
  Route,
  RouteMileage,
  Segment,
  Shipment,
  User,
  Waybill,
} from "./types.js";

/** Schema producing T from any JSON input */
export type Shape<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** A named record shape; the name appears in mapping errors */
export interface RecordShape<T> {
  readonly name: string;
  readonly schema: Shape<T>;
}

/** Optional field: absent and null both become undefined */
function optional<S extends z.ZodTypeAny>(schema: S) {
  return schema.nullish().transform((v) => v ?? undefined);
}

const equipmentLengthSchema: Shape<EquipmentLength> = z.object({
  length: optional(z.number()),
});

const equipmentVolumeSchema: Shape<EquipmentVolume> = z.object({
  cubic_capacity: optional(z.number()),
});

const equipmentDimensionsSchema: Shape<EquipmentDimensions> = z.object({
  exterior: optional(equipmentLengthSchema),
  volume: optional(equipmentVolumeSchema),
  tare: optional(z.number()),
});

const equipmentWeightSchema: Shape<EquipmentWeight> = z.object({
  gross_maximum: optional(z.number()),
  net_maximum: optional(z.number()),
  tare: optional(z.number()),
});

export const equipmentSchema: Shape<Equipment> = z.object({
  id: z.string(),
  aar_type: optional(z.string()),
  up_type: optional(z.string()),
  weight: optional(equipmentWeightSchema),
  owner_type_code: optional(z.string()),
  lessee_initial: optional(z.string()),
  dimensions: optional(equipmentDimensionsSchema),
});

export const commoditySchema: Shape<Commodity> = z.object({
  stcc: z.string(),
  description: optional(z.string()),
});

export const waybillSchema: Shape<Waybill> = z.object({
  id: z.string(),
  primary_reference_id: optional(z.string()),
  primary_reference_id_type_code: optional(z.string()),
  waybill_number: optional(z.string()),
  waybill_date: optional(z.string()),
});

export const assessorialSchema: Shape<Assessorial> = z.object({
  storage_first_chargeable_day: z.string(),
});

export const billOfLadingSchema: Shape<BillOfLading> = z.object({
  equipment: equipmentSchema,
  waybill: optional(waybillSchema),
  commodities: optional(z.array(commoditySchema)),
  load_empty_code: optional(z.string()),
  associated_equipment: optional(z.array(z.string())),
  pickup_number: optional(z.string()),
  yard_block: optional(z.string()),
  assessorial_information: optional(assessorialSchema),
});

export const locationSchema: Shape<Location> = z.object({
  id: z.string(),
  city: z.string(),
  state_abbreviation: z.string(),
  country_abbreviation: optional(z.string()),
  type_code: optional(z.string()),
  splc: optional(z.string()),
  postal_code: optional(z.string()),
  latitude: optional(z.number()),
  longitude: optional(z.number()),
});

export const carrierLocationSchema: Shape<CarrierLocation> = z.object({
  location: locationSchema,
  carrier: optional(z.string()),
  junction_abbreviation: optional(z.string()),
});

export const segmentSchema: Shape<Segment> = z.object({
  beginning: carrierLocationSchema,
  end: carrierLocationSchema,
  mileage: z.number(),
  carrier: optional(z.string()),
});

export const routeMileageSchema: Shape<RouteMileage> = z.object({
  mileage: z.number(),
  route_segments: optional(z.array(segmentSchema)),
  type_code: optional(z.string()),
});

export const routeSchema: Shape<Route> = z
  .object({
    origin: carrierLocationSchema,
    destination: carrierLocationSchema,
    route_mileages: optional(z.array(routeMileageSchema)),
    id: optional(z.string()),
    junctions: optional(z.array(carrierLocationSchema)),
    last_accomplished_event_stop: optional(carrierLocationSchema),
  })
  .transform(createRoute);

export const carrierTrainSchema: Shape<CarrierTrain> = z.object({
  section: optional(z.string()),
  symbol: optional(z.string()),
  start_date: optional(z.string()),
});

export const eventSchema: Shape<Event> = z.object({
  type_code: z.string(),
  offline: z.boolean(),
  status_code: z.string(),
  event_code: optional(z.string()),
  date_time: optional(z.string()),
  location: optional(locationSchema),
  carrier_abbreviation: optional(z.string()),
  carrier_train: optional(carrierTrainSchema),
  equipment: optional(equipmentSchema),
});

export const shipmentSchema: Shape<Shipment> = z.object({
  id: z.string(),
  load: optional(billOfLadingSchema),
  current_event: optional(eventSchema),
  phase_code: optional(z.string()),
  online: optional(z.string()),
  route: optional(routeSchema),
  hold_code: optional(z.string()),
  started_dwell: optional(z.string()),
  operational_move_events: optional(z.array(eventSchema)),
});

export const userSchema: Shape<User> = z.object({
  user_id: z.string(),
});

export const caseCommentSchema: Shape<CaseComment> = z.object({
  body: z.string(),
  created_by: userSchema,
  created: z.string(),
});

export const caseSchema: Shape<Case> = z.object({
  id: z.string(),
  description: z.string(),
  subject: z.string(),
  reason_code: z.string(),
  status_code: z.string(),
  created_by: userSchema,
  created: z.string(),
  last_modified_by: optional(userSchema),
  last_modified: optional(z.string()),
  tracked_comments: optional(z.array(caseCommentSchema)),
  lead_shipment: optional(shipmentSchema),
  lead_equipment: optional(equipmentSchema),
  waybill: optional(waybillSchema),
});

function shape<T>(name: string, schema: Shape<T>): RecordShape<T> {
  return { name, schema };
}

export const Shapes = {
  Equipment: shape("Equipment", equipmentSchema),
  Commodity: shape("Commodity", commoditySchema),
  Waybill: shape("Waybill", waybillSchema),
  Assessorial: shape("Assessorial", assessorialSchema),
  BillOfLading: shape("BillOfLading", billOfLadingSchema),
  Location: shape("Location", locationSchema),
  CarrierLocation: shape("CarrierLocation", carrierLocationSchema),
  Segment: shape("Segment", segmentSchema),
  RouteMileage: shape("RouteMileage", routeMileageSchema),
  Route: shape("Route", routeSchema),
  CarrierTrain: shape("CarrierTrain", carrierTrainSchema),
  Event: shape("Event", eventSchema),
  Shipment: shape("Shipment", shipmentSchema),
  User: shape("User", userSchema),
  CaseComment: shape("CaseComment", caseCommentSchema),
  Case: shape("Case", caseSchema),
} as const;

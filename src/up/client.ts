/**
 * UP customer API resource endpoints. One method per remote resource; each
 * returns an ApiResult so callers branch on `ok` instead of catching.
 */

import { UpApiError } from "../domain/errors.js";
import type { ResourceKind, TypedRecords } from "../domain/types.js";
import { type Logger, silentLogger } from "../logger.js";
import type { UpOAuthClient } from "./auth.js";
import type { QueryParams, RequestGateway } from "./gateway.js";
import type { OutputFormat, RecordDecoder, RecordMap } from "./record-mapper.js";
import type {
  ApiResult,
  CaseQuery,
  LocationQuery,
  RouteQuery,
  ShipmentQuery,
  WaybillQuery,
} from "./types.js";
import {
  caseQuerySchema,
  idSchema,
  locationQuerySchema,
  routeQuerySchema,
  shipmentQuerySchema,
  validate,
  waybillQuerySchema,
} from "./validation.js";

export const UP_ENDPOINTS = {
  routes: "/services/v2/routes",
  locations: "/services/v2/locations",
  shipments: "/services/v2/shipments",
  cases: "/services/v2/cases",
  waybills: "/services/v2/waybills",
  equipment: "/services/v2/equipment",
} as const;

const SPLC_LENGTH = 9;

/** YYYY-MM-DD in local time */
export function formatDateParam(value: Date | string | undefined): string | undefined {
  if (value === undefined || typeof value === "string") return value;
  const mm = String(value.getMonth() + 1).padStart(2, "0");
  const dd = String(value.getDate()).padStart(2, "0");
  return `${value.getFullYear()}-${mm}-${dd}`;
}

export class UpClient<R extends RecordMap = TypedRecords> {
  private readonly logger: Logger;

  constructor(
    private readonly auth: UpOAuthClient,
    private readonly gateway: RequestGateway,
    private readonly decoder: RecordDecoder<R>,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: "client" });
  }

  /** "typed" records or "raw" JSON, fixed when the client was created */
  get outputFormat(): OutputFormat {
    return this.decoder.format;
  }

  /** Current bearer token, exchanging credentials only when the stored one is stale */
  getValidToken(): Promise<string> {
    return this.auth.getValidToken();
  }

  /** Exchange credentials for a new token now */
  refreshToken(): Promise<string> {
    return this.auth.refreshToken();
  }

  /** Find the routes between two locations. */
  getRoutes(query: RouteQuery): Promise<ApiResult<R["route"][]>> {
    return this.call("getRoutes", () => {
      const q = validate(routeQuerySchema, query, "route query");
      return this.list("route", UP_ENDPOINTS.routes, {
        origin_id: q.originId,
        destination_id: q.destinationId,
        origin_carrier: q.originCarrier,
        destination_carrier: q.destinationCarrier,
        junction_abbreviation: q.junctionAbbreviation,
        junction_carrier: q.junctionCarrier,
      });
    });
  }

  /** Route details, including its segments. */
  getRouteById(routeId: string): Promise<ApiResult<R["route"]>> {
    return this.call("getRouteById", () => this.single("route", UP_ENDPOINTS.routes, routeId));
  }

  /**
   * Authorized locations of the user, or those within an SPLC. An SPLC search
   * also returns a GENERAL location covering the whole SPLC area. Tracks are
   * only populated by getLocationById.
   */
  getLocations(query: LocationQuery = {}): Promise<ApiResult<R["location"][]>> {
    return this.call("getLocations", () => {
      const q = validate(locationQuerySchema, query, "location query");
      return this.list("location", UP_ENDPOINTS.locations, {
        splc: q.splc?.padEnd(SPLC_LENGTH, "0"),
      });
    });
  }

  getLocationById(locationId: string): Promise<ApiResult<R["location"]>> {
    return this.call("getLocationById", () => this.single("location", UP_ENDPOINTS.locations, locationId));
  }

  /** Shipments the user is party to the bill of. */
  getShipments(query: ShipmentQuery = {}): Promise<ApiResult<R["shipment"][]>> {
    return this.call("getShipments", () => {
      const q = validate(shipmentQuerySchema, query, "shipment query");
      return this.list("shipment", UP_ENDPOINTS.shipments, {
        equipment_id: q.equipmentIds,
        waybill_id: q.waybillIds,
        origin_location_id: q.originIds,
        destination_location_id: q.destinationIds,
        phase_codes: q.phaseCodes,
      });
    });
  }

  /** A single shipment with all of its events. */
  getShipmentById(shipmentId: string): Promise<ApiResult<R["shipment"]>> {
    return this.call("getShipmentById", () => this.single("shipment", UP_ENDPOINTS.shipments, shipmentId));
  }

  getCases(query: CaseQuery = {}): Promise<ApiResult<R["case"][]>> {
    return this.call("getCases", () => {
      const q = validate(caseQuerySchema, query, "case query");
      return this.list("case", UP_ENDPOINTS.cases, {
        equipment_id: q.equipmentIds,
        status_code: q.statusCodes,
        created: formatDateParam(q.created),
      });
    });
  }

  getCaseById(caseId: string): Promise<ApiResult<R["case"]>> {
    return this.call("getCaseById", () => this.single("case", UP_ENDPOINTS.cases, caseId));
  }

  getWaybills(query: WaybillQuery): Promise<ApiResult<R["waybill"][]>> {
    return this.call("getWaybills", () => {
      const q = validate(waybillQuerySchema, query, "waybill query");
      return this.list("waybill", UP_ENDPOINTS.waybills, {
        shipment_id: q.shipmentIds,
        equipment_id: q.equipmentIds,
      });
    });
  }

  /** @param waybillId - waybill id, not the waybill number */
  getWaybillById(waybillId: string): Promise<ApiResult<R["waybill"]>> {
    return this.call("getWaybillById", () => this.single("waybill", UP_ENDPOINTS.waybills, waybillId));
  }

  /** @param equipmentId - initial and number, without leading zeros, spaces or check digit */
  getEquipmentById(equipmentId: string): Promise<ApiResult<R["equipment"]>> {
    return this.call("getEquipmentById", () =>
      this.single("equipment", UP_ENDPOINTS.equipment, equipmentId)
    );
  }

  private async list<K extends ResourceKind>(kind: K, path: string, params: QueryParams): Promise<R[K][]> {
    return this.decoder.many(kind, await this.gateway.get(path, params));
  }

  private async single<K extends ResourceKind>(kind: K, path: string, id: string): Promise<R[K]> {
    const safeId = validate(idSchema, id, `${kind} id`);
    return this.decoder.one(kind, await this.gateway.get(`${path}/${encodeURIComponent(safeId)}`));
  }

  /** Client errors become a failed result; anything else is a bug and propagates. */
  private async call<T>(operation: string, op: () => Promise<T>): Promise<ApiResult<T>> {
    try {
      return { ok: true, value: await op() };
    } catch (err) {
      if (err instanceof UpApiError) {
        this.logger.warn(`${operation} failed`, { error: err.toJSON() });
        return { ok: false, error: err };
      }
      throw err;
    }
  }
}

/**
 * Public shapes of the resource endpoints: results and query options.
 */

import type { UpApiError } from "../domain/errors.js";

/** Result of an endpoint call that can fail with a structured error */
export type ApiResult<T> = { ok: true; value: T } | { ok: false; error: UpApiError };

/** Origin and destination are required; junction carriers only apply when a junction is given. */
export interface RouteQuery {
  originId: string;
  destinationId: string;
  originCarrier?: string;
  destinationCarrier?: string;
  /** Gateway junction abbreviation */
  junctionAbbreviation?: string;
  junctionCarrier?: string;
}

export interface LocationQuery {
  /** Right-padded with zeros to nine characters before it is sent */
  splc?: string;
}

/**
 * Any combination narrows the search; no filter returns every active shipment.
 * Large result sets come back with fewer attributes per shipment.
 */
export interface ShipmentQuery {
  equipmentIds?: readonly string[];
  waybillIds?: readonly string[];
  originIds?: readonly string[];
  destinationIds?: readonly string[];
  /** e.g. ENROUTE */
  phaseCodes?: readonly string[];
}

/** No filter returns all OPEN cases. */
export interface CaseQuery {
  /** Creation date; a Date is sent as YYYY-MM-DD, a string as given */
  created?: Date | string;
  /** Specific codes, or OPEN / CEASED for the groups */
  statusCodes?: readonly string[];
  equipmentIds?: readonly string[];
}

/** At least one filter is required. With equipment ids alone only the first 10 are used by the API. */
export interface WaybillQuery {
  shipmentIds?: readonly string[];
  equipmentIds?: readonly string[];
}

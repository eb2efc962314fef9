/**
 * Typed records returned by the UP customer API.
 * Field names follow the API's JSON so typed and raw output read the same way.
 * Optional fields are `undefined` when the API leaves them out (or sends null).
 */

export interface EquipmentLength {
  readonly length?: number;
}

export interface EquipmentVolume {
  readonly cubic_capacity?: number;
}

export interface EquipmentDimensions {
  readonly exterior?: EquipmentLength;
  readonly volume?: EquipmentVolume;
  readonly tare?: number;
}

export interface EquipmentWeight {
  readonly gross_maximum?: number;
  readonly net_maximum?: number;
  readonly tare?: number;
}

/** Rail car or container. The id is initial + number, no leading zeros or check digit. */
export interface Equipment {
  readonly id: string;
  readonly aar_type?: string;
  readonly up_type?: string;
  readonly weight?: EquipmentWeight;
  readonly owner_type_code?: string;
  readonly lessee_initial?: string;
  readonly dimensions?: EquipmentDimensions;
}

export interface Commodity {
  /** Standard Transportation Commodity Code */
  readonly stcc: string;
  readonly description?: string;
}

export interface Waybill {
  /** Not the same as the waybill number */
  readonly id: string;
  readonly primary_reference_id?: string;
  readonly primary_reference_id_type_code?: string;
  readonly waybill_number?: string;
  /** YYYY-MM-DD */
  readonly waybill_date?: string;
}

export interface Assessorial {
  readonly storage_first_chargeable_day: string;
}

/** Bill of lading: the load carried by a shipment */
export interface BillOfLading {
  readonly equipment: Equipment;
  readonly waybill?: Waybill;
  readonly commodities?: readonly Commodity[];
  readonly load_empty_code?: string;
  readonly associated_equipment?: readonly string[];
  readonly pickup_number?: string;
  readonly yard_block?: string;
  readonly assessorial_information?: Assessorial;
}

export interface Location {
  readonly id: string;
  readonly city: string;
  readonly state_abbreviation: string;
  readonly country_abbreviation?: string;
  readonly type_code?: string;
  /** Standard Point Location Code */
  readonly splc?: string;
  // Only populated by the location detail service
  readonly postal_code?: string;
  readonly latitude?: number;
  readonly longitude?: number;
}

export interface CarrierLocation {
  readonly location: Location;
  readonly carrier?: string;
  readonly junction_abbreviation?: string;
}

export interface Segment {
  readonly beginning: CarrierLocation;
  readonly end: CarrierLocation;
  readonly mileage: number;
  readonly carrier?: string;
}

export interface RouteMileage {
  readonly mileage: number;
  readonly route_segments?: readonly Segment[];
  readonly type_code?: string;
}

export interface Route {
  readonly origin: CarrierLocation;
  readonly destination: CarrierLocation;
  /** Not always provided on shipment searches */
  readonly route_mileages?: readonly RouteMileage[];
  /** Not always provided on shipment searches */
  readonly id?: string;
  readonly junctions?: readonly CarrierLocation[];
  readonly last_accomplished_event_stop?: CarrierLocation;
  /**
   * One interchange string per route mileage, in mileage order
   * (e.g. "UP-NORTH-BNSF"). Computed when the record is built.
   */
  readonly interchanges: readonly string[];
}

export interface CarrierTrain {
  readonly section?: string;
  readonly symbol?: string;
  readonly start_date?: string;
}

export interface Event {
  readonly type_code: string;
  readonly offline: boolean;
  readonly status_code: string;
  readonly event_code?: string;
  /** YYYY-MM-DDTHH:MM:SSZ, UTC */
  readonly date_time?: string;
  readonly location?: Location;
  readonly carrier_abbreviation?: string;
  readonly carrier_train?: CarrierTrain;
  readonly equipment?: Equipment;
}

export interface Shipment {
  /** Created for the shipment; not the equipment id */
  readonly id: string;
  /** Not always available from case endpoints */
  readonly load?: BillOfLading;
  readonly current_event?: Event;
  /** e.g. ENROUTE */
  readonly phase_code?: string;
  readonly online?: string;
  readonly route?: Route;
  readonly hold_code?: string;
  /** YYYY-MM-DDTHH:MM:SSZ, UTC */
  readonly started_dwell?: string;
  readonly operational_move_events?: readonly Event[];
}

export interface User {
  readonly user_id: string;
}

export interface CaseComment {
  readonly body: string;
  readonly created_by: User;
  readonly created: string;
}

export interface Case {
  readonly id: string;
  readonly description: string;
  readonly subject: string;
  readonly reason_code: string;
  readonly status_code: string;
  readonly created_by: User;
  readonly created: string;
  readonly last_modified_by?: User;
  readonly last_modified?: string;
  readonly tracked_comments?: readonly CaseComment[];
  readonly lead_shipment?: Shipment;
  readonly lead_equipment?: Equipment;
  readonly waybill?: Waybill;
}

/** Records returned by each resource, keyed by resource kind */
export interface TypedRecords {
  route: Route;
  location: Location;
  shipment: Shipment;
  waybill: Waybill;
  equipment: Equipment;
  case: Case;
}

export type ResourceKind = keyof TypedRecords;

/** Parsed JSON exactly as the API sent it */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type RawRecords = { [K in ResourceKind]: JsonValue };

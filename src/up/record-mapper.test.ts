/**
 * Unit tests: JSON to record mapping and the typed/raw decoders.
 */

import { describe, it, expect } from "vitest";
import { MappingError } from "../domain/errors.js";
import { Shapes } from "../domain/schemas.js";
import type { JsonObject } from "../domain/types.js";
import { RawRecordDecoder, TypedRecordDecoder, mapJson, mapMany, mapOne } from "./record-mapper.js";

const omahaJson = { id: "LOC1", city: "Omaha", state_abbreviation: "NE", country_abbreviation: "US" };

function routeJson(): JsonObject {
  return {
    id: "RT1",
    origin: { location: omahaJson, carrier: "UP" },
    destination: { location: { id: "LOC2", city: "St. Paul", state_abbreviation: "MN" }, carrier: "BNSF" },
    route_mileages: [
      {
        mileage: 380,
        route_segments: [
          { carrier: "UP", mileage: 120, beginning: { location: omahaJson }, end: { location: omahaJson } },
          {
            carrier: "BNSF",
            mileage: 260,
            beginning: { location: omahaJson, junction_abbreviation: "NORTH" },
            end: { location: omahaJson },
          },
        ],
      },
    ],
  };
}

function catchMappingError(fn: () => unknown): MappingError {
  try {
    fn();
  } catch (e) {
    if (e instanceof MappingError) return e;
    throw e;
  }
  throw new Error("expected a MappingError");
}

describe("mapOne", () => {
  it("maps a location and drops fields it does not declare", () => {
    const loc = mapOne({ ...omahaJson, opened: "1865" }, Shapes.Location);
    expect(loc).toEqual(omahaJson);
    expect("opened" in loc).toBe(false);
  });

  it("reads null optionals as absent", () => {
    const loc = mapOne({ ...omahaJson, latitude: null, splc: null }, Shapes.Location);
    expect(loc.latitude).toBeUndefined();
    expect(loc.splc).toBeUndefined();
  });

  it("names the missing required field", () => {
    const err = catchMappingError(() => mapOne({ id: "LOC1", city: "Omaha" }, Shapes.Location));
    expect(err.message).toBe('Cannot map Location: missing required field "state_abbreviation"');
    expect(err.details).toMatchObject({ code: "MAPPING_ERROR", shape: "Location", field: "state_abbreviation" });
  });

  it("does not coerce a string into a number", () => {
    const err = catchMappingError(() => mapOne({ ...omahaJson, latitude: "41.25" }, Shapes.Location));
    expect(err.details.field).toBe("latitude");
    expect(err.message).toBe('Cannot map Location: field "latitude": Expected number, received string');
  });

  it("does not read a string as a boolean", () => {
    const err = catchMappingError(() =>
      mapOne({ type_code: "ARRIVAL", offline: "false", status_code: "DONE" }, Shapes.Event)
    );
    expect(err.details.field).toBe("offline");
  });

  it("rejects a value that is not an object", () => {
    const err = catchMappingError(() => mapOne("LOC1", Shapes.Location));
    expect(err.details.field).toBe("");
    expect(err.message).toBe("Cannot map Location: Expected object, received string");
  });

  it("reports the path of a nested failure", () => {
    const err = catchMappingError(() => mapOne({ id: "SH1", load: {} }, Shapes.Shipment));
    expect(err.details.field).toBe("load.equipment");

    const route = routeJson();
    const broken = { ...route, route_mileages: [{ route_segments: [] }] };
    expect(catchMappingError(() => mapOne(broken, Shapes.Route)).details.field).toBe("route_mileages[0].mileage");
  });

  it("derives interchanges for nested routes", () => {
    const shipment = mapOne({ id: "SH1", phase_code: "ENROUTE", route: routeJson() }, Shapes.Shipment);
    expect(shipment.route?.interchanges).toEqual(["UP-NORTH-BNSF"]);
    expect(shipment.route?.route_mileages?.[0]?.route_segments).toHaveLength(2);
  });

  it("gives equal records for the same input", () => {
    const json = routeJson();
    expect(mapOne(json, Shapes.Route)).toEqual(mapOne(json, Shapes.Route));
  });
});

describe("mapMany", () => {
  it("keeps the order of the array", () => {
    const ids = mapMany(
      [
        { ...omahaJson, id: "B" },
        { ...omahaJson, id: "A" },
        { ...omahaJson, id: "C" },
      ],
      Shapes.Location
    ).map((l) => l.id);
    expect(ids).toEqual(["B", "A", "C"]);
  });

  it("maps a lone object to a one-element list", () => {
    expect(mapMany(omahaJson, Shapes.Location)).toEqual([omahaJson]);
  });

  it("prefixes the failing element's index", () => {
    const err = catchMappingError(() => mapMany([omahaJson, { id: "X" }], Shapes.Location));
    expect(err.details.field).toBe("[1].city");
    expect(err.message).toBe('Cannot map Location: missing required field "[1].city"');
  });
});

describe("mapJson", () => {
  it("returns a list for an array and a record for an object", () => {
    expect(mapJson([omahaJson], Shapes.Location)).toEqual([omahaJson]);
    expect(mapJson(omahaJson, Shapes.Location)).toEqual(omahaJson);
  });
});

describe("decoders", () => {
  it("typed decoder maps by resource kind", () => {
    const decoder = new TypedRecordDecoder();
    expect(decoder.format).toBe("typed");
    expect(decoder.one("route", routeJson()).interchanges).toEqual(["UP-NORTH-BNSF"]);
    expect(decoder.many("location", [omahaJson])[0]?.city).toBe("Omaha");
  });

  it("raw decoder hands back the parsed JSON", () => {
    const decoder = new RawRecordDecoder();
    const json = { id: "whatever", extra: [1, 2] };
    expect(decoder.format).toBe("raw");
    expect(decoder.one("location", json)).toBe(json);
    expect(decoder.many("location", json)).toEqual([json]);
    const list = [json];
    expect(decoder.many("location", list)).toBe(list);
  });
});

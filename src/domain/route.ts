/**
 * Route construction: builds the immutable Route record together with its
 * derived interchange strings.
 */

import type { Route, RouteMileage, Segment } from "./types.js";

/** Reporting mark of the railroad that runs this API */
export const HOME_CARRIER = "UP";

/**
 * Interchange string for one route mileage, e.g. "UP-NORTH-BNSF".
 * Only hand-offs away from the home carrier are spelled out; later
 * changes between foreign roads are skipped.
 */
export function deriveInterchange(segments: readonly Segment[]): string {
  let current: string | undefined;
  let route = "";
  segments.forEach((seg, i) => {
    if (i === 0) {
      current = seg.carrier;
      route = seg.carrier ?? "";
      return;
    }
    if (seg.carrier === current) return;
    if (current === HOME_CARRIER) {
      route += `-${seg.beginning.junction_abbreviation ?? ""}-${seg.carrier ?? ""}`;
    }
    current = seg.carrier;
  });
  return route;
}

export function deriveInterchanges(mileages: readonly RouteMileage[] | undefined): string[] {
  return (mileages ?? []).map((m) => deriveInterchange(m.route_segments ?? []));
}

export type RouteFields = Omit<Route, "interchanges">;

/** Build a Route in one step; the interchange list cannot be set by callers. */
export function createRoute(fields: RouteFields): Route {
  return Object.freeze({
    ...fields,
    interchanges: Object.freeze(deriveInterchanges(fields.route_mileages)),
  });
}

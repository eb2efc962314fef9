#!/usr/bin/env node
/**
 * Simple CLI demo: list locations and one route from the UP API (or a stub
 * when no credentials are configured).
 * Run: npm run demo [-- --raw]
 * With UP_ACCESSID and UP_SECRET_KEY in the environment or .env: live API. Without: stub mode.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigurationError, createLogger, createUpClient, loadConfig, resolveCredentials } from "../index.js";
import type { RawUpClient, TypedUpClient } from "../index.js";
import { StubHttpClient, jsonResponse } from "../http/stub-client.js";

function stubHttp(): StubHttpClient {
  const stub = new StubHttpClient();
  stub.route("POST", "/oauth/token", jsonResponse({ access_token: "demo-stub-token" }));
  stub.route(
    "GET",
    "/services/v2/locations",
    jsonResponse([
      { id: "LOC-OMAH", city: "Omaha", state_abbreviation: "NE", country_abbreviation: "US" },
      { id: "LOC-NPLT", city: "North Platte", state_abbreviation: "NE", country_abbreviation: "US" },
    ])
  );
  stub.route(
    "GET",
    "/services/v2/routes/RT-DEMO",
    jsonResponse({
      id: "RT-DEMO",
      origin: { location: { id: "LOC-OMAH", city: "Omaha", state_abbreviation: "NE" }, carrier: "UP" },
      destination: { location: { id: "LOC-STPL", city: "St. Paul", state_abbreviation: "MN" }, carrier: "BNSF" },
      route_mileages: [
        {
          mileage: 380,
          route_segments: [
            {
              carrier: "UP",
              mileage: 120,
              beginning: { location: { id: "LOC-OMAH", city: "Omaha", state_abbreviation: "NE" } },
              end: { location: { id: "LOC-SCTY", city: "Sioux City", state_abbreviation: "IA" } },
            },
            {
              carrier: "BNSF",
              mileage: 260,
              beginning: {
                location: { id: "LOC-SCTY", city: "Sioux City", state_abbreviation: "IA" },
                junction_abbreviation: "SCITY",
              },
              end: { location: { id: "LOC-STPL", city: "St. Paul", state_abbreviation: "MN" } },
            },
          ],
        },
      ],
    })
  );
  return stub;
}

function hasCredentials(envDir: string): boolean {
  try {
    resolveCredentials({ envDir });
    return true;
  } catch (e) {
    if (e instanceof ConfigurationError) return false;
    throw e;
  }
}

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger("up-rail-client", {}, config.LOG_LEVEL);
  const raw = process.argv.includes("--raw");
  const envDir = config.UP_ENV_DIR ?? process.cwd();
  const live = hasCredentials(envDir);

  const common = live
    ? { envDir, baseUrl: config.UP_BASE_URL, timeoutMs: config.HTTP_TIMEOUT_MS, logger }
    : {
        accessId: "demo-id",
        secretKey: "demo-secret",
        tokenDir: fs.mkdtempSync(path.join(os.tmpdir(), "up-demo-")),
        http: stubHttp(),
        logger,
      };
  console.log(
    live
      ? "Requesting locations from the UP API (live)...\n"
      : "Requesting locations from the UP API (stub mode; set UP_ACCESSID and UP_SECRET_KEY for live API)...\n"
  );

  const client: TypedUpClient | RawUpClient = raw
    ? createUpClient({ ...common, output: "raw" })
    : createUpClient({ ...common, output: "typed" });

  const locations = await client.getLocations();
  if (!locations.ok) {
    console.error("Error:", locations.error.toJSON());
    process.exitCode = 1;
    return;
  }
  console.log("Locations:", JSON.stringify(locations.value, null, 2));

  if (!live) {
    const route = await client.getRouteById("RT-DEMO");
    if (route.ok) console.log("Route:", JSON.stringify(route.value, null, 2));
    else console.error("Error:", route.error.toJSON());
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

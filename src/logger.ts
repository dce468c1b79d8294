import debug from "debug";

/**
 * Debug namespaces, enabled with e.g. `DEBUG=parking-geojson:*`.
 */
export const log = {
  headers: debug("parking-geojson:headers"),
  rows: debug("parking-geojson:rows"),
  validate: debug("parking-geojson:validate"),
  writer: debug("parking-geojson:writer"),
  cli: debug("parking-geojson:cli"),
};

/**
 * @gwsos/types
 *
 * Shared domain types for the groundwater SOS client.
 *
 * - Table: columns + rows + named attributes
 * - Observation: groundwater-level readings and their metadata
 * - Site: feature-of-interest locations and selectors
 */

export * from "./table.js";
export * from "./observation.js";
export * from "./site.js";
export * from "./geo.js";

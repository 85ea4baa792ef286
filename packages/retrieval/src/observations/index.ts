export { retrieveObservation, toMetadataRow, type SiteObservations } from "./retrieve.js";
export { aggregateObservations } from "./aggregate.js";

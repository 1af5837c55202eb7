/**
 * Workout export pipeline.
 * buildExport assembles the document, serializeExport encodes and names it.
 */

export { buildExport } from './assembler';
export type { BuildExportOptions } from './assembler';
export { extractActivities, extractEvents } from './extractors';
export { fetchHeartRateSamples, fetchRoute } from './fetchers';
export { eventTypeName, workoutTypeName } from './kinds';
export { exportFilename, parseExport, serializeExport } from './serializer';
export type { SerializedExport, SerializeOptions } from './serializer';
export { extractStatistics, STATISTIC_QUANTITY_KINDS } from './statistics';

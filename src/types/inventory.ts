/**
 * Log-source inventory types.
 */

/** One inventoried emitter of telemetry (a row of inventory/devices.csv). */
export interface LogSource {
  sourceId: string;
  family: string;
  rawSampleRef: string;
  parsedSampleRef: string;
  siemIngestionProven: boolean;
  vendor: string;
  product: string;
  platform: string;
  sourcetype: string;
  index: string;
  enabled: boolean | null;
  owner: string;
  mitreTechniques: string[];
  notes: string;
  /** CSV line the row was read from. */
  line: number;
}

export interface InventoryValidationResult {
  sources: LogSource[];
  families: string[];
  warnings: string[];
}

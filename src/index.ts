// Export engine
export {
  BackendExtractor,
  createBackendExtractor,
  metricPath,
  toExportRow,
} from './core/engine/BackendExtractor';
export { parseBackendName } from './core/parsers/BackendNameParser';
export * from './core/filters/EntityFilter';
export * from './core/errors';
export { ConfigValidator, createConfigValidator } from './core/validators/ConfigValidator';

// Export controller access
export { ControllerAuthenticator } from './cli/clients/ControllerAuthenticator';
export { ControllerClient } from './cli/clients/ControllerClient';
export { ControllerTransport } from './cli/clients/ControllerTransport';
export { CsvBackendWriter, CSV_HEADER } from './cli/writers/CsvBackendWriter';
export { ExportAdapter } from './cli/adapters/ExportAdapter';

// Export types
export type {
  Application,
  AuthContext,
  Backend,
  Credential,
  EntityFilter,
  ExportRow,
  ExtractionConfig,
  ExtractionSummary,
  IBackendExtractor,
  IBackendSink,
  IMetricCatalog,
  MetricEntity,
  ParsedBackendName,
} from './core/engine/interfaces';
export type { ExporterConfig, RawConfig } from './core/validators/ConfigValidator';
export type { ExportOptions } from './cli/adapters/ExportAdapter';
export type { FetchFunction } from './cli/clients/ControllerTransport';

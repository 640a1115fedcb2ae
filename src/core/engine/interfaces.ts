/**
 * Core interfaces for the backend extraction engine
 * These interfaces are shared between the engine and the CLI implementations
 */

/**
 * A monitored application as listed by the controller
 */
export interface Application {
  id: number;
  name: string;
}

/**
 * A node of the controller's metric tree
 */
export interface MetricEntity {
  name: string;
  /** `folder` for traversable nodes, `leaf` for metrics */
  type: string;
}

/**
 * Predicate applied to every entity returned by a catalog query
 */
export type EntityFilter = (entity: MetricEntity) => boolean;

/**
 * Result of parsing an external call folder name
 */
export interface ParsedBackendName {
  type: string;
  name: string;
  /** false when the name did not follow `Call-<TYPE> to <remote> - <name>` */
  wellFormed: boolean;
}

/**
 * A backend discovered under an application tier
 */
export interface Backend {
  application: string;
  tier: string;
  type: string;
  name: string;
}

/**
 * CSV projection of a backend, in header order
 */
export type ExportRow = [application: string, tier: string, type: string, name: string];

/**
 * Credential resolved once from configuration
 */
export type Credential =
  | { kind: 'oauth'; secret: string }
  | { kind: 'password'; password: string };

/**
 * Signs outgoing controller requests
 */
export interface AuthContext {
  readonly scheme: Credential['kind'];
  sign(headers: Record<string, string>): Record<string, string>;
}

/**
 * Read access to the controller's application list and metric tree
 */
export interface IMetricCatalog {
  /**
   * List applications whose name matches the filter, in controller order
   */
  listApplications(nameFilter: (name: string) => boolean): Promise<Application[]>;

  /**
   * List the children of a pipe-delimited metric path that satisfy the filter
   */
  queryEntities(
    applicationId: number,
    path: string,
    filter: EntityFilter
  ): Promise<MetricEntity[]>;
}

/**
 * Destination for extracted backend rows
 */
export interface IBackendSink {
  appendRows(rows: ExportRow[]): Promise<void>;
}

/**
 * Extraction settings
 */
export interface ExtractionConfig {
  applicationNames: string;
  backendType: string;
  skipThreadTasks: boolean;
  continueOnError?: boolean;
}

/**
 * Totals reported after a run
 */
export interface ExtractionSummary {
  applications: number;
  tiers: number;
  backends: number;
  failedApplications: string[];
}

/**
 * Interface for the extraction engine
 */
export interface IBackendExtractor {
  extract(sink: IBackendSink): Promise<ExtractionSummary>;
}

/**
 * Core extraction engine
 * Walks applications → tiers → external calls (and thread tasks) and
 * streams one row per unique backend to the sink
 */

import { Logger } from 'winston';
import { TransportError } from '../errors';
import { folderNamed, matchPattern } from '../filters/EntityFilter';
import { parseBackendName } from '../parsers/BackendNameParser';
import {
  Application,
  Backend,
  EntityFilter,
  ExportRow,
  ExtractionConfig,
  ExtractionSummary,
  IBackendExtractor,
  IBackendSink,
  IMetricCatalog,
} from './interfaces';

export const OVERALL_PERFORMANCE = 'Overall Application Performance';
export const EXTERNAL_CALLS = 'External Calls';
export const THREAD_TASKS = 'Thread Tasks';

/**
 * Join metric path segments with the controller's hierarchy separator
 */
export function metricPath(...segments: string[]): string {
  return segments.join('|');
}

export function toExportRow(backend: Backend): ExportRow {
  return [backend.application, backend.tier, backend.type, backend.name];
}

export class BackendExtractor implements IBackendExtractor {
  private readonly anyFolder: EntityFilter;
  private readonly backendFilter: EntityFilter;

  constructor(
    private readonly catalog: IMetricCatalog,
    private readonly config: ExtractionConfig,
    private readonly logger: Logger
  ) {
    this.anyFolder = folderNamed('.*');
    this.backendFilter = folderNamed(config.backendType);
  }

  /**
   * Walk every matching application and stream its backends to the sink
   */
  async extract(sink: IBackendSink): Promise<ExtractionSummary> {
    const summary: ExtractionSummary = {
      applications: 0,
      tiers: 0,
      backends: 0,
      failedApplications: [],
    };

    const applications = await this.catalog.listApplications(
      matchPattern(this.config.applicationNames)
    );
    this.logger.info(`Found ${applications.length} applications matching criteria.`);

    for (const application of applications) {
      this.logger.info(
        `Exporting backends for application ${application.name} (${application.id})`
      );

      try {
        await this.extractApplication(application, sink, summary);
        summary.applications++;
      } catch (error) {
        if (!(error instanceof TransportError) || !this.config.continueOnError) {
          throw error;
        }
        this.logger.error(
          `Skipping application ${application.name} after failure: ${error.message}`
        );
        summary.failedApplications.push(application.name);
      }
    }

    return summary;
  }

  private async extractApplication(
    application: Application,
    sink: IBackendSink,
    summary: ExtractionSummary
  ): Promise<void> {
    const tiers = await this.catalog.queryEntities(
      application.id,
      OVERALL_PERFORMANCE,
      this.anyFolder
    );

    for (const tier of tiers) {
      this.logger.info(`Exporting backends for tier ${tier.name}`);

      const backends = await this.extractTier(application, tier.name);
      await sink.appendRows(backends.map(toExportRow));

      this.logger.info(`Found ${backends.length} backends.`);
      summary.tiers++;
      summary.backends += backends.length;
    }
  }

  /**
   * Collect the unique backends of one tier, direct calls first
   */
  async extractTier(application: Application, tier: string): Promise<Backend[]> {
    const tierPath = metricPath(OVERALL_PERFORMANCE, tier);
    const calls = (
      await this.catalog.queryEntities(
        application.id,
        metricPath(tierPath, EXTERNAL_CALLS),
        this.backendFilter
      )
    ).map(entity => entity.name);

    if (!this.config.skipThreadTasks) {
      calls.push(...(await this.findThreadTaskCalls(application, tierPath)));
    }

    const backends: Backend[] = [];
    const seen = new Set<string>();

    for (const call of calls) {
      const parsed = parseBackendName(call);
      if (!parsed.wellFormed) {
        this.logger.warn(`Unexpected backend name format: ${call}`);
      }

      // Only thread tasks can reach the same backend twice
      if (!this.config.skipThreadTasks && seen.has(parsed.name)) {
        this.logger.debug(`Skipping duplicate backend ${parsed.name}`);
        continue;
      }
      seen.add(parsed.name);

      backends.push({
        application: application.name,
        tier,
        type: parsed.type,
        name: parsed.name,
      });
    }

    return backends;
  }

  private async findThreadTaskCalls(
    application: Application,
    tierPath: string
  ): Promise<string[]> {
    const tasksPath = metricPath(tierPath, THREAD_TASKS);
    const tasks = await this.catalog.queryEntities(application.id, tasksPath, this.anyFolder);
    const calls: string[] = [];

    for (const task of tasks) {
      this.logger.debug(`Searching thread task ${task.name}`);
      const entities = await this.catalog.queryEntities(
        application.id,
        metricPath(tasksPath, task.name, EXTERNAL_CALLS),
        this.backendFilter
      );
      calls.push(...entities.map(entity => entity.name));
    }

    return calls;
  }
}

/**
 * Factory function to create a backend extractor
 */
export function createBackendExtractor(
  catalog: IMetricCatalog,
  config: ExtractionConfig,
  logger: Logger
): IBackendExtractor {
  return new BackendExtractor(catalog, config, logger);
}

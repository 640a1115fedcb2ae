/**
 * Controller Client - queries the controller's application list and metric tree
 * Every request is signed through the AuthContext obtained at startup
 */

import {
  Application,
  AuthContext,
  EntityFilter,
  IMetricCatalog,
  MetricEntity,
} from '../../core/engine/interfaces';
import { TransportError } from '../../core/errors';
import { ControllerTransport } from './ControllerTransport';

function isApplication(value: unknown): value is Application {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'id' in value &&
    typeof value.id === 'number'
  );
}

function isMetricEntity(value: unknown): value is MetricEntity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

export class ControllerClient implements IMetricCatalog {
  constructor(
    private readonly transport: ControllerTransport,
    private readonly auth: AuthContext
  ) {}

  /**
   * List applications matching the name filter, in controller order
   */
  async listApplications(nameFilter: (name: string) => boolean): Promise<Application[]> {
    const path = '/controller/rest/applications?output=json';
    const applications = await this.fetchList(path, isApplication);
    return applications.filter(application => nameFilter(application.name));
  }

  /**
   * Query the children of a metric path
   */
  async queryEntities(
    applicationId: number,
    path: string,
    filter: EntityFilter
  ): Promise<MetricEntity[]> {
    const entities = await this.fetchList(this.buildMetricsPath(applicationId, path), isMetricEntity);
    return entities.filter(filter);
  }

  /**
   * Build the metric browser URL path for an application
   */
  buildMetricsPath(applicationId: number, path: string): string {
    return (
      `/controller/rest/applications/${applicationId}/metrics` +
      `?output=json&metric-path=${encodeURIComponent(path)}`
    );
  }

  private async fetchList<T>(path: string, guard: (value: unknown) => value is T): Promise<T[]> {
    const data = await this.transport.getJson(path, this.auth.sign({}));
    const url = `${this.transport.baseUrl}${path}`;

    if (!Array.isArray(data)) {
      throw new TransportError('Unexpected response: expected a JSON array', url);
    }

    return data.map(item => {
      if (!guard(item)) {
        throw new TransportError(`Unexpected item in response: ${JSON.stringify(item)}`, url);
      }
      return item;
    });
  }
}

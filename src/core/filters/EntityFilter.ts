import { EntityFilter, MetricEntity } from '../engine/interfaces';

/**
 * Build a name predicate with search semantics (unanchored)
 */
export function matchPattern(pattern: string): (value: string) => boolean {
  const regex = new RegExp(pattern);
  return (value: string) => regex.test(value);
}

export function matchName(pattern: string): EntityFilter {
  const test = matchPattern(pattern);
  return (entity: MetricEntity) => test(entity.name);
}

export function matchType(pattern: string): EntityFilter {
  const test = matchPattern(pattern);
  return (entity: MetricEntity) => test(entity.type);
}

/**
 * Entity passes only if every filter accepts it
 */
export function allOf(...filters: EntityFilter[]): EntityFilter {
  return (entity: MetricEntity) => filters.every(filter => filter(entity));
}

export const anyEntity: EntityFilter = () => true;

/**
 * Filter for traversable folders whose name matches the pattern
 */
export function folderNamed(pattern: string): EntityFilter {
  return allOf(matchName(pattern), matchType('folder'));
}

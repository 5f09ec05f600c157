import * as k8s from '@kubernetes/client-node';

/**
 * Identity fields shared by every collected entity
 */
export class Metadata {
  public readonly name?: string;
  public readonly namespace?: string;
  /** Seconds since the epoch */
  public readonly creationTimestamp?: number;

  constructor(metadata?: k8s.V1ObjectMeta) {
    this.name = metadata?.name;
    this.namespace = metadata?.namespace;
    this.creationTimestamp = metadata?.creationTimestamp
      ? Math.floor(new Date(metadata.creationTimestamp).getTime() / 1000)
      : undefined;
  }
}

/**
 * Build a name-keyed mapping in list order, skipping entities that have no name.
 */
export function byName<E extends Metadata, V>(
  entities: readonly E[],
  view: (entity: E) => V,
): Map<string, V> {
  const result = new Map<string, V>();
  for (const entity of entities) {
    if (entity.name) {
      result.set(entity.name, view(entity));
    }
  }
  return result;
}

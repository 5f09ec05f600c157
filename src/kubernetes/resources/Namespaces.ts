import * as k8s from '@kubernetes/client-node';
import { Metadata, byName } from './Metadata.js';

export type NamespaceView = { status: { phase: string | null } };

export class Namespace extends Metadata {
  public readonly phase?: string;

  constructor(namespace: k8s.V1Namespace) {
    super(namespace.metadata);
    this.phase = namespace.status?.phase;
  }
}

export class NamespaceList {
  constructor(public readonly items: readonly Namespace[]) {}

  public names(): string[] {
    return this.items.flatMap((namespace) => (namespace.name ? [namespace.name] : []));
  }

  public listNamespaces(): Map<string, NamespaceView> {
    return byName(this.items, (namespace) => ({
      status: { phase: namespace.phase ?? null },
    }));
  }
}

import * as k8s from '@kubernetes/client-node';
import { Metadata, byName } from './Metadata.js';

export type ConditionView = { type: string; status: string };

export class ComponentStatus extends Metadata {
  public readonly conditions: ConditionView[];

  constructor(status: k8s.V1ComponentStatus) {
    super(status.metadata);
    this.conditions = (status.conditions ?? []).map((c) => ({ type: c.type, status: c.status }));
  }
}

export class ComponentStatusList {
  constructor(public readonly items: readonly ComponentStatus[]) {}

  public listStatuses(): Map<string, ConditionView[]> {
    return byName(this.items, (status) => status.conditions);
  }
}

import * as k8s from '@kubernetes/client-node';
import { parseFraction, parseMemory } from '../utils/QuantityParser.js';
import { add, foldAll } from '../utils/StructuralMerge.js';
import { Metadata } from './Metadata.js';

export type PodResourceAmounts = {
  cpu: number;
  memory: number;
};

export type PodResourceView = {
  limits: PodResourceAmounts;
  requests: PodResourceAmounts;
};

export type PodCount = { requests: { pods: number } };

function hasQuantities(quantities?: Record<string, string>): quantities is Record<string, string> {
  return quantities !== undefined && Object.keys(quantities).length > 0;
}

export class Pod extends Metadata {
  public readonly node?: string;
  public readonly containers: readonly k8s.V1Container[];

  constructor(pod: k8s.V1Pod) {
    super(pod.metadata);
    this.node = pod.spec?.nodeName;
    this.containers = pod.spec?.containers ?? [];
  }

  public static zeroResources(): PodResourceView {
    return {
      limits: { cpu: 0.0, memory: 0.0 },
      requests: { cpu: 0.0, memory: 0.0 },
    };
  }

  /**
   * Summed limits and requests of all containers. A container without limits
   * may consume anything, so a single one makes the pod's limits infinite.
   */
  public get resources(): PodResourceView {
    const view = Pod.zeroResources();
    for (const container of this.containers) {
      const limits = container.resources?.limits;
      const requests = container.resources?.requests;

      if (hasQuantities(limits)) {
        view.limits.cpu += parseFraction(limits.cpu ?? 'inf');
        view.limits.memory += parseMemory(limits.memory ?? 'inf');
      } else {
        view.limits.cpu += Infinity;
        view.limits.memory += Infinity;
      }

      if (hasQuantities(requests)) {
        view.requests.cpu += parseFraction(requests.cpu ?? '0.0');
        view.requests.memory += parseMemory(requests.memory ?? '0.0');
      }
    }
    return view;
  }
}

export class PodList {
  constructor(public readonly items: readonly Pod[]) {}

  public get length(): number {
    return this.items.length;
  }

  /**
   * Scheduled pods grouped by node name, nodes in sorted order
   */
  private byNode(): Map<string, Pod[]> {
    const groups = new Map<string, Pod[]>();
    const scheduled = this.items.filter((pod) => pod.node);
    const nodes = [...new Set(scheduled.map((pod) => pod.node ?? ''))].sort();
    for (const node of nodes) {
      groups.set(node, scheduled.filter((pod) => pod.node === node));
    }
    return groups;
  }

  public podsPerNode(): Map<string, PodCount> {
    const result = new Map<string, PodCount>();
    for (const [node, pods] of this.byNode()) {
      result.set(node, { requests: { pods: pods.length } });
    }
    return result;
  }

  public podsInCluster(): PodCount {
    return { requests: { pods: this.items.length } };
  }

  /**
   * Limits and requests of all containers grouped by node. Infinity is
   * reported as soon as one container of the node sets no limit.
   */
  public resourcesPerNode(): Map<string, PodResourceView> {
    const result = new Map<string, PodResourceView>();
    for (const [node, pods] of this.byNode()) {
      result.set(
        node,
        foldAll(
          pods.map((pod) => pod.resources),
          add,
          Pod.zeroResources(),
        ),
      );
    }
    return result;
  }

  public clusterResources(): PodResourceView {
    return foldAll(
      this.items.map((pod) => pod.resources),
      add,
      Pod.zeroResources(),
    );
  }
}

import * as k8s from '@kubernetes/client-node';
import { ClusterDataSource } from '../../src/kubernetes/ClusterDataSource.js';

type Quantities = Record<string, string>;

export interface StatsSample {
  timestamp: string;
  [key: string]: unknown;
}

export function kubeletStats(...samples: StatsSample[]): string {
  return JSON.stringify({ name: '/', stats: samples });
}

export function createNode(
  name: string | undefined,
  capacity: Quantities = { cpu: '2', memory: '4Gi', pods: '110' },
  allocatable: Quantities = { cpu: '1500m', memory: '3Gi', pods: '110' },
  conditions: k8s.V1NodeCondition[] = [{ type: 'Ready', status: 'True' }],
): k8s.V1Node {
  return {
    metadata: name === undefined ? {} : { name },
    status: { capacity, allocatable, conditions },
  };
}

export function createContainer(name: string, limits?: Quantities, requests?: Quantities): k8s.V1Container {
  return { name, resources: { limits, requests } };
}

export function createPod(
  name: string,
  namespace: string,
  nodeName: string | undefined,
  containers: k8s.V1Container[],
): k8s.V1Pod {
  return {
    metadata: { name, namespace },
    spec: { nodeName, containers },
  };
}

export function createNamespace(name: string, phase = 'Active'): k8s.V1Namespace {
  return { metadata: { name }, status: { phase } };
}

export function metricValueList(
  namespace: string,
  metricName: string,
  values: Array<[string, string]>,
): unknown {
  return {
    kind: 'MetricValueList',
    apiVersion: 'custom.metrics.k8s.io/v1beta1',
    items: values.map(([pod, value]) => ({
      describedObject: { kind: 'Pod', namespace, name: pod, apiVersion: '/v1' },
      metricName,
      timestamp: '2024-05-01T10:00:00Z',
      value,
    })),
  };
}

/**
 * Failure carrying an HTTP status, shaped like the client's HttpError
 */
export class StatusError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message);
  }
}

/**
 * In-memory cluster. Node statistics are keyed by node name; custom metric
 * answers by `namespace/metric`, where an Error value is thrown instead.
 */
export class FakeClusterSource implements ClusterDataSource {
  public storageClasses: k8s.V1StorageClass[] = [];
  public namespaces: k8s.V1Namespace[] = [];
  public roles: k8s.V1Role[] = [];
  public clusterRoles: k8s.V1ClusterRole[] = [];
  public componentStatuses: k8s.V1ComponentStatus[] = [];
  public nodes: k8s.V1Node[] = [];
  public persistentVolumes: k8s.V1PersistentVolume[] = [];
  public persistentVolumeClaims: k8s.V1PersistentVolumeClaim[] = [];
  public pods: k8s.V1Pod[] = [];
  public nodeStats: Record<string, string> = {};
  public customMetrics: Record<string, unknown> = {};
  public readonly metricQueries: string[] = [];

  public async listStorageClasses(): Promise<k8s.V1StorageClass[]> {
    return this.storageClasses;
  }

  public async listNamespaces(): Promise<k8s.V1Namespace[]> {
    return this.namespaces;
  }

  public async listRoles(): Promise<k8s.V1Role[]> {
    return this.roles;
  }

  public async listClusterRoles(): Promise<k8s.V1ClusterRole[]> {
    return this.clusterRoles;
  }

  public async listComponentStatuses(): Promise<k8s.V1ComponentStatus[]> {
    return this.componentStatuses;
  }

  public async listNodes(): Promise<k8s.V1Node[]> {
    return this.nodes;
  }

  public async listPersistentVolumes(): Promise<k8s.V1PersistentVolume[]> {
    return this.persistentVolumes;
  }

  public async listPersistentVolumeClaims(): Promise<k8s.V1PersistentVolumeClaim[]> {
    return this.persistentVolumeClaims;
  }

  public async listPods(): Promise<k8s.V1Pod[]> {
    return this.pods;
  }

  public async getNodeStats(nodeName: string): Promise<string> {
    const stats = this.nodeStats[nodeName];
    if (stats === undefined) {
      throw new Error(`no statistics for ${nodeName}`);
    }
    return stats;
  }

  public async getPodCustomMetric(namespace: string, metricName: string): Promise<unknown> {
    const key = `${namespace}/${metricName}`;
    this.metricQueries.push(key);
    const answer = this.customMetrics[key];
    if (answer instanceof Error) {
      throw answer;
    }
    if (answer === undefined) {
      throw new StatusError(404, 'the server could not find the requested resource');
    }
    return answer;
  }
}

/**
 * One node running one pod in the default namespace, with one custom metric
 */
export function smallCluster(): FakeClusterSource {
  const source = new FakeClusterSource();
  source.namespaces = [createNamespace('default')];
  source.nodes = [
    createNode(
      'node1',
      { cpu: '2', memory: '1Ki', pods: '10' },
      { cpu: '1', memory: '1Ki', pods: '10' },
    ),
  ];
  source.nodeStats = {
    node1: kubeletStats({ timestamp: '2024-05-01T10:00:10Z', cpu: { usage: 2 } }),
  };
  source.pods = [
    createPod('p', 'default', 'node1', [
      createContainer('app', { cpu: '1', memory: '1Ki' }, { cpu: '1', memory: '1Ki' }),
    ]),
  ];
  source.customMetrics = {
    'default/memory_rss': metricValueList('default', 'memory_rss', [['p', '1']]),
  };
  return source;
}

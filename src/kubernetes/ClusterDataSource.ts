import * as k8s from '@kubernetes/client-node';

/**
 * Read access to everything one collection cycle needs from the cluster.
 * List methods resolve to the items of the corresponding list call.
 */
export interface ClusterDataSource {
  listStorageClasses(): Promise<k8s.V1StorageClass[]>;
  listNamespaces(): Promise<k8s.V1Namespace[]>;
  listRoles(): Promise<k8s.V1Role[]>;
  listClusterRoles(): Promise<k8s.V1ClusterRole[]>;
  listComponentStatuses(): Promise<k8s.V1ComponentStatus[]>;
  listNodes(): Promise<k8s.V1Node[]>;
  listPersistentVolumes(): Promise<k8s.V1PersistentVolume[]>;
  listPersistentVolumeClaims(): Promise<k8s.V1PersistentVolumeClaim[]>;
  listPods(): Promise<k8s.V1Pod[]>;

  /**
   * Raw kubelet statistics of a node (JSON text)
   */
  getNodeStats(nodeName: string): Promise<string>;

  /**
   * One custom metric for all pods of a namespace (an undecoded MetricValueList)
   */
  getPodCustomMetric(namespace: string, metricName: string): Promise<unknown>;
}

import { Logger } from 'winston';
import { ClusterDataSource } from './ClusterDataSource.js';
import { ResourceNotFoundError, convertApiError } from './ErrorHandling.js';
import { ComponentStatus, ComponentStatusList } from './resources/ComponentStatuses.js';
import {
  DescribedMetricView,
  MetricList,
  combineSeries,
} from './resources/CustomMetrics.js';
import { Namespace, NamespaceList } from './resources/Namespaces.js';
import { Node, NodeList } from './resources/Nodes.js';
import { Pod, PodList } from './resources/Pods.js';
import { Role, RoleList } from './resources/Roles.js';
import {
  PersistentVolume,
  PersistentVolumeClaim,
  PersistentVolumeClaimList,
  PersistentVolumeList,
  StorageClass,
  StorageClassList,
} from './resources/Storage.js';
import { Element } from '../sections/Element.js';
import { Group } from '../sections/Group.js';

/**
 * Custom pod metrics, queried one metric name at a time and reported in one
 * section per group
 */
export const POD_CUSTOM_METRICS: Readonly<Record<string, readonly string[]>> = {
  memory: ['memory_rss', 'memory_swap', 'memory_usage_bytes', 'memory_max_usage_bytes'],
  fs: ['fs_inodes', 'fs_reads', 'fs_writes', 'fs_limit_bytes', 'fs_usage_bytes'],
  cpu: ['cpu_system', 'cpu_user', 'cpu_usage'],
};

export type NamespacedMetrics = Map<string, DescribedMetricView[]>;

export interface ApiDataLists {
  storageClasses: StorageClassList;
  namespaces: NamespaceList;
  roles: RoleList;
  clusterRoles: RoleList;
  componentStatuses: ComponentStatusList;
  nodes: NodeList;
  persistentVolumes: PersistentVolumeList;
  persistentVolumeClaims: PersistentVolumeClaimList;
  pods: PodList;
}

/**
 * The data of one collection cycle and the sections rendered from it
 */
export class ApiData {
  constructor(
    public readonly lists: ApiDataLists,
    public readonly podMetrics: Readonly<Record<string, NamespacedMetrics>>,
    private readonly logger?: Logger,
  ) {}

  /**
   * Fetch everything from the cluster. Node statistics and metric queries run
   * concurrently; all of them settle before any aggregation happens.
   */
  public static async collect(source: ClusterDataSource, logger?: Logger): Promise<ApiData> {
    logger?.info('Collecting API data');

    logger?.debug('Retrieving data');
    const [
      storageClasses,
      namespaces,
      roles,
      clusterRoles,
      componentStatuses,
      nodes,
      persistentVolumes,
      persistentVolumeClaims,
      pods,
    ] = await Promise.all([
      source.listStorageClasses(),
      source.listNamespaces(),
      source.listRoles(),
      source.listClusterRoles(),
      source.listComponentStatuses(),
      source.listNodes(),
      source.listPersistentVolumes(),
      source.listPersistentVolumeClaims(),
      source.listPods(),
    ]);

    const namedNodes = nodes.filter((node) => node.metadata?.name);
    const nodeStats = await Promise.all(
      namedNodes.map((node) => source.getNodeStats(node.metadata?.name ?? '')),
    );

    logger?.debug('Assigning collected data');
    const lists: ApiDataLists = {
      storageClasses: new StorageClassList(storageClasses.map((sc) => new StorageClass(sc))),
      namespaces: new NamespaceList(namespaces.map((ns) => new Namespace(ns))),
      roles: new RoleList(roles.map((role) => new Role(role))),
      clusterRoles: new RoleList(clusterRoles.map((role) => new Role(role))),
      componentStatuses: new ComponentStatusList(
        componentStatuses.map((status) => new ComponentStatus(status)),
      ),
      nodes: new NodeList(namedNodes.map((node, i) => new Node(node, nodeStats[i]))),
      persistentVolumes: new PersistentVolumeList(
        persistentVolumes.map((pv) => new PersistentVolume(pv)),
      ),
      persistentVolumeClaims: new PersistentVolumeClaimList(
        persistentVolumeClaims.map((pvc) => new PersistentVolumeClaim(pvc)),
      ),
      pods: new PodList(pods.map((pod) => new Pod(pod))),
    };

    const namespaceNames = lists.namespaces.names();
    const podMetrics: Record<string, NamespacedMetrics> = {};
    for (const [group, metrics] of Object.entries(POD_CUSTOM_METRICS)) {
      podMetrics[group] = await ApiData.namespacedGroupMetric(
        source,
        namespaceNames,
        metrics,
        logger,
      );
    }

    return new ApiData(lists, podMetrics, logger);
  }

  /**
   * Query every metric of a group and merge the answers per namespace into
   * composite records. Misaligned answers abort the cycle.
   */
  public static async namespacedGroupMetric(
    source: ClusterDataSource,
    namespaces: readonly string[],
    metrics: readonly string[],
    logger?: Logger,
  ): Promise<NamespacedMetrics> {
    const responses = await Promise.all(
      metrics.map((metric) => ApiData.namespacedPodMetric(source, namespaces, metric, logger)),
    );

    const grouped = new Map<string, MetricList[]>();
    for (const response of responses) {
      for (const [namespace, series] of response) {
        const seriesList = grouped.get(namespace) ?? [];
        seriesList.push(series);
        grouped.set(namespace, seriesList);
      }
    }

    const result: NamespacedMetrics = new Map();
    for (const [namespace, seriesList] of grouped) {
      const combined = combineSeries(seriesList);
      if (!combined.success) {
        throw combined.error;
      }
      result.set(namespace, combined.value.listMetrics());
    }
    return result;
  }

  /**
   * Query one metric in every namespace. A namespace whose query fails is
   * left out; a 404 only means it has no pods.
   */
  public static async namespacedPodMetric(
    source: ClusterDataSource,
    namespaces: readonly string[],
    metric: string,
    logger?: Logger,
  ): Promise<Map<string, MetricList>> {
    logger?.debug(`Query Custom Metrics Endpoint: ${metric}`);

    const answers = await Promise.all(
      namespaces.map(async (namespace): Promise<[string, MetricList | undefined]> => {
        try {
          const body = await source.getPodCustomMetric(namespace, metric);
          return [namespace, MetricList.fromResponse(body)];
        } catch (error) {
          const typedError = convertApiError(error);
          if (typedError instanceof ResourceNotFoundError) {
            logger?.info(`Data unavailable. No pods in namespace ${namespace}`);
          } else {
            logger?.info(`Data unavailable. ${typedError.message}`, {
              namespace,
              metric,
              code: typedError.code,
            });
          }
          return [namespace, undefined];
        }
      }),
    );

    const result = new Map<string, MetricList>();
    for (const [namespace, series] of answers) {
      if (series) {
        result.set(namespace, series);
      }
    }
    return result;
  }

  public clusterElement(): Element {
    const { nodes, namespaces, persistentVolumes, componentStatuses, persistentVolumeClaims } =
      this.lists;
    const { storageClasses, roles, clusterRoles, pods } = this.lists;

    const element = new Element();
    element.get('k8s_nodes').insert(nodes.listNodes());
    element.get('k8s_namespaces').insert(namespaces.listNamespaces());
    element.get('k8s_persistent_volumes').insert(persistentVolumes.listVolumes());
    element.get('k8s_component_statuses').insert(componentStatuses.listStatuses());
    element.get('k8s_persistent_volume_claims').insert(persistentVolumeClaims.listVolumeClaims());
    element.get('k8s_storage_classes').insert(storageClasses.listStorageClasses());
    element.get('k8s_roles').insert({ roles: roles.listRoles() });
    element.get('k8s_roles').insert({ cluster_roles: clusterRoles.listRoles() });
    element.get('k8s_resources').insert(nodes.clusterResources());
    element.get('k8s_resources').insert(pods.clusterResources());
    element.get('k8s_resources').insert(pods.podsInCluster());
    element.get('k8s_stats').insert(nodes.clusterStats());
    return element;
  }

  public nodeGroup(): Group {
    const { nodes, pods } = this.lists;
    return new Group()
      .join('k8s_resources', nodes.resources())
      .join('k8s_resources', pods.resourcesPerNode())
      .join('k8s_resources', pods.podsPerNode())
      .join('k8s_stats', nodes.stats())
      .join('k8s_conditions', nodes.conditions());
  }

  public customMetricsElement(): Element {
    const element = new Element();
    for (const [group, metrics] of Object.entries(this.podMetrics)) {
      element.get(`k8s_pods_${group}`).insert(metrics);
    }
    return element;
  }

  public clusterSections(): string {
    this.logger?.info('Output cluster sections');
    return this.clusterElement().output().join('\n');
  }

  public nodeSections(): string {
    this.logger?.info('Output node sections');
    return this.nodeGroup().output().join('\n');
  }

  public customMetricsSection(): string {
    this.logger?.info('Output pods custom metrics');
    return this.customMetricsElement().output().join('\n');
  }

  /**
   * The complete report, one block per line group. Rendering finishes before
   * the caller writes anything.
   */
  public report(): string[] {
    return [this.clusterSections(), this.nodeSections(), this.customMetricsSection()];
  }
}

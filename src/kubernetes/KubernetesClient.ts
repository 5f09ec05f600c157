import * as k8s from '@kubernetes/client-node';
import { Logger } from 'winston';
import { ClusterDataSource } from './ClusterDataSource.js';
import { convertApiError } from './ErrorHandling.js';

/**
 * Configuration options for KubernetesClient
 */
export interface KubernetesClientConfig {
  /**
   * Kubernetes API server URL
   */
  apiServerUrl: string;

  /**
   * Bearer token for authentication
   */
  bearerToken: string;

  /**
   * Skip TLS verification (not recommended for production)
   */
  skipTlsVerify?: boolean;

  /**
   * CA bundle used to verify the API server certificate
   */
  caFile?: string;

  /**
   * Logger instance for debug output
   */
  logger?: Logger;
}

/**
 * KubernetesClient wraps the API clients the agent reads from. It
 * authenticates with a bearer token against a single API server.
 */
export class KubernetesClient implements ClusterDataSource {
  private static readonly CUSTOM_METRICS_API_GROUP = 'custom.metrics.k8s.io';
  private static readonly CUSTOM_METRICS_API_VERSION = 'v1beta1';

  private readonly kc: k8s.KubeConfig;
  private readonly coreV1Api: k8s.CoreV1Api;
  private readonly storageV1Api: k8s.StorageV1Api;
  private readonly rbacAuthorizationV1Api: k8s.RbacAuthorizationV1Api;
  private readonly customObjectsApi: k8s.CustomObjectsApi;
  private readonly logger?: Logger;

  constructor(private readonly config: KubernetesClientConfig) {
    this.logger = config.logger;
    this.kc = new k8s.KubeConfig();
    this.initializeTokenConfig();

    this.logger?.debug('Constructing API client wrappers');
    this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
    this.storageV1Api = this.kc.makeApiClient(k8s.StorageV1Api);
    this.rbacAuthorizationV1Api = this.kc.makeApiClient(k8s.RbacAuthorizationV1Api);
    this.customObjectsApi = this.kc.makeApiClient(k8s.CustomObjectsApi);
  }

  /**
   * Load a single-context kubeconfig holding the server and the token
   */
  private initializeTokenConfig(): void {
    if (this.config.skipTlsVerify) {
      this.logger?.warn('Disabling SSL certificate verification');
    }

    const cluster: k8s.Cluster = {
      name: 'default',
      server: this.config.apiServerUrl,
      skipTLSVerify: this.config.skipTlsVerify || false,
      caFile: this.config.skipTlsVerify ? undefined : this.config.caFile,
    };

    const user: k8s.User = {
      name: 'default',
      token: this.config.bearerToken,
    };

    const context: k8s.Context = {
      name: 'default',
      cluster: cluster.name,
      user: user.name,
    };

    this.kc.loadFromOptions({
      clusters: [cluster],
      users: [user],
      contexts: [context],
      currentContext: context.name,
    });

    this.logger?.info(`Kubernetes client configured for: ${this.config.apiServerUrl}`);
  }

  /**
   * Convert a client failure into a typed error and log it with the operation name
   */
  private handleApiError(error: unknown, operation: string, resourceName?: string): never {
    const typedError = convertApiError(error);
    this.logger?.debug(
      `${operation}${resourceName ? ` ${resourceName}` : ''} failed: ${typedError.name}: ${typedError.message}`,
    );
    throw typedError;
  }

  private async listItems<T>(
    operation: string,
    request: () => Promise<{ body: { items: T[] } }>,
  ): Promise<T[]> {
    try {
      const { body } = await request();
      return body.items;
    } catch (error) {
      this.handleApiError(error, operation);
    }
  }

  public listStorageClasses(): Promise<k8s.V1StorageClass[]> {
    return this.listItems('List storage classes', () => this.storageV1Api.listStorageClass());
  }

  public listNamespaces(): Promise<k8s.V1Namespace[]> {
    return this.listItems('List namespaces', () => this.coreV1Api.listNamespace());
  }

  public listRoles(): Promise<k8s.V1Role[]> {
    return this.listItems('List roles', () => this.rbacAuthorizationV1Api.listRoleForAllNamespaces());
  }

  public listClusterRoles(): Promise<k8s.V1ClusterRole[]> {
    return this.listItems('List cluster roles', () => this.rbacAuthorizationV1Api.listClusterRole());
  }

  public listComponentStatuses(): Promise<k8s.V1ComponentStatus[]> {
    return this.listItems('List component statuses', () => this.coreV1Api.listComponentStatus());
  }

  public listNodes(): Promise<k8s.V1Node[]> {
    return this.listItems('List nodes', () => this.coreV1Api.listNode());
  }

  public listPersistentVolumes(): Promise<k8s.V1PersistentVolume[]> {
    return this.listItems('List persistent volumes', () => this.coreV1Api.listPersistentVolume());
  }

  public listPersistentVolumeClaims(): Promise<k8s.V1PersistentVolumeClaim[]> {
    return this.listItems('List persistent volume claims', () =>
      this.coreV1Api.listPersistentVolumeClaimForAllNamespaces(),
    );
  }

  public listPods(): Promise<k8s.V1Pod[]> {
    return this.listItems('List pods', () => this.coreV1Api.listPodForAllNamespaces());
  }

  /**
   * Fetch the raw kubelet statistics of a node through the API server proxy.
   * The reply holds the samples of the last two minutes.
   */
  public async getNodeStats(nodeName: string): Promise<string> {
    this.logger?.debug(`Fetching kubelet statistics for node: ${nodeName}`);
    try {
      const { body } = await this.coreV1Api.connectGetNodeProxyWithPath(nodeName, 'stats');
      return body;
    } catch (error) {
      this.handleApiError(error, 'Get node statistics', nodeName);
    }
  }

  /**
   * Query one custom metric for every pod of a namespace
   */
  public async getPodCustomMetric(namespace: string, metricName: string): Promise<unknown> {
    this.logger?.debug(`Query Custom Metrics Endpoint: ${metricName} in namespace ${namespace}`);
    try {
      const { body } = await this.customObjectsApi.getNamespacedCustomObject(
        KubernetesClient.CUSTOM_METRICS_API_GROUP,
        KubernetesClient.CUSTOM_METRICS_API_VERSION,
        namespace,
        'pods/*',
        metricName,
      );
      return body;
    } catch (error) {
      this.handleApiError(error, 'Get custom metric', `${namespace}/${metricName}`);
    }
  }

  /**
   * Factory method to create a KubernetesClient using a bearer token
   */
  public static fromToken(
    apiServerUrl: string,
    bearerToken: string,
    skipTlsVerify = false,
    logger?: Logger,
    caFile?: string,
  ): KubernetesClient {
    return new KubernetesClient({
      apiServerUrl,
      bearerToken,
      skipTlsVerify,
      caFile,
      logger,
    });
  }
}

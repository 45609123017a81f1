/**
 * Kubernetes Client Provider
 *
 * Builds the KubeConfig and the KubernetesObjectApi that control-plane
 * adapters receive as a constructor parameter. There is no process-wide
 * instance: callers create a provider and pass its client down.
 */

import * as k8s from '@kubernetes/client-node';
import { ConfigurationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * SECURITY WARNING: Only set to true in non-production environments.
   * This disables TLS certificate verification.
   *
   * @default false
   */
  skipTLSVerify?: boolean;

  /**
   * Custom cluster server URL
   */
  server?: string;

  context?: string;

  /**
   * Complete cluster configuration; used together with `user`
   */
  cluster?: {
    name: string;
    server: string;
    skipTLSVerify?: boolean;
    caData?: string;
    caFile?: string;
  };

  user?: {
    name: string;
    token?: string;
    certData?: string;
    certFile?: string;
    keyData?: string;
    keyFile?: string;
  };

  /**
   * Whether to load from default kubeconfig if no complete cluster/user config provided
   * @default true
   */
  loadFromDefault?: boolean;

  kubeconfigPath?: string;
}

const DEFAULT_CONTEXT_NAME = 'convergent-context';

export class KubernetesClientProvider {
  private readonly logger = getComponentLogger('kubernetes-client-provider');
  private readonly kubeConfig: k8s.KubeConfig;
  private objectApi: k8s.KubernetesObjectApi | undefined;

  constructor(source: KubernetesClientConfig | k8s.KubeConfig = {}) {
    this.kubeConfig =
      source instanceof k8s.KubeConfig ? source : this.createKubeConfig(source);

    this.logger.debug('Kubernetes client provider initialized', {
      currentContext: this.kubeConfig.getCurrentContext(),
      server: this.kubeConfig.getCurrentCluster()?.server,
      skipTLSVerify: this.kubeConfig.getCurrentCluster()?.skipTLSVerify,
    });
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  /**
   * The KubernetesObjectApi used by the control-plane adapters
   */
  getKubernetesApi(): k8s.KubernetesObjectApi {
    if (!this.objectApi) {
      this.objectApi = k8s.KubernetesObjectApi.makeApiClient(this.kubeConfig);
    }
    return this.objectApi;
  }

  private createKubeConfig(config: KubernetesClientConfig): k8s.KubeConfig {
    const kc = new k8s.KubeConfig();

    if (config.cluster && config.user) {
      this.logger.debug('Using complete cluster/user configuration');

      const contextName = config.context ?? DEFAULT_CONTEXT_NAME;
      const { cluster, user } = config;

      kc.loadFromOptions({
        clusters: [
          {
            name: cluster.name,
            server: cluster.server,
            skipTLSVerify: cluster.skipTLSVerify ?? false,
            ...(cluster.caData && { caData: cluster.caData }),
            ...(cluster.caFile && { caFile: cluster.caFile }),
          },
        ],
        users: [
          {
            name: user.name,
            ...(user.token && { token: user.token }),
            ...(user.certData && { certData: user.certData }),
            ...(user.certFile && { certFile: user.certFile }),
            ...(user.keyData && { keyData: user.keyData }),
            ...(user.keyFile && { keyFile: user.keyFile }),
          },
        ],
        contexts: [{ name: contextName, cluster: cluster.name, user: user.name }],
        currentContext: contextName,
      });
    } else if (config.loadFromDefault !== false) {
      this.logger.debug('Loading kubeconfig', { kubeconfigPath: config.kubeconfigPath });

      try {
        if (config.kubeconfigPath) {
          kc.loadFromFile(config.kubeconfigPath);
        } else {
          kc.loadFromDefault();
        }
      } catch (error) {
        throw new ConfigurationError(
          `Failed to load kubeconfig: ${error instanceof Error ? error.message : String(error)}`,
          config.kubeconfigPath ?? 'default kubeconfig'
        );
      }

      this.applyConfigModifications(kc, config);
    } else {
      throw new ConfigurationError(
        'Either complete cluster/user configuration must be provided, or loadFromDefault must be true',
        'kubernetes client config'
      );
    }

    return kc;
  }

  /**
   * Apply configuration modifications to a loaded KubeConfig
   */
  private applyConfigModifications(kc: k8s.KubeConfig, config: KubernetesClientConfig): void {
    if (config.context) {
      if (!kc.getContexts().some((c) => c.name === config.context)) {
        throw new ConfigurationError(
          `Context '${config.context}' not found in kubeconfig`,
          'kubernetes client config'
        );
      }
      kc.setCurrentContext(config.context);
    }

    const cluster = kc.getCurrentCluster();
    if (!cluster || (config.skipTLSVerify === undefined && !config.server)) {
      return;
    }

    if (config.skipTLSVerify === true) {
      this.logger.warn('Explicitly disabling TLS verification - this is insecure', {
        server: cluster.server,
      });
    }

    const modified = {
      ...cluster,
      ...(config.server && { server: config.server }),
      ...(config.skipTLSVerify !== undefined && { skipTLSVerify: config.skipTLSVerify }),
    };

    kc.loadFromOptions({
      clusters: kc.clusters.map((c) => (c.name === cluster.name ? modified : c)),
      users: kc.users,
      contexts: kc.contexts,
      currentContext: kc.getCurrentContext(),
    });
  }
}

export function createKubernetesClientProvider(
  config?: KubernetesClientConfig
): KubernetesClientProvider {
  return new KubernetesClientProvider(config);
}

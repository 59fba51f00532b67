import { AppsV1Api, CoreV1Api, type HttpLibrary, IsomorphicFetchHttpLibrary, KubeConfig } from '@kubernetes/client-node';

export interface KubernetesApis {
  apps: AppsV1Api;
  core: CoreV1Api;
}

/** In-cluster service-account credentials inside a pod, the default kubeconfig elsewhere. */
export function createKubernetesApis(options: { inCluster: boolean }): KubernetesApis {
  const kubeConfig = new KubeConfig();
  if (options.inCluster) {
    kubeConfig.loadFromCluster();
  } else {
    kubeConfig.loadFromDefault();
  }
  return {
    apps: kubeConfig.makeApiClient(AppsV1Api),
    core: kubeConfig.makeApiClient(CoreV1Api),
  };
}

const defaultTransport = new IsomorphicFetchHttpLibrary();

/**
 * Per-call options that cancel the underlying HTTP request when `signal` aborts.
 * The signal goes on the transport: call-time middleware is typed as observable
 * but run as promise-based.
 */
export function withAbortSignal(signal: AbortSignal | undefined, transport: HttpLibrary = defaultTransport) {
  if (!signal) {
    return undefined;
  }
  const httpApi: HttpLibrary = {
    send: (request) => {
      request.setSignal(signal);
      return transport.send(request);
    },
  };
  return { httpApi };
}

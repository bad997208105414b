import type {
  ApiMetadata,
  CallDependency,
  ConsumedApi,
  ProvidedApi,
} from '../metadata/metadata-types.js';
import { DEFAULT_EXTERNAL_SERVICE, EXTERNAL_SERVICE } from '../diagram/naming.js';

export interface ConnectServicesOptions {
  defaultExternalService?: string;
}

interface ProviderEntry {
  serviceName: string;
  api: ProvidedApi;
  segments: string[];
}

const TEMPLATE_SEGMENT = /^(\{[^}]*\}|:.+|\*)$/;

export function pathSegments(path: string): string[] {
  const withoutQuery = path.split('?')[0] ?? '';
  return withoutQuery.split('/').filter((segment) => segment.length > 0);
}

function isTemplate(segment: string): boolean {
  return TEMPLATE_SEGMENT.test(segment);
}

/**
 * Two paths match when they have the same number of segments and every
 * segment pair is equal or one side is a template (`{id}`, `:id`, `*`).
 */
export function pathsMatch(consumed: string[], provided: string[]): boolean {
  if (consumed.length !== provided.length) {
    return false;
  }
  return consumed.every((segment, i) => {
    const other = provided[i];
    if (other === undefined) return false;
    return segment === other || isTemplate(segment) || isTemplate(other);
  });
}

function findProvider(
  consumed: ConsumedApi,
  providers: ProviderEntry[],
  targetService: string | undefined
): ProviderEntry | undefined {
  const segments = pathSegments(consumed.path);
  return providers.find(
    (provider) =>
      (targetService === undefined || provider.serviceName === targetService) &&
      provider.api.method.toUpperCase() === consumed.method.toUpperCase() &&
      pathsMatch(segments, provider.segments)
  );
}

/**
 * Derives service-to-service call dependencies by matching every consumed API
 * against the APIs the collected services provide.
 *
 * A consumed API that names a concrete service only matches that service's
 * APIs. Unmatched calls point at the named service, or at {@link EXTERNAL_SERVICE}
 * when the consumer left the target open.
 */
export function connectServices(
  apis: readonly ApiMetadata[],
  options: ConnectServicesOptions = {}
): CallDependency[] {
  const defaultExternalService = (
    options.defaultExternalService ?? DEFAULT_EXTERNAL_SERVICE
  ).toLowerCase();

  const providers: ProviderEntry[] = apis.flatMap((service) =>
    service.providedApis.map((api) => ({
      serviceName: service.serviceName,
      api,
      segments: pathSegments(api.path),
    }))
  );

  const dependencies: CallDependency[] = [];
  for (const consumer of apis) {
    for (const consumed of consumer.consumedApis) {
      const targetService =
        consumed.service && consumed.service.toLowerCase() !== defaultExternalService
          ? consumed.service
          : undefined;
      const provider = findProvider(consumed, providers, targetService);

      dependencies.push({
        servicePackage: consumed.packageName,
        dependsOnPackage: provider?.api.packageName,
        service: consumer.serviceName,
        dependsOn: provider?.serviceName ?? targetService ?? EXTERNAL_SERVICE,
        method: consumed.method,
        path: consumed.path,
      });
    }
  }

  return dependencies;
}

/**
 * Service health: probes the Elasticsearch cluster (info + health) within a
 * fixed budget. The service is healthy when the cluster answers with a green
 * or yellow status.
 */
import type {
  ElasticsearchRepository,
  RequestOptions,
} from "@domain/elasticsearch/ports";

export const HEALTH_CHECK_TIMEOUT_MS = 5000;

export interface ElasticsearchCheck {
  is_healthy: boolean;
  status: "available" | "unavailable";
  cluster_name?: string;
  cluster_status?: string;
  number_of_nodes?: number;
  version?: string;
  lucene_version?: string;
  error?: string;
}

export interface HealthResponseDto {
  status: "healthy" | "unhealthy";
  service: string;
  version: string;
  checks: { elasticsearch: ElasticsearchCheck };
}

export interface ServiceIdentity {
  service: string;
  version: string;
}

export class HealthUseCase {
  constructor(
    private readonly repository: ElasticsearchRepository,
    private readonly identity: ServiceIdentity
  ) {}

  async check(options: RequestOptions = {}): Promise<HealthResponseDto> {
    const elasticsearch = await this.checkElasticsearch(options);

    return {
      status: elasticsearch.is_healthy ? "healthy" : "unhealthy",
      service: this.identity.service,
      version: this.identity.version,
      checks: { elasticsearch },
    };
  }

  private async checkElasticsearch(
    options: RequestOptions
  ): Promise<ElasticsearchCheck> {
    const timeout = AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS);
    const signal = options.signal
      ? AbortSignal.any([options.signal, timeout])
      : timeout;

    try {
      const [info, health] = await Promise.all([
        this.repository.info({ signal }),
        this.repository.health({ signal }),
      ]);

      return {
        is_healthy: health.status === "green" || health.status === "yellow",
        status: "available",
        cluster_name: info.clusterName,
        cluster_status: health.status,
        number_of_nodes: health.numberOfNodes,
        version: info.version,
        lucene_version: info.luceneVersion,
      };
    } catch (err: unknown) {
      return {
        is_healthy: false,
        status: "unavailable",
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}

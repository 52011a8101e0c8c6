// config.ts
import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";
import { parseAddress } from "./network/address";
import { bootstrapJobSchema, envSchema, type BootstrapJobData } from "./schema/configSchema";

export type ClusterConfig = {
  readonly clusterName: string;
  readonly networkPlugin: string | null; // raw selection; resolved once in buildPlan
  readonly coordinatorAddress: string;
  readonly workerCount: number;
  readonly coordinator: { readonly memoryMb: number; readonly cpus: number };
  readonly worker: { readonly memoryMb: number; readonly cpus: number };
  readonly box: { readonly image: string; readonly version: string };
  readonly ssh: {
    readonly user: string;
    readonly keyPath: string;
    readonly trustKeyPath: string;
    readonly timeoutMs: number;
  };
  readonly hostInterface: string;
  readonly serviceAddress: string;
  readonly joinScriptPath: string;
  readonly kubeconfigDir: string;
  readonly k8sSeries: string;
  readonly workerConcurrency: number;
  readonly redisUrl: string | null;
  readonly queueName: string;
  readonly supabase: { readonly url: string; readonly serviceRoleKey: string } | null;
};

// version handling: accept K8S_SERIES="v1.31" or K8S_MINOR="1.31"
export function toSeries(x?: string | number): string {
  const s = (x ?? "v1.31").toString().trim();
  const withV = s.startsWith("v") ? s : `v${s}`;
  const m = withV.match(/^v\d+\.\d+/);
  if (!m) throw new ConfigError(`kubernetes series must look like "v1.31", got: ${s}`);
  return m[0];
}

function defaultKeyPath(): string {
  const home = process.env.HOME || os.homedir();
  return path.join(home, ".ssh", "id_ed25519");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClusterConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid configuration: ${details}`, { cause: parsed.error });
  }
  const e = parsed.data;

  parseAddress(e.COORDINATOR_ADDRESS);
  parseAddress(e.SERVICE_ADDRESS);

  const keyPath = e.SSH_KEY_PATH ?? defaultKeyPath();
  const supabase =
    e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
      : null;

  return {
    clusterName: e.CLUSTER_NAME,
    networkPlugin: e.NETWORK_PLUGIN ?? null,
    coordinatorAddress: e.COORDINATOR_ADDRESS,
    workerCount: e.WORKER_COUNT,
    coordinator: { memoryMb: e.COORDINATOR_MEMORY_MB, cpus: e.COORDINATOR_CPUS },
    worker: { memoryMb: e.WORKER_MEMORY_MB, cpus: e.WORKER_CPUS },
    box: { image: e.BOX_IMAGE, version: e.BOX_VERSION },
    ssh: {
      user: e.SSH_USER,
      keyPath,
      trustKeyPath: e.TRUST_KEY_PATH ?? keyPath,
      timeoutMs: e.SSH_TIMEOUT_MS,
    },
    hostInterface: e.HOST_INTERFACE,
    serviceAddress: e.SERVICE_ADDRESS,
    joinScriptPath: e.JOIN_SCRIPT_PATH,
    kubeconfigDir: e.KUBECONFIG_DIR,
    k8sSeries: toSeries(e.K8S_SERIES ?? e.K8S_MINOR),
    workerConcurrency: e.WORKER_CONCURRENCY,
    redisUrl: e.REDIS_URL ?? null,
    queueName: e.QUEUE_NAME,
    supabase,
  };
}

export function parseJobOverrides(raw: unknown): BootstrapJobData {
  const parsed = bootstrapJobSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid bootstrap overrides: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function withJobOverrides(config: ClusterConfig, data: BootstrapJobData): ClusterConfig {
  if (data.coordinatorAddress) parseAddress(data.coordinatorAddress);
  return {
    ...config,
    clusterName: data.clusterName ?? config.clusterName,
    networkPlugin: data.networkPlugin ?? config.networkPlugin,
    coordinatorAddress: data.coordinatorAddress ?? config.coordinatorAddress,
    workerCount: data.workerCount ?? config.workerCount,
  };
}

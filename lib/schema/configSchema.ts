import { z } from "zod";

// env vars are strings; blank means "use the default"
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const str = (fallback: string) => z.preprocess(blankToUndefined, z.string().min(1).default(fallback));
const optionalStr = () => z.preprocess(blankToUndefined, z.string().min(1).optional());
const int = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const clusterName = z
  .string()
  .regex(/^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/, "must be lowercase letters, digits and dashes");

export const envSchema = z.object({
  NETWORK_PLUGIN: optionalStr(),
  CLUSTER_NAME: z.preprocess(blankToUndefined, clusterName.default("lab")),
  COORDINATOR_ADDRESS: str("192.168.205.10"),
  WORKER_COUNT: int(2, 0),
  COORDINATOR_MEMORY_MB: int(2048, 1024),
  COORDINATOR_CPUS: int(2, 2),
  WORKER_MEMORY_MB: int(1024, 512),
  WORKER_CPUS: int(1, 1),
  BOX_IMAGE: str("ubuntu/jammy64"),
  BOX_VERSION: str("20240821.0.1"),

  SSH_USER: str("vagrant"),
  SSH_KEY_PATH: optionalStr(),
  TRUST_KEY_PATH: optionalStr(),
  SSH_TIMEOUT_MS: int(120_000, 1_000),

  HOST_INTERFACE: str("enp0s8"),
  SERVICE_ADDRESS: str("10.96.0.1"),
  JOIN_SCRIPT_PATH: str("/etc/kubeadm/join.sh"),
  KUBECONFIG_DIR: str("./kubeconfigs"),
  K8S_SERIES: optionalStr(),
  K8S_MINOR: optionalStr(),
  WORKER_CONCURRENCY: int(1, 1),

  REDIS_URL: optionalStr(),
  QUEUE_NAME: str("cluster-bootstrap"),
  SUPABASE_URL: optionalStr(),
  SUPABASE_SERVICE_ROLE_KEY: optionalStr(),
});

// overrides accepted on an enqueued bootstrap job
export const bootstrapJobSchema = z.object({
  clusterName: clusterName.optional(),
  networkPlugin: z.string().optional(),
  coordinatorAddress: z.string().min(7).optional(),
  workerCount: z.number().int().min(0).optional(),
});

export type BootstrapJobData = z.infer<typeof bootstrapJobSchema>;

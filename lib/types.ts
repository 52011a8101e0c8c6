// types.ts
export type Role = "coordinator" | "worker";

export type MachineSpec = {
  readonly name: string;
  readonly role: Role;
  readonly address: string; // IPv4 on the host-only network
  readonly memoryMb: number;
  readonly cpus: number;
  readonly group: string; // hypervisor display group, e.g. "/lab"
};

export const PLUGIN_IDS = ["calico", "canal", "flannel", "weave", "romana"] as const;
export type PluginId = (typeof PLUGIN_IDS)[number];

export type ManifestRef =
  | { readonly kind: "static"; readonly url: string }
  // weave negotiates its manifest against the cluster's own `kubectl version`
  | { readonly kind: "weave"; readonly baseUrl: string };

export type ManifestPatch =
  | { readonly kind: "replace"; readonly find: string; readonly replace: (iface: string) => string }
  | { readonly kind: "append-arg"; readonly after: RegExp; readonly arg: (iface: string) => string };

export type HostWorkaround = {
  readonly manifest: number; // index into NetworkPlugin.manifests
  readonly patch: ManifestPatch;
};

export type NetworkPlugin = {
  readonly id: PluginId;
  readonly cidr: string | null;
  readonly manifests: readonly ManifestRef[];
  readonly hostWorkaround: HostWorkaround | null;
  readonly serviceRoute: readonly Role[];
};

export type RoleRequirements = {
  cidr: string | null;
  interfaceOverride: HostWorkaround | null;
  serviceRoute: boolean;
};

export type JoinCredential = {
  readonly path: string; // well-known script path on the coordinator
  readonly command: string; // `kubeadm join ...`
  readonly endpoint: string; // host:port
  readonly token: string;
};

export type BootstrapPlan = {
  readonly clusterName: string;
  readonly coordinator: MachineSpec;
  readonly workers: readonly MachineSpec[];
  readonly machines: readonly MachineSpec[]; // coordinator first, then workers in order
  readonly plugin: NetworkPlugin;
};

export type MachineStatus =
  | "planned"
  | "provisioned"
  | "initialized"
  | "joined"
  | "done"
  | "failed";

export type MachineOutcome = {
  name: string;
  role: Role;
  address: string;
  status: MachineStatus;
  error?: string;
};

export type BootstrapReport = {
  runId: string;
  clusterName: string;
  plugin: PluginId;
  coordinator: MachineOutcome;
  workers: MachineOutcome[];
  joined: number;
  total: number;
  summary: string; // "N of M workers joined"
  warnings: string[];
  kubeconfigPath: string | null;
};

export type MachineDefinition = {
  name: string;
  role: Role;
  box: string;
  box_version: string;
  ip: string;
  memory: number;
  cpus: number;
  group: string;
};

// row shape of the `clusters` table the status recorder writes
export type ClusterRunRow = {
  cluster_id: string;
  cluster_name: string;
  control_plane: string | null;
  workers: string[];
  create_status: boolean;
  connect_status: boolean;
  verify_status: boolean;
  cni_plugin: PluginId | null;
  k8s_version: string | null;
  status: "pending" | "creating" | "ready" | "degraded" | "failed";
};

export type RunResultSummary = { report: BootstrapReport } | { error: Error };

/** Observer of a bootstrap run; failures here are logged, never fatal to the run. */
export interface BootstrapReporter {
  started(runId: string, plan: BootstrapPlan): Promise<void>;
  machineChanged(runId: string, outcome: MachineOutcome): Promise<void>;
  finished(runId: string, plan: BootstrapPlan, result: RunResultSummary): Promise<void>;
}

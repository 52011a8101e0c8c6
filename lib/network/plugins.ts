import { NetworkApplyError, UnknownPluginError } from "../errors";
import {
  PLUGIN_IDS,
  type ManifestPatch,
  type NetworkPlugin,
  type PluginId,
  type Role,
  type RoleRequirements,
} from "../types";

export const DEFAULT_PLUGIN: PluginId = "calico";

const CALICO_BASE = "https://docs.projectcalico.org/v3.3/getting-started/kubernetes/installation/hosted";

// The lab VMs have a NAT adapter first and the host-only adapter second; flannel,
// canal and romana bind to the first one unless told otherwise.
const CATALOG: Record<PluginId, NetworkPlugin> = {
  calico: {
    id: "calico",
    cidr: "192.168.0.0/16",
    manifests: [
      { kind: "static", url: `${CALICO_BASE}/rbac-kdd.yaml` },
      { kind: "static", url: `${CALICO_BASE}/kubernetes-datastore/calico-networking/1.7/calico.yaml` },
    ],
    hostWorkaround: null,
    serviceRoute: [],
  },
  canal: {
    id: "canal",
    cidr: "10.244.0.0/16",
    manifests: [
      { kind: "static", url: `${CALICO_BASE}/canal/rbac.yaml` },
      { kind: "static", url: `${CALICO_BASE}/canal/canal.yaml` },
    ],
    hostWorkaround: {
      manifest: 1,
      patch: {
        kind: "replace",
        find: 'canal_iface: ""',
        replace: (iface) => `canal_iface: "${iface}"`,
      },
    },
    serviceRoute: [],
  },
  flannel: {
    id: "flannel",
    cidr: "10.244.0.0/16",
    manifests: [
      { kind: "static", url: "https://raw.githubusercontent.com/coreos/flannel/master/Documentation/kube-flannel.yml" },
    ],
    hostWorkaround: {
      manifest: 0,
      patch: { kind: "append-arg", after: /^([ \t]*)- --kube-subnet-mgr[ \t]*$/m, arg: (iface) => `--iface=${iface}` },
    },
    serviceRoute: [],
  },
  weave: {
    id: "weave",
    cidr: null,
    manifests: [{ kind: "weave", baseUrl: "https://cloud.weave.works/k8s/net" }],
    hostWorkaround: null,
    // pods reach the API through the service VIP before weave routes it; every node needs the route
    serviceRoute: ["coordinator", "worker"],
  },
  romana: {
    id: "romana",
    cidr: null,
    manifests: [
      { kind: "static", url: "https://raw.githubusercontent.com/romana/romana/master/containerize/specs/romana-kubeadm.yml" },
    ],
    hostWorkaround: {
      manifest: 0,
      patch: {
        kind: "append-arg",
        after: /^([ \t]*)- --service-cluster-ip-range=\S+[ \t]*$/m,
        arg: (iface) => `--interface=${iface}`,
      },
    },
    serviceRoute: [],
  },
};

function isPluginId(value: string): value is PluginId {
  return PLUGIN_IDS.some((id) => id === value);
}

export function resolvePlugin(identifier: string): NetworkPlugin {
  if (!isPluginId(identifier)) throw new UnknownPluginError(identifier, PLUGIN_IDS);
  return CATALOG[identifier];
}

/** Applies the default for an absent or blank selection, then resolves. */
export function resolvePluginSelection(raw: string | null | undefined): NetworkPlugin {
  const selected = raw?.trim() ? raw.trim() : DEFAULT_PLUGIN;
  return resolvePlugin(selected);
}

export function requirementsFor(plugin: NetworkPlugin, role: Role): RoleRequirements {
  return {
    cidr: role === "coordinator" ? plugin.cidr : null,
    interfaceOverride: role === "coordinator" ? plugin.hostWorkaround : null,
    serviceRoute: plugin.serviceRoute.includes(role),
  };
}

export function patchManifest(text: string, patch: ManifestPatch, iface: string, machine: string): string {
  if (patch.kind === "replace") {
    if (!text.includes(patch.find)) {
      throw new NetworkApplyError(machine, `manifest has no "${patch.find}" to override`);
    }
    return text.split(patch.find).join(patch.replace(iface));
  }

  const match = patch.after.exec(text);
  if (!match) {
    throw new NetworkApplyError(machine, `manifest has no line matching ${patch.after} to extend`);
  }
  const indent = match[1] ?? "";
  const anchor = match[0].replace(/\s+$/, "");
  const end = match.index + anchor.length;
  return `${text.slice(0, end)}\n${indent}- ${patch.arg(iface)}${text.slice(end)}`;
}

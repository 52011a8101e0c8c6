// tools.ts
import { command, shell, sudo, withEnv, withStdin, type Command } from "./command";

export const ADMIN_CONF = "/etc/kubernetes/admin.conf";
export const KUBELET_CONF = "/etc/kubernetes/kubelet.conf";
export const TRUST_KEY = ".ssh/cluster_trust"; // relative to the login user's home
export const LOCAL_JOIN_SCRIPT = "/tmp/kubeadm-join.sh";

const admin = (cmd: Command) => withEnv(sudo(cmd), { KUBECONFIG: ADMIN_CONF });

// ---------- kubeadm ----------
export const kubeadm = {
  init(advertiseAddress: string, podCidr: string | null): Command {
    const args = ["init", `--apiserver-advertise-address=${advertiseAddress}`];
    if (podCidr) args.push(`--pod-network-cidr=${podCidr}`);
    return sudo(command("kubeadm", ...args));
  },
  printJoinCommand(): Command {
    return sudo(command("kubeadm", "token", "create", "--print-join-command"));
  },
};

// ---------- kubectl ----------
export const kubectl = {
  apply(ref: string): Command {
    return admin(command("kubectl", "apply", "-f", ref));
  },
  applyStdin(manifest: string): Command {
    return withStdin(admin(command("kubectl", "apply", "-f", "-")), manifest);
  },
  version(): Command {
    return admin(command("kubectl", "version"));
  },
  // bounded by the remote loop (150 x 2s), not by a retry here
  waitReady(): Command {
    return admin(
      shell(
        "for i in $(seq 1 150); do kubectl get --raw=/readyz >/dev/null 2>&1 && exit 0; sleep 2; done; " +
          'echo "apiserver not ready" >&2; exit 1'
      )
    );
  },
};

// ---------- host ----------
export const host = {
  interfaceAddress(iface: string): Command {
    return command("ip", "-4", "-o", "addr", "show", "dev", iface);
  },
  serviceRouteVia(serviceAddress: string, via: string): Command {
    return sudo(command("ip", "route", "replace", `${serviceAddress}/32`, "via", via));
  },
  // the coordinator cannot route via its own address; pin the VIP to the adapter instead
  serviceRouteDev(serviceAddress: string, iface: string): Command {
    return sudo(command("ip", "route", "replace", `${serviceAddress}/32`, "dev", iface));
  },
  fileExists(path: string): Command {
    return sudo(command("test", "-s", path));
  },
  readFile(path: string): Command {
    return sudo(command("cat", path));
  },
  writeExecutable(path: string, content: string): Command {
    return withStdin(
      sudo(shell('mkdir -p "$(dirname "$1")" && cat > "$1" && chmod 0755 "$1"', path)),
      content
    );
  },
  fetch(url: string): Command {
    return command("curl", "-fsSL", "--retry", "3", url);
  },
  installAdminConfig(): Command {
    return shell(
      'mkdir -p "$HOME/.kube" && sudo cp -f "$1" "$HOME/.kube/config" && sudo chown "$(id -u):$(id -g)" "$HOME/.kube/config"',
      ADMIN_CONF
    );
  },
  authorizeKey(publicKey: string): Command {
    return shell(
      'mkdir -p .ssh && chmod 700 .ssh && touch .ssh/authorized_keys && ' +
        '(grep -qxF "$1" .ssh/authorized_keys || echo "$1" >> .ssh/authorized_keys) && chmod 600 .ssh/authorized_keys',
      publicKey.trim()
    );
  },
  stageKey(path: string, mode: "0600" | "0644", content: string): Command {
    return withStdin(shell('mkdir -p .ssh && chmod 700 .ssh && cat > "$1" && chmod "$2" "$1"', path, mode), content);
  },
  hasTools(...names: string[]): Command {
    return shell('for t in "$@"; do command -v "$t" >/dev/null 2>&1 || exit 1; done', ...names);
  },
};

// ---------- scp (run on a worker, pulling from the coordinator) ----------
export function scpFrom(user: string, from: string, remotePath: string, localPath: string): Command {
  return command(
    "scp",
    "-i",
    TRUST_KEY,
    // closed, throwaway lab network: no known_hosts bookkeeping
    "-o",
    "StrictHostKeyChecking=no",
    "-o",
    "UserKnownHostsFile=/dev/null",
    "-o",
    "BatchMode=yes",
    "-o",
    "ConnectTimeout=10",
    "-o",
    "ConnectionAttempts=5",
    `${user}@${from}:${remotePath}`,
    localPath
  );
}

export function runScript(path: string): Command {
  return sudo(command("sh", path));
}

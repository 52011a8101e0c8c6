// provision.ts
import { ProvisionError, describeError } from "../lib/errors";
import type { MachineSpec } from "../lib/types";
import { command, sudo, withEnv, withStdin } from "./command";
import type { StepContext } from "./context";
import { PROVISION_NODE } from "./scripts";
import { TRUST_KEY, host } from "./tools";

export type ProvisionResult = { skippedPackages: boolean };

/**
 * Same for every role: container runtime + kube tools, kernel prerequisites,
 * swap off, trust key pair. Safe to re-run on a provisioned machine.
 */
export async function provisionNode(machine: MachineSpec, ctx: StepContext): Promise<ProvisionResult> {
  const { runner, config, trust } = ctx;
  const tag = `[provision:${machine.name}]`;

  const step = async <T>(what: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      throw new ProvisionError(machine.name, `${what} failed: ${describeError(err)}`, { cause: err });
    }
  };

  await step("waiting for ssh", () => runner.waitUntilReachable(machine.address));

  const present = await step("probing installed tools", () =>
    runner.succeeds(machine.address, host.hasTools("kubeadm", "kubelet", "containerd"))
  );
  if (present) {
    console.log(`${tag} kubeadm/containerd already installed, skipping packages`);
  } else {
    console.log(`${tag} installing containerd + kube tools (${config.k8sSeries})`);
    const script = withStdin(
      withEnv(sudo(command("bash", "-s")), { K8S_SERIES: config.k8sSeries, NODE_IP: machine.address }),
      PROVISION_NODE
    );
    await step("package install", () => runner.run(machine.address, script, { timeoutMs: 15 * 60_000 }));
  }

  await step("staging trust key", () =>
    runner.run(machine.address, host.stageKey(TRUST_KEY, "0600", trust.privateKey))
  );
  await step("staging trust public key", () =>
    runner.run(machine.address, host.stageKey(`${TRUST_KEY}.pub`, "0644", `${trust.publicKey}\n`))
  );

  console.log(`${tag} done`);
  return { skippedPackages: present };
}

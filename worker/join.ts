// join.ts
import { JoinError, describeError } from "../lib/errors";
import { requirementsFor } from "../lib/network/plugins";
import type { JoinCredential, MachineSpec, NetworkPlugin } from "../lib/types";
import type { StepContext } from "./context";
import { KUBELET_CONF, LOCAL_JOIN_SCRIPT, host, runScript, scpFrom } from "./tools";

export type JoinResult = { alreadyJoined: boolean };

export async function joinWorker(
  machine: MachineSpec,
  coordinator: MachineSpec,
  plugin: NetworkPlugin,
  credential: JoinCredential,
  ctx: StepContext
): Promise<JoinResult> {
  const { runner, config } = ctx;
  const tag = `[join:${machine.name}]`;

  const step = async <T>(what: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      throw new JoinError(machine.name, `${what} failed: ${describeError(err)}`, { cause: err });
    }
  };

  // 1) route to the service VIP must exist before talking to the coordinator
  if (requirementsFor(plugin, "worker").serviceRoute) {
    await step("service route", () =>
      runner.run(machine.address, host.serviceRouteVia(config.serviceAddress, coordinator.address))
    );
    console.log(`${tag} route ${config.serviceAddress} via ${coordinator.address}`);
  }

  const alreadyJoined = await step("probing kubelet config", () =>
    runner.succeeds(machine.address, host.fileExists(KUBELET_CONF))
  );
  if (alreadyJoined) {
    console.log(`${tag} ${KUBELET_CONF} present, already joined`);
    return { alreadyJoined: true };
  }

  // 2) pull the script; scp owns connection retries and timeouts
  await step(`fetching ${credential.path} from ${coordinator.address}`, () =>
    runner.run(
      machine.address,
      scpFrom(config.ssh.user, coordinator.address, credential.path, LOCAL_JOIN_SCRIPT),
      { timeoutMs: 2 * 60_000 }
    )
  );

  // 3) run it
  console.log(`${tag} joining ${credential.endpoint}`);
  await step("kubeadm join", () =>
    runner.run(machine.address, runScript(LOCAL_JOIN_SCRIPT), { timeoutMs: 5 * 60_000 })
  );
  console.log(`${tag} joined`);
  return { alreadyJoined: false };
}

// coordinator.ts
import { InitError, NetworkApplyError, describeError } from "../lib/errors";
import { patchManifest, requirementsFor } from "../lib/network/plugins";
import type { JoinCredential, MachineSpec, ManifestRef, NetworkPlugin } from "../lib/types";
import type { StepContext } from "./context";
import { ADMIN_CONF, host, kubeadm, kubectl } from "./tools";

export type CoordinatorResult = {
  advertiseAddress: string;
  credential: JoinCredential;
  initSkipped: boolean;
  credentialReused: boolean;
  warnings: NetworkApplyError[];
};

export function parseInterfaceAddress(stdout: string): string | null {
  const m = stdout.match(/\binet (\d{1,3}(?:\.\d{1,3}){3})\//);
  return m ? m[1] : null;
}

/** Pulls the `kubeadm join ...` line out of kubeadm output or a saved join script. */
export function parseJoinCommand(text: string, path: string): JoinCredential | null {
  const line = text
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.startsWith("kubeadm join "));
  if (!line) return null;

  const words = line.split(/\s+/);
  const endpoint = words[2];
  const tokenAt = words.indexOf("--token");
  const token = tokenAt >= 0 ? words[tokenAt + 1] : undefined;
  if (!endpoint || endpoint.startsWith("--") || !token) return null;

  return { path, command: line, endpoint, token };
}

export function weaveManifestUrl(baseUrl: string, kubectlVersion: string): string {
  const encoded = Buffer.from(kubectlVersion, "utf8").toString("base64");
  return `${baseUrl}?k8s-version=${encodeURIComponent(encoded)}`;
}

async function manifestUrl(ref: ManifestRef, machine: MachineSpec, ctx: StepContext): Promise<string> {
  if (ref.kind === "static") return ref.url;
  const { stdout } = await ctx.runner.run(machine.address, kubectl.version());
  return weaveManifestUrl(ref.baseUrl, stdout);
}

/**
 * Applies the plugin's manifests in catalog order. Failures are collected, not
 * thrown: the join credential is still issued on a degraded network.
 */
export async function applyNetworkPlugin(
  machine: MachineSpec,
  plugin: NetworkPlugin,
  ctx: StepContext
): Promise<NetworkApplyError[]> {
  const { runner, config } = ctx;
  const req = requirementsFor(plugin, "coordinator");
  const warnings: NetworkApplyError[] = [];
  const tag = `[cni:${plugin.id}]`;

  const record = (what: string, err: unknown) => {
    const warning =
      err instanceof NetworkApplyError
        ? err
        : new NetworkApplyError(machine.name, `${what}: ${describeError(err)}`, { cause: err });
    console.warn(`${tag} ${warning.message}`);
    warnings.push(warning);
  };

  if (req.serviceRoute) {
    try {
      await runner.run(machine.address, host.serviceRouteDev(config.serviceAddress, config.hostInterface));
      console.log(`${tag} route ${config.serviceAddress} dev ${config.hostInterface}`);
    } catch (err) {
      record("service route", err);
    }
  }

  for (const [i, ref] of plugin.manifests.entries()) {
    try {
      const url = await manifestUrl(ref, machine, ctx);
      if (req.interfaceOverride && req.interfaceOverride.manifest === i) {
        const { stdout } = await runner.run(machine.address, host.fetch(url));
        const patched = patchManifest(stdout, req.interfaceOverride.patch, config.hostInterface, machine.name);
        await runner.run(machine.address, kubectl.applyStdin(patched), { timeoutMs: 3 * 60_000 });
        console.log(`${tag} applied ${url} (iface=${config.hostInterface})`);
      } else {
        await runner.run(machine.address, kubectl.apply(url), { timeoutMs: 3 * 60_000 });
        console.log(`${tag} applied ${url}`);
      }
    } catch (err) {
      record(`manifest ${i + 1}/${plugin.manifests.length}`, err);
    }
  }
  return warnings;
}

export async function initializeCoordinator(
  machine: MachineSpec,
  plugin: NetworkPlugin,
  ctx: StepContext
): Promise<CoordinatorResult> {
  const { runner, config, trust } = ctx;
  const tag = `[init:${machine.name}]`;

  const fatal = async <T>(what: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof InitError) throw err;
      throw new InitError(machine.name, `${what} failed: ${describeError(err)}`, { cause: err });
    }
  };

  // 1) advertise address from the host-only adapter
  const advertiseAddress = await fatal(`reading ${config.hostInterface} address`, async () => {
    const { stdout } = await runner.run(machine.address, host.interfaceAddress(config.hostInterface));
    const addr = parseInterfaceAddress(stdout);
    if (!addr) throw new InitError(machine.name, `no IPv4 address on ${config.hostInterface}`);
    return addr;
  });
  if (advertiseAddress !== machine.address) {
    console.warn(`${tag} ${config.hostInterface} has ${advertiseAddress}, planned ${machine.address}`);
  }

  // 2) kubeadm init, unless this machine already carries a control plane
  const initSkipped = await fatal("probing existing control plane", () =>
    runner.succeeds(machine.address, host.fileExists(ADMIN_CONF))
  );
  if (initSkipped) {
    console.log(`${tag} ${ADMIN_CONF} present, skipping kubeadm init`);
  } else {
    const cidr = requirementsFor(plugin, "coordinator").cidr;
    console.log(`${tag} kubeadm init on ${advertiseAddress}${cidr ? ` cidr=${cidr}` : ""}`);
    await fatal("kubeadm init", () =>
      runner.run(machine.address, kubeadm.init(advertiseAddress, cidr), { timeoutMs: 10 * 60_000 })
    );
  }

  // 3) kubeconfig for the login user
  await fatal("installing admin kubeconfig", () => runner.run(machine.address, host.installAdminConfig()));

  await fatal("waiting for apiserver", () =>
    runner.run(machine.address, kubectl.waitReady(), { timeoutMs: 6 * 60_000 })
  );
  console.log(`${tag} apiserver ready`);

  // 4/5) overlay network; degraded is tolerated
  const warnings = await applyNetworkPlugin(machine, plugin, ctx);

  // 6) join credential: minted after this init; a saved script only counts when init was skipped
  const { credential, reused } = await fatal("issuing join credential", async () => {
    const path = config.joinScriptPath;
    if (initSkipped && (await runner.succeeds(machine.address, host.fileExists(path)))) {
      const { stdout } = await runner.run(machine.address, host.readFile(path));
      const existing = parseJoinCommand(stdout, path);
      if (existing) return { credential: existing, reused: true };
      console.warn(`${tag} ${path} has no join command, minting a new one`);
    }
    const { stdout } = await runner.run(machine.address, kubeadm.printJoinCommand());
    const minted = parseJoinCommand(stdout, path);
    if (!minted) throw new InitError(machine.name, `unexpected kubeadm output: ${stdout.trim()}`);
    await runner.run(machine.address, host.writeExecutable(path, `#!/bin/sh\n${minted.command}\n`));
    return { credential: minted, reused: false };
  });
  console.log(`${tag} join credential ${reused ? "reused" : "written"} at ${credential.path} (${credential.endpoint})`);

  // 7) let workers pull the join script over the trusted channel
  await fatal("authorizing trust key", () => runner.run(machine.address, host.authorizeKey(trust.publicKey)));

  return { advertiseAddress, credential, initSkipped, credentialReused: reused, warnings };
}

import fs from "node:fs/promises";
import path from "node:path";
import { BootstrapError, describeError } from "../lib/errors";
import type { MachineSpec } from "../lib/types";
import type { StepContext } from "./context";
import { ADMIN_CONF, host } from "./tools";

export function kubeconfigPath(dir: string, clusterName: string): string {
  return path.join(dir, `${clusterName}.yaml`);
}

/** Copies the coordinator's admin.conf to `<KUBECONFIG_DIR>/<cluster>.yaml` on this host. */
export async function exportKubeconfig(
  coordinator: MachineSpec,
  clusterName: string,
  ctx: StepContext
): Promise<string> {
  const dest = kubeconfigPath(ctx.config.kubeconfigDir, clusterName);
  try {
    const { stdout } = await ctx.runner.run(coordinator.address, host.readFile(ADMIN_CONF));
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await fs.writeFile(dest, stdout.endsWith("\n") ? stdout : `${stdout}\n`, { mode: 0o600 });
  } catch (err) {
    throw new BootstrapError("export", `kubeconfig export failed: ${describeError(err)}`, coordinator.name, {
      cause: err,
    });
  }
  console.log(`[kubeconfig] ${dest}`);
  return dest;
}

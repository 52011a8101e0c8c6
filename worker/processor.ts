// processor.ts
import { UnrecoverableError, type Job } from "bullmq";
import { parseJobOverrides, withJobOverrides, type ClusterConfig } from "../lib/config";
import { ConfigError } from "../lib/errors";
import { buildPlan } from "../lib/plan";
import type { BootstrapReport, BootstrapReporter } from "../lib/types";
import type { TrustMaterial } from "./context";
import { runBootstrap } from "./driver";
import type { RemoteRunner } from "./ssh";

export type ProcessorDeps = {
  config: ClusterConfig;
  runner: RemoteRunner;
  loadTrust: (keyPath: string) => Promise<TrustMaterial>;
  reporter?: BootstrapReporter | null;
};

export type BootstrapJob = Pick<Job, "id" | "data">;

export function createBootstrapProcessor(deps: ProcessorDeps) {
  return async (job: BootstrapJob): Promise<BootstrapReport> => {
    try {
      const config = withJobOverrides(deps.config, parseJobOverrides(job.data));
      const plan = buildPlan(config);
      const trust = await deps.loadTrust(config.ssh.trustKeyPath);

      console.log("[job] received", { id: job.id, cluster: plan.clusterName, plugin: plan.plugin.id });
      return await runBootstrap(plan, {
        runner: deps.runner,
        config,
        trust,
        reporter: deps.reporter,
        runId: job.id,
      });
    } catch (err) {
      // bad input will not get better on retry
      if (err instanceof ConfigError) throw new UnrecoverableError(err.message);
      throw err;
    }
  };
}

// driver.ts
import crypto from "node:crypto";
import { BootstrapError, InitError, JoinError, describeError } from "../lib/errors";
import type {
  BootstrapPlan,
  BootstrapReport,
  BootstrapReporter,
  MachineSpec,
  MachineStatus,
} from "../lib/types";
import type { StepContext } from "./context";
import { initializeCoordinator } from "./coordinator";
import { joinWorker } from "./join";
import { exportKubeconfig } from "./kubeconfig";
import { provisionNode } from "./provision";
import { MachineTracker } from "./state";

export type DriverDeps = StepContext & {
  reporter?: BootstrapReporter | null;
  runId?: string;
};

export function joinSummary(joined: number, total: number): string {
  return `${joined} of ${total} workers joined`;
}

async function runPool<T>(items: readonly T[], limit: number, fn: (item: T) => Promise<void>): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const item = items[next++];
      await fn(item);
    }
  });
  await Promise.all(lanes);
}

/**
 * Provisions and initializes the coordinator, then provisions and joins every
 * worker. A coordinator failure aborts the run (rethrown); a worker failure is
 * recorded and the remaining workers carry on.
 */
export async function runBootstrap(plan: BootstrapPlan, deps: DriverDeps): Promise<BootstrapReport> {
  const { reporter, ...ctx } = deps;
  const runId = deps.runId ?? crypto.randomUUID();
  const tracker = new MachineTracker(plan);
  const warnings: string[] = [];
  const coordinator = plan.coordinator;

  const report = async (what: string, fn: (r: BootstrapReporter) => Promise<void>) => {
    if (!reporter) return;
    try {
      await fn(reporter);
    } catch (err) {
      console.error(`[report] ${what} failed: ${describeError(err)}`);
    }
  };

  const mark = async (machine: MachineSpec, to: MachineStatus, error?: string) => {
    tracker.transition(machine.name, to, error);
    console.log(`[state] ${machine.name} -> ${to}`);
    await report("machine update", (r) => r.machineChanged(runId, tracker.outcome(machine.name)));
  };

  console.log("[bootstrap] starting", {
    runId,
    cluster: plan.clusterName,
    plugin: plan.plugin.id,
    coordinator: coordinator.address,
    workers: plan.workers.map((w) => w.address),
  });
  await report("run start", (r) => r.started(runId, plan));

  // ---------- coordinator: any failure is fatal ----------
  let coordinatorWarnings: string[];
  try {
    await provisionNode(coordinator, ctx);
    await mark(coordinator, "provisioned");

    const result = await initializeCoordinator(coordinator, plan.plugin, ctx);
    tracker.recordInitialized(result.credential);
    console.log(`[state] ${coordinator.name} -> initialized`);
    await report("machine update", (r) => r.machineChanged(runId, tracker.outcome(coordinator.name)));
    coordinatorWarnings = result.warnings.map((w) => w.message);
  } catch (err) {
    const error =
      err instanceof BootstrapError ? err : new InitError(coordinator.name, describeError(err), { cause: err });
    await mark(coordinator, "failed", error.message);
    console.error(`[bootstrap] coordinator failed, aborting run: ${error.message}`);
    await report("run finish", (r) => r.finished(runId, plan, { error }));
    throw error;
  }
  warnings.push(...coordinatorWarnings);

  // ---------- workers: failures are per machine ----------
  await runPool(plan.workers, ctx.config.workerConcurrency, async (worker) => {
    try {
      await provisionNode(worker, ctx);
      await mark(worker, "provisioned");
      const credential = tracker.joinCredential(worker.name);
      await joinWorker(worker, coordinator, plan.plugin, credential, ctx);
      await mark(worker, "joined");
      await mark(worker, "done");
    } catch (err) {
      const error =
        err instanceof BootstrapError ? err : new JoinError(worker.name, describeError(err), { cause: err });
      console.error(`[bootstrap] ${error.message}`);
      await mark(worker, "failed", error.message);
    }
  });

  let kubeconfigPath: string | null = null;
  try {
    kubeconfigPath = await exportKubeconfig(coordinator, plan.clusterName, ctx);
  } catch (err) {
    const message = describeError(err);
    console.warn(`[bootstrap] ${message}`);
    warnings.push(message);
  }
  await mark(coordinator, "done");

  const workers = plan.workers.map((w) => tracker.outcome(w.name));
  const joined = workers.filter((w) => w.status === "done").length;
  const result: BootstrapReport = {
    runId,
    clusterName: plan.clusterName,
    plugin: plan.plugin.id,
    coordinator: tracker.outcome(coordinator.name),
    workers,
    joined,
    total: workers.length,
    summary: joinSummary(joined, workers.length),
    warnings,
    kubeconfigPath,
  };

  const log = joined === workers.length ? console.log : console.warn;
  log(`[bootstrap] ${result.summary}`);
  for (const w of workers.filter((o) => o.status === "failed")) log(`[bootstrap]   ${w.name}: ${w.error}`);

  await report("run finish", (r) => r.finished(runId, plan, { report: result }));
  return result;
}

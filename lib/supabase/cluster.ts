// cluster.ts (pure Node/BullMQ environment)
import { createClient as createSb, type SupabaseClient } from "@supabase/supabase-js";
import type {
  BootstrapPlan,
  BootstrapReporter,
  ClusterRunRow,
  MachineOutcome,
  RunResultSummary,
} from "../types";

export function createSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createSb(url, serviceRoleKey, { auth: { persistSession: false, autoRefreshToken: false } });
}

export function toClusterRow(runId: string, plan: BootstrapPlan, k8sVersion: string | null): ClusterRunRow {
  return {
    cluster_id: runId,
    cluster_name: plan.clusterName,
    control_plane: plan.coordinator.address,
    workers: plan.workers.map((w) => w.address),
    create_status: false,
    connect_status: false,
    verify_status: false,
    cni_plugin: plan.plugin.id,
    k8s_version: k8sVersion,
    status: "pending",
  };
}

/**
 * Records a run in the `clusters` table: one row per run, phase flags flipped
 * as the coordinator initializes (create), workers finish (connect) and the
 * kubeconfig is exported (verify).
 */
export function createSupabaseReporter(supabase: SupabaseClient, k8sVersion: string | null): BootstrapReporter {
  const update = async (runId: string, patch: Partial<ClusterRunRow>) => {
    const { error } = await supabase.from("clusters").update(patch).eq("cluster_id", runId);
    if (error) throw new Error(`clusters update failed: ${error.message}`);
  };

  return {
    async started(runId: string, plan: BootstrapPlan) {
      const { error } = await supabase.from("clusters").insert(toClusterRow(runId, plan, k8sVersion));
      if (error) throw new Error(`clusters insert failed: ${error.message}`);
    },

    async machineChanged(runId: string, outcome: MachineOutcome) {
      if (outcome.role !== "coordinator") return;
      if (outcome.status === "initialized") await update(runId, { create_status: true, status: "creating" });
      if (outcome.status === "failed") await update(runId, { status: "failed" });
    },

    async finished(runId: string, _plan: BootstrapPlan, result: RunResultSummary) {
      if ("error" in result) {
        await update(runId, { status: "failed" });
        return;
      }
      const { report } = result;
      const complete = report.joined === report.total && report.warnings.length === 0;
      await update(runId, {
        connect_status: true,
        verify_status: report.kubeconfigPath !== null,
        status: complete ? "ready" : "degraded",
      });
    },
  };
}

import type { ClusterConfig } from "./config";
import { allocateWorkerAddresses, formatAddress, parseAddress } from "./network/address";
import { resolvePluginSelection } from "./network/plugins";
import type { BootstrapPlan, MachineDefinition, MachineSpec } from "./types";

export function coordinatorName(clusterName: string): string {
  return `${clusterName}-coordinator`;
}

export function workerName(clusterName: string, index: number): string {
  return `${clusterName}-worker-${index}`;
}

export function planMachines(config: ClusterConfig): MachineSpec[] {
  const group = `/${config.clusterName}`;
  const coordinator: MachineSpec = Object.freeze({
    name: coordinatorName(config.clusterName),
    role: "coordinator",
    address: formatAddress(parseAddress(config.coordinatorAddress)),
    memoryMb: config.coordinator.memoryMb,
    cpus: config.coordinator.cpus,
    group,
  });

  const workers = allocateWorkerAddresses(coordinator.address, config.workerCount).map(
    (address, i): MachineSpec =>
      Object.freeze({
        name: workerName(config.clusterName, i + 1),
        role: "worker",
        address,
        memoryMb: config.worker.memoryMb,
        cpus: config.worker.cpus,
        group,
      })
  );

  return [coordinator, ...workers];
}

/**
 * Builds the run's immutable plan. The network plugin is resolved here, once;
 * nothing downstream re-reads the selection.
 */
export function buildPlan(config: ClusterConfig): BootstrapPlan {
  const plugin = resolvePluginSelection(config.networkPlugin);
  const machines = planMachines(config);
  const [coordinator, ...workers] = machines;

  return Object.freeze({
    clusterName: config.clusterName,
    coordinator,
    workers: Object.freeze(workers),
    machines: Object.freeze(machines),
    plugin,
  });
}

/** Machine list in the shape the Vagrantfile consumes. */
export function toMachineDefinitions(plan: BootstrapPlan, config: ClusterConfig): MachineDefinition[] {
  return plan.machines.map((m) => ({
    name: m.name,
    role: m.role,
    box: config.box.image,
    box_version: config.box.version,
    ip: m.address,
    memory: m.memoryMb,
    cpus: m.cpus,
    group: m.group,
  }));
}

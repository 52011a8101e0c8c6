// state.ts
import { BarrierError } from "../lib/errors";
import type { BootstrapPlan, JoinCredential, MachineOutcome, MachineSpec, MachineStatus } from "../lib/types";

const TRANSITIONS: Record<MachineStatus, readonly MachineStatus[]> = {
  planned: ["provisioned", "failed"],
  provisioned: ["initialized", "joined", "failed"],
  initialized: ["done", "failed"],
  joined: ["done", "failed"],
  done: [],
  failed: [],
};

type Entry = { machine: MachineSpec; status: MachineStatus; error?: string };

/**
 * Per-machine state for one run. Joining is gated here, not by call order:
 * a worker cannot enter `joined` until the coordinator is initialized and a
 * credential has been recorded.
 */
export class MachineTracker {
  private readonly entries = new Map<string, Entry>();
  private credential: JoinCredential | null = null;

  constructor(private readonly plan: BootstrapPlan) {
    for (const m of plan.machines) this.entries.set(m.name, { machine: m, status: "planned" });
  }

  status(name: string): MachineStatus {
    return this.entry(name).status;
  }

  transition(name: string, to: MachineStatus, error?: string): void {
    const entry = this.entry(name);
    if (!TRANSITIONS[entry.status].includes(to)) {
      throw new BarrierError(name, `illegal transition ${entry.status} -> ${to}`);
    }
    if (to === "initialized" && entry.machine.role !== "coordinator") {
      throw new BarrierError(name, "only the coordinator can be initialized");
    }
    if (to === "joined") {
      if (entry.machine.role !== "worker") throw new BarrierError(name, "only workers join");
      this.joinCredential(name);
    }
    entry.status = to;
    if (error !== undefined) entry.error = error;
  }

  recordInitialized(credential: JoinCredential): void {
    this.transition(this.plan.coordinator.name, "initialized");
    this.credential = credential;
  }

  /** The credential a worker may consume; throws while the barrier is closed. */
  joinCredential(worker: string): JoinCredential {
    const coordinator = this.status(this.plan.coordinator.name);
    if (coordinator !== "initialized" && coordinator !== "done") {
      throw new BarrierError(worker, `coordinator is ${coordinator}; workers join only after it is initialized`);
    }
    if (!this.credential) throw new BarrierError(worker, "no join credential has been issued");
    return this.credential;
  }

  outcome(name: string): MachineOutcome {
    const { machine, status, error } = this.entry(name);
    return {
      name: machine.name,
      role: machine.role,
      address: machine.address,
      status,
      ...(error !== undefined ? { error } : {}),
    };
  }

  private entry(name: string): Entry {
    const entry = this.entries.get(name);
    if (!entry) throw new BarrierError(name, "machine is not part of the plan");
    return entry;
  }
}

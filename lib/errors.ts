// errors.ts
export type Phase =
  | "config"
  | "provision"
  | "init"
  | "network"
  | "join"
  | "barrier"
  | "export";

export class BootstrapError extends Error {
  readonly phase: Phase;
  readonly machine: string | null;

  constructor(phase: Phase, message: string, machine?: string | null, options?: { cause?: unknown }) {
    super(machine ? `[${phase}:${machine}] ${message}` : `[${phase}] ${message}`, options);
    this.name = new.target.name;
    this.phase = phase;
    this.machine = machine ?? null;
  }
}

export class ConfigError extends BootstrapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, null, options);
  }
}

export class UnknownPluginError extends ConfigError {
  readonly identifier: string;

  constructor(identifier: string, known: readonly string[]) {
    super(`unknown network plugin "${identifier}" (expected one of: ${known.join(", ")})`);
    this.identifier = identifier;
  }
}

export class MalformedAddressError extends ConfigError {
  constructor(address: string) {
    super(`malformed IPv4 address: "${address}"`);
  }
}

export class AddressRangeExhaustedError extends ConfigError {}

export class ProvisionError extends BootstrapError {
  constructor(machine: string, message: string, options?: { cause?: unknown }) {
    super("provision", message, machine, options);
  }
}

export class InitError extends BootstrapError {
  constructor(machine: string, message: string, options?: { cause?: unknown }) {
    super("init", message, machine, options);
  }
}

export class NetworkApplyError extends BootstrapError {
  constructor(machine: string, message: string, options?: { cause?: unknown }) {
    super("network", message, machine, options);
  }
}

export class JoinError extends BootstrapError {
  constructor(machine: string, message: string, options?: { cause?: unknown }) {
    super("join", message, machine, options);
  }
}

export class BarrierError extends BootstrapError {
  constructor(machine: string, message: string) {
    super("barrier", message, machine);
  }
}

/** Short, single-line description of whatever was thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    // execa errors carry the full command line plus stderr; the first line is enough here
    return err.message.split("\n")[0] ?? err.message;
  }
  return String(err);
}

// command.ts
// Remote commands are built as argv and rendered with every argument quoted,
// so config values never reach the remote shell as shell syntax.

export type Command = {
  readonly program: string;
  readonly args: readonly string[];
  readonly sudo?: boolean;
  readonly env?: Readonly<Record<string, string>>;
  readonly stdin?: string;
};

const SAFE = /^[A-Za-z0-9_\/.:=@%+,-]+$/;

export function quote(arg: string): string {
  if (arg !== "" && SAFE.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function command(program: string, ...args: string[]): Command {
  return { program, args };
}

export function sudo(cmd: Command): Command {
  return { ...cmd, sudo: true };
}

export function withEnv(cmd: Command, env: Record<string, string>): Command {
  return { ...cmd, env: { ...cmd.env, ...env } };
}

export function withStdin(cmd: Command, stdin: string): Command {
  return { ...cmd, stdin };
}

/**
 * Fixed shell snippet; positional values arrive as $1, $2, ... never spliced
 * into the script text.
 */
export function shell(script: string, ...positional: string[]): Command {
  return command("sh", "-c", script, "sh", ...positional);
}

export function render(cmd: Command): string {
  const env = Object.entries(cmd.env ?? {});
  for (const [k] of env) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(k)) throw new Error(`invalid environment variable name: ${k}`);
  }
  const words: string[] = [];
  if (cmd.sudo) words.push("sudo");
  if (env.length) words.push("env", ...env.map(([k, v]) => `${k}=${quote(v)}`));
  words.push(quote(cmd.program), ...cmd.args.map(quote));
  return words.join(" ");
}

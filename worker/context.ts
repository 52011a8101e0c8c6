import fs from "node:fs/promises";
import type { ClusterConfig } from "../lib/config";
import { ConfigError } from "../lib/errors";
import type { RemoteRunner } from "./ssh";

/** Key pair every machine receives so workers can pull from the coordinator. */
export type TrustMaterial = {
  privateKey: string;
  publicKey: string;
};

export type StepContext = {
  runner: RemoteRunner;
  config: ClusterConfig;
  trust: TrustMaterial;
};

export async function loadTrustMaterial(keyPath: string): Promise<TrustMaterial> {
  try {
    const [privateKey, publicKey] = await Promise.all([
      fs.readFile(keyPath, "utf8"),
      fs.readFile(`${keyPath}.pub`, "utf8"),
    ]);
    return { privateKey, publicKey: publicKey.trim() };
  } catch (err) {
    throw new ConfigError(`cannot read trust key pair at ${keyPath}(.pub)`, { cause: err });
  }
}

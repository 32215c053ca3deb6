import type { OperationExecutor } from "../executor/executor";
import { KeyVaultBackend } from "./keyvault";
import type { SecretBackend } from "./types";

export interface BackendDeps {
  executor: OperationExecutor;
}

const BACKENDS: Record<string, (deps: BackendDeps) => SecretBackend> = {
  keyvault: (deps) => new KeyVaultBackend({ executor: deps.executor }),
};

export const DEFAULT_BACKEND = "keyvault";

export function getBackend(name: string, deps: BackendDeps): SecretBackend {
  const factory = BACKENDS[name];
  if (!factory) {
    throw new Error(
      `Unknown backend: ${name}. Available: ${Object.keys(BACKENDS).join(", ")}`
    );
  }
  return factory(deps);
}

export function listBackends(): string[] {
  return Object.keys(BACKENDS);
}

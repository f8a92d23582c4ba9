export interface ConfigurationGate {
  /** Stable name used in logs, e.g. "vertex-ai". */
  name: string;
  /** Environment variable whose presence opens the gate. */
  variable: string;
  value?: string;
  models: string[];
}

export interface BaseModels {
  listing: string[];
  inference: string[];
}

export interface ModelMatrix {
  /** Models the stack must register. */
  listing: string[];
  /** Models that must answer a prompt. */
  inference: string[];
  included: ConfigurationGate[];
  skipped: ConfigurationGate[];
}

export class InvalidModelError extends Error {
  constructor(readonly source: string) {
    super(`Model identifier for ${source} is empty; refusing to probe with an empty name`);
    this.name = "InvalidModelError";
  }
}

export function isGateOpen(gate: ConfigurationGate): boolean {
  return (gate.value ?? "").trim().length > 0;
}

function requireModels(models: string[], source: string): void {
  for (const model of models) {
    if (model.trim().length === 0) throw new InvalidModelError(source);
  }
}

/**
 * Derives the listing and inference matrices in one pass over `gates`, in their
 * declared order. A closed gate contributes nothing to either matrix.
 */
export function buildMatrix(base: BaseModels, gates: readonly ConfigurationGate[]): ModelMatrix {
  requireModels(base.listing, "the base listing matrix");
  requireModels(base.inference, "the base inference matrix");

  const listing = [...base.listing];
  const inference = [...base.inference];
  const included: ConfigurationGate[] = [];
  const skipped: ConfigurationGate[] = [];

  for (const gate of gates) {
    if (!isGateOpen(gate)) {
      skipped.push(gate);
      continue;
    }
    requireModels(gate.models, `gate ${gate.name}`);
    if (gate.models.length === 0) throw new InvalidModelError(`gate ${gate.name}`);
    listing.push(...gate.models);
    inference.push(...gate.models);
    included.push(gate);
  }

  return { listing, inference, included, skipped };
}

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigurationError, ValidationError, assertScenario } from "@shoal/engine-core";
import type { ScenarioContext } from "@shoal/engine-core";
import { scenarioSchema } from "../schemas.js";
import type { ScenarioDefinition } from "../schemas.js";

export interface ScenarioSummary {
  id: string;
  name: string;
  description: string;
  dimensions: string[];
  parties: string[];
}

/** Scenarios loaded once at startup, keyed by id. */
export class ScenarioRegistry {
  private readonly scenarios = new Map<string, ScenarioDefinition>();

  constructor(definitions: Iterable<ScenarioDefinition> = []) {
    for (const def of definitions) this.add(def);
  }

  /** Validates the scenario against the engine's model before accepting it. */
  add(def: ScenarioDefinition): void {
    if (this.scenarios.has(def.id)) {
      throw new ConfigurationError(`Duplicate scenario id "${def.id}"`, { detail: def.id });
    }
    try {
      assertScenario(toContext(def));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      throw new ConfigurationError(`Scenario "${def.id}" is inconsistent: ${err.message}`, {
        detail: err.detail,
        dimension: err.dimension,
        party_id: err.party_id,
        cause: err,
      });
    }
    this.scenarios.set(def.id, def);
  }

  get(id: string): ScenarioDefinition | null {
    return this.scenarios.get(id) ?? null;
  }

  list(): ScenarioSummary[] {
    return [...this.scenarios.values()].map((s) => ({
      id: s.id,
      name: s.name,
      description: s.description,
      dimensions: s.issue_space.dimensions.map((d) => d.id),
      parties: s.party_profiles.map((p) => p.party_id),
    }));
  }

  get size(): number {
    return this.scenarios.size;
  }
}

export function toContext(def: ScenarioDefinition): ScenarioContext {
  return { issue_space: def.issue_space, party_profiles: def.party_profiles };
}

/** Load every *.json scenario in a directory, sorted by file name. */
export async function loadScenarios(dir: string): Promise<ScenarioRegistry> {
  let files: string[];
  try {
    files = (await readdir(dir)).filter((f) => f.endsWith(".json")).sort();
  } catch (err) {
    throw new ConfigurationError(`Cannot read scenario directory ${dir}`, {
      detail: dir,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const registry = new ScenarioRegistry();
  for (const file of files) {
    const path = join(dir, file);
    let json: unknown;
    try {
      json = JSON.parse(await readFile(path, "utf8"));
    } catch (err) {
      throw new ConfigurationError(`Scenario ${file} is not valid JSON`, {
        detail: path,
        cause: err instanceof Error ? err : undefined,
      });
    }
    const parsed = scenarioSchema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ConfigurationError(`Scenario ${file} is invalid: ${detail}`, { detail: path });
    }
    registry.add(parsed.data);
  }
  return registry;
}

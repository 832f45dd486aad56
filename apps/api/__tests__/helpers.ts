import { fileURLToPath } from "node:url";
import type { EngineConfig } from "@shoal/engine";
import { loadScenarios } from "../src/scenarios/registry.js";
import { createServer } from "../src/server.js";

export const SCENARIO_DIR = fileURLToPath(new URL("../scenarios/", import.meta.url));

export const DRAFT_1 = { id: "mediator-draft-1", values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } };
export const DRAFT_2 = { id: "mediator-draft-2", values: { standoff_nm: 4, escorts: 1, notice_hours: 36 } };

export async function buildApp(engineConfig?: EngineConfig) {
  const scenarios = await loadScenarios(SCENARIO_DIR);
  return createServer({ config: { LOG_LEVEL: "silent" }, scenarios, engineConfig });
}

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { config } from "../config.js";
import type { ScenarioConfig, ScenarioSetup } from "../types.js";

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..", "..");

export const DEFAULT_SCENARIOS_DIR = resolve(PROJECT_ROOT, config.scenariosDir);
export const DEFAULT_DATA_DIR = resolve(PROJECT_ROOT, config.dataDir);

const FALLBACK_SCENARIO: ScenarioConfig = {
  id: "default",
  name: "Default",
  description: "Normal operation",
  challenges: [],
};

export interface ScenarioSummary {
  id: string;
  name: string;
  description: string;
  difficulty: string;
}

export interface ScenarioInfo extends ScenarioSummary {
  challenges: string[];
  setup: ScenarioSetup;
}

const scenarioSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(""),
  difficulty: z.string().optional(),
  challenges: z.array(z.string()).optional(),
  setup: z
    .object({
      pre_populate_alerts: z.number().int().nonnegative().optional(),
      artificial_delay_ms: z.number().int().nonnegative().optional(),
      enable_concurrent_test_endpoint: z.boolean().optional(),
    })
    .optional(),
});

function readScenarioFile(path: string): ScenarioConfig {
  return scenarioSchema.parse(JSON.parse(readFileSync(path, "utf8")));
}

/**
 * Picks the scenario the server runs under (`SCENARIO`). A scenario directory
 * holds a `config.json` and may override any fixture file from the data dir.
 */
export class ScenarioManager {
  private currentId = "default";
  private scenarioConfig: ScenarioConfig = FALLBACK_SCENARIO;

  constructor(
    readonly scenariosDir = DEFAULT_SCENARIOS_DIR,
    readonly dataDir = DEFAULT_DATA_DIR,
  ) {}

  load(scenarioId: string): ScenarioConfig {
    let id = scenarioId;
    let path = join(this.scenariosDir, id, "config.json");

    if (!existsSync(path)) {
      console.warn(`[scenario] '${scenarioId}' not found, using default`);
      id = "default";
      path = join(this.scenariosDir, id, "config.json");
    }

    this.scenarioConfig = existsSync(path) ? readScenarioFile(path) : FALLBACK_SCENARIO;
    this.currentId = id;
    console.log(`[scenario] Loaded scenario: ${this.scenarioConfig.name}`);
    return this.scenarioConfig;
  }

  get current(): string {
    return this.currentId;
  }

  get config(): ScenarioConfig {
    return this.scenarioConfig;
  }

  getDataPath(filename: string): string {
    const override = join(this.scenariosDir, this.currentId, filename);
    return existsSync(override) ? override : join(this.dataDir, filename);
  }

  info(): ScenarioInfo {
    return {
      id: this.currentId,
      name: this.scenarioConfig.name,
      description: this.scenarioConfig.description,
      difficulty: this.scenarioConfig.difficulty ?? "unknown",
      challenges: this.scenarioConfig.challenges ?? [],
      setup: this.setup(),
    };
  }

  setup(): ScenarioSetup {
    return this.scenarioConfig.setup ?? {};
  }

  prePopulateAlertCount(): number {
    return this.setup().pre_populate_alerts ?? 0;
  }

  artificialDelayMs(): number {
    return this.setup().artificial_delay_ms ?? 0;
  }

  isConcurrentTestEnabled(): boolean {
    return this.setup().enable_concurrent_test_endpoint ?? false;
  }

  listScenarios(): ScenarioSummary[] {
    if (!existsSync(this.scenariosDir)) return [];
    const scenarios: ScenarioSummary[] = [];
    for (const entry of readdirSync(this.scenariosDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const path = join(this.scenariosDir, entry.name, "config.json");
      if (!existsSync(path)) continue;
      const scenario = readScenarioFile(path);
      scenarios.push({
        id: scenario.id,
        name: scenario.name,
        description: scenario.description,
        difficulty: scenario.difficulty ?? "unknown",
      });
    }
    return scenarios.sort((a, b) => a.id.localeCompare(b.id));
  }
}

let manager: ScenarioManager | null = null;

export function getScenarioManager(): ScenarioManager {
  if (!manager) {
    manager = new ScenarioManager();
    manager.load(config.scenario);
  }
  return manager;
}

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import Ajv, { type ErrorObject } from "ajv";
import yaml from "js-yaml";
import { errorMessage } from "@tickweave/schemas";

export interface DodgeLevel {
  name: string;
  lanes: number;
  /** Rows between the spawn line and the player, player row included. */
  rows: number;
  lives: number;
  /** Obstacles to dodge to win. */
  goal: number;
  /** Chance per tick that a new obstacle appears. */
  spawn_chance: number;
}

export const BUILTIN_LEVELS: readonly DodgeLevel[] = [
  { name: "easy", lanes: 3, rows: 6, lives: 5, goal: 10, spawn_chance: 0.35 },
  { name: "normal", lanes: 3, rows: 5, lives: 3, goal: 20, spawn_chance: 0.5 },
  { name: "hard", lanes: 5, rows: 4, lives: 2, goal: 40, spawn_chance: 0.75 },
];

interface LevelFile {
  levels: DodgeLevel[];
}

const LevelFileSchema = {
  type: "object",
  required: ["levels"],
  additionalProperties: false,
  properties: {
    levels: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["name", "lanes", "rows", "lives", "goal", "spawn_chance"],
        additionalProperties: false,
        properties: {
          name: { type: "string", minLength: 1, pattern: "^[a-z0-9_-]+$" },
          lanes: { type: "integer", minimum: 1, maximum: 16 },
          rows: { type: "integer", minimum: 2, maximum: 32 },
          lives: { type: "integer", minimum: 1 },
          goal: { type: "integer", minimum: 1 },
          spawn_chance: { type: "number", minimum: 0, maximum: 1 },
        },
      },
    },
  },
} as const;

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
const validateLevelFile = ajv.compile<LevelFile>(LevelFileSchema);

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`).join(", ");
}

/** Reads level presets from a YAML file shaped `levels: [{ name, lanes, ... }]`. */
export async function loadLevelsFromFile(filePath: string): Promise<DodgeLevel[]> {
  if (!existsSync(filePath)) throw new Error(`Level file not found: ${filePath}`);
  const content = await readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    throw new Error(`Level file "${filePath}" is not valid YAML: ${errorMessage(err)}`);
  }
  if (!validateLevelFile(data)) {
    throw new Error(`Invalid level file "${filePath}": ${describeErrors(validateLevelFile.errors)}`);
  }
  const names = new Set<string>();
  for (const level of data.levels) {
    if (names.has(level.name)) throw new Error(`Invalid level file "${filePath}": duplicate level "${level.name}"`);
    names.add(level.name);
  }
  return data.levels;
}

/** Later entries replace earlier ones with the same name. */
export function mergeLevels(base: readonly DodgeLevel[], overrides: readonly DodgeLevel[]): DodgeLevel[] {
  const byName = new Map<string, DodgeLevel>();
  for (const level of [...base, ...overrides]) byName.set(level.name, level);
  return [...byName.values()];
}

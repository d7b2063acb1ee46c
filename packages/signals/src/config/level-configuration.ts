/**
 * Decoding of the key/value property bag attached to a level.
 *
 * Recognized keys (names and value formats are part of the level data format):
 * - `availableCostumes` (number): costume set id, 0-3. Default 0.
 * - `levelLink` (string): level loaded after this one. Default "MainMenu".
 * - `startingCostume` (string): "Default" | "Bird" | "USB" | "Sorceress". Default "USB".
 * - `exitAt` (string): exit receiver position, "col,row".
 * - `requisite_<col>_<row>`: wiring for the receiver at (col, row), either a
 *   string `"all;2,3;4,3"` or a string list `["all", "2,3", "4,3"]`. The
 *   leading keyword (`any`, `all`, `none`) may be omitted, meaning `none`.
 *
 * Malformed values never fail the decode; they fall back to defaults and
 * produce warnings.
 */

import type { GridPosition } from "@signalworks/grid";
import { parseCoordinate } from "@signalworks/grid";
import { DEFAULT_COSTUME_SET, DEFAULT_NEXT_LEVEL } from "../constants.js";
import type { LevelDiagnostic } from "../core/diagnostics.js";
import type {
  Costume,
  LevelConfiguration,
  PolicyKeyword,
  PropertyBag,
  Requisite,
} from "../core/types.js";
import { POLICY_KEYWORDS } from "../core/types.js";

/** Costume names as written in level data */
export const COSTUME_WIRE_NAMES: Readonly<Record<Costume, string>> = {
  default: "Default",
  bird: "Bird",
  flashDrive: "USB",
  sorceress: "Sorceress",
};

/** Costume the player starts with when the level does not say */
export const DEFAULT_STARTING_COSTUME: Costume = "flashDrive";

/** Highest costume set id (all costumes) */
export const MAX_COSTUME_SET = 3;

const REQUISITE_PREFIX = "requisite_";
const REQUISITE_KEY_PATTERN = /^requisite_(-?\d+)_(-?\d+)$/;

export const DEFAULT_LEVEL_CONFIGURATION: LevelConfiguration = {
  costumeSet: DEFAULT_COSTUME_SET,
  nextLevelName: DEFAULT_NEXT_LEVEL,
  startingCostume: DEFAULT_STARTING_COSTUME,
  exitLocation: null,
  requisites: [],
};

/**
 * A decoded configuration plus the warnings raised while decoding it.
 */
export interface DecodedLevelConfiguration {
  configuration: LevelConfiguration;
  diagnostics: LevelDiagnostic[];
}

/**
 * Look up a costume by its level-data name.
 */
export function costumeFromWireName(name: string): Costume | undefined {
  for (const [costume, wireName] of Object.entries(COSTUME_WIRE_NAMES)) {
    if (wireName === name && isCostume(costume)) {
      return costume;
    }
  }
  return undefined;
}

const isCostume = (value: string): value is Costume => value in COSTUME_WIRE_NAMES;

const isPolicyKeyword = (value: string): value is PolicyKeyword =>
  POLICY_KEYWORDS.some((keyword) => keyword === value);

/**
 * Parse one requisite entry.
 *
 * @param key Property key, e.g. "requisite_5_5"
 * @param value Property value (string or string list)
 * @returns The requisite (null if the key or value is unusable) and any warnings
 */
export function parseRequisite(
  key: string,
  value: unknown,
): { requisite: Requisite | null; diagnostics: LevelDiagnostic[] } {
  const diagnostics: LevelDiagnostic[] = [];
  const invalid = (message: string, position?: GridPosition) => {
    const diagnostic: LevelDiagnostic = { severity: "warning", code: "invalid-requisite", message };
    if (position) diagnostic.position = position;
    diagnostics.push(diagnostic);
  };

  const keyMatch = REQUISITE_KEY_PATTERN.exec(key);
  if (!keyMatch) {
    invalid(`Requisite key "${key}" is not of the form requisite_<col>_<row>`);
    return { requisite: null, diagnostics };
  }
  const outputLocation: GridPosition = { col: Number(keyMatch[1]), row: Number(keyMatch[2]) };

  let entries: string[];
  if (typeof value === "string") {
    entries = value.split(";");
  } else if (Array.isArray(value)) {
    entries = [];
    for (const item of value) {
      if (typeof item === "string") {
        entries.push(item);
      } else {
        invalid(`Requisite "${key}" has a non-string entry: ${String(item)}`, outputLocation);
      }
    }
  } else {
    invalid(`Requisite "${key}" must be a string or a list of strings`, outputLocation);
    return { requisite: null, diagnostics };
  }

  entries = entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);

  let keyword: PolicyKeyword | undefined;
  const first = entries[0];
  if (first !== undefined && isPolicyKeyword(first)) {
    keyword = first;
    entries = entries.slice(1);
  }

  const requiredInputs: GridPosition[] = [];
  for (const entry of entries) {
    const position = parseCoordinate(entry);
    if (position === null) {
      invalid(`Requisite "${key}" has an unreadable input "${entry}"`, outputLocation);
      continue;
    }
    if (!requiredInputs.some((p) => p.col === position.col && p.row === position.row)) {
      requiredInputs.push(position);
    }
  }

  if (keyword === "all" && requiredInputs.length === 0) {
    invalid(
      `Requisite "${key}" requires all inputs but lists none; the output is always active`,
      outputLocation,
    );
  }

  const requisite: Requisite = { outputLocation, requiredInputs };
  if (keyword !== undefined) {
    requisite.requisite = keyword;
  }
  return { requisite, diagnostics };
}

/**
 * Decode a level's property bag into a configuration.
 *
 * Requisites are sorted by output location (column, then row) so the result
 * does not depend on the order the bag was authored in.
 */
export function decodeLevelConfiguration(bag: PropertyBag): DecodedLevelConfiguration {
  const diagnostics: LevelDiagnostic[] = [];
  const invalid = (message: string) =>
    diagnostics.push({ severity: "warning", code: "invalid-configuration", message });

  // Costume set
  let costumeSet = DEFAULT_COSTUME_SET;
  const rawCostumes = bag["availableCostumes"];
  if (rawCostumes !== undefined) {
    const parsed = typeof rawCostumes === "string" ? Number(rawCostumes) : rawCostumes;
    if (
      typeof parsed === "number" &&
      Number.isInteger(parsed) &&
      parsed >= 0 &&
      parsed <= MAX_COSTUME_SET
    ) {
      costumeSet = parsed;
    } else {
      invalid(`availableCostumes must be an integer from 0 to ${MAX_COSTUME_SET}. Got: ${String(rawCostumes)}`);
    }
  }

  // Next level
  let nextLevelName = DEFAULT_NEXT_LEVEL;
  const rawLink = bag["levelLink"];
  if (rawLink !== undefined) {
    if (typeof rawLink === "string" && rawLink.length > 0) {
      nextLevelName = rawLink;
    } else {
      invalid(`levelLink must be a non-empty string. Got: ${String(rawLink)}`);
    }
  }

  // Starting costume
  let startingCostume = DEFAULT_STARTING_COSTUME;
  const rawCostume = bag["startingCostume"];
  if (rawCostume !== undefined) {
    const costume = typeof rawCostume === "string" ? costumeFromWireName(rawCostume) : undefined;
    if (costume !== undefined) {
      startingCostume = costume;
    } else {
      invalid(`startingCostume is not a known costume. Got: ${String(rawCostume)}`);
    }
  }

  // Exit
  let exitLocation: GridPosition | null = null;
  const rawExit = bag["exitAt"];
  if (rawExit !== undefined) {
    exitLocation = typeof rawExit === "string" ? parseCoordinate(rawExit) : null;
    if (exitLocation === null) {
      invalid(`exitAt must be a "col,row" coordinate. Got: ${String(rawExit)}`);
    }
  }

  // Requisites
  const requisites: Requisite[] = [];
  for (const [key, value] of Object.entries(bag)) {
    if (!key.startsWith(REQUISITE_PREFIX)) continue;
    const parsed = parseRequisite(key, value);
    diagnostics.push(...parsed.diagnostics);
    if (parsed.requisite) {
      requisites.push(parsed.requisite);
    }
  }
  requisites.sort(
    (a, b) =>
      a.outputLocation.col - b.outputLocation.col || a.outputLocation.row - b.outputLocation.row,
  );

  return {
    configuration: { costumeSet, nextLevelName, startingCostume, exitLocation, requisites },
    diagnostics,
  };
}

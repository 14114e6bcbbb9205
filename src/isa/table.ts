/**
 * ISA table loader.
 *
 * Parses the ROCm ISA table from data/isa-table.yaml and validates every
 * entry before it reaches the registry.
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { errorMessage, isNonNegativeInteger, isRecord } from "../shared/guards.js";
import { isIsaFeature } from "./features.js";
import type { IsaFeature } from "./features.js";
import type { IsaEntry } from "./entry.js";

const TABLE_FILENAME = "isa-table.yaml";
const NAME_RE = /^gfx[0-9a-f]+(:[a-z]+[+-])*$/;
const WAVEFRONT_SIZES = new Set([32, 64]);

export class IsaTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IsaTableError";
  }
}

/**
 * Resolve the bundled table. The data/ directory sits two levels above this
 * module both in src/isa/ and in the compiled dist/isa/.
 */
export function resolveTablePath(moduleUrl: string = import.meta.url): string {
  return path.resolve(path.dirname(fileURLToPath(moduleUrl)), "..", "..", "data", TABLE_FILENAME);
}

/** Load and validate an ISA table file (defaults to the bundled one). */
export function loadIsaTable(filePath: string = resolveTablePath()): IsaEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new IsaTableError(`ISA table not found: ${filePath}`);
  }
  return parseIsaTable(fs.readFileSync(filePath, "utf-8"), filePath);
}

/** Parse ISA table YAML. `source` only appears in error messages. */
export function parseIsaTable(text: string, source: string): IsaEntry[] {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error: unknown) {
    throw new IsaTableError(
      `ISA table ${source} is not valid YAML: ${errorMessage(error)}`,
    );
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.isas)) {
    throw new IsaTableError(`ISA table ${source} must contain an "isas" list`);
  }

  const rows: unknown[] = parsed.isas;
  return rows.map((raw, index) => validateEntry(raw, `isas[${index}] in ${source}`));
}

function validateEntry(raw: unknown, ctx: string): IsaEntry {
  if (!isRecord(raw)) {
    throw new IsaTableError(`${ctx} must be a mapping`);
  }
  const { name, version, sramecc, xnack, wavefront, torch } = raw;

  if (typeof name !== "string" || !NAME_RE.test(name)) {
    throw new IsaTableError(`${ctx} has invalid "name" (expected e.g. "gfx906:xnack-")`);
  }

  const where = `${ctx} (${name})`;
  const [major, minor, step] = readVersion(version, where);

  if (typeof wavefront !== "number" || !WAVEFRONT_SIZES.has(wavefront)) {
    throw new IsaTableError(`${where} has invalid "wavefront". Must be 32 or 64`);
  }
  if (torch !== undefined && typeof torch !== "boolean") {
    throw new IsaTableError(`${where} has invalid "torch". Must be true or false`);
  }

  return {
    name,
    major,
    minor,
    step,
    sramecc: readFeature(sramecc, "sramecc", where),
    xnack: readFeature(xnack, "xnack", where),
    wavefrontSize: wavefront,
    supportedByReferenceToolkit: torch ?? false,
  };
}

function readVersion(value: unknown, where: string): [number, number, number] {
  if (!Array.isArray(value) || value.length !== 3) {
    throw new IsaTableError(`${where} has invalid "version". Expected [major, minor, step]`);
  }
  const parts: unknown[] = value;
  const [major, minor, step] = parts;
  if (!isNonNegativeInteger(major) || !isNonNegativeInteger(minor) || !isNonNegativeInteger(step)) {
    throw new IsaTableError(`${where} has invalid "version". Components must be non-negative integers`);
  }
  return [major, minor, step];
}

function readFeature(value: unknown, field: string, where: string): IsaFeature {
  if (!isIsaFeature(value)) {
    throw new IsaTableError(
      `${where} has invalid "${field}". Must be unsupported, any, disabled or enabled`,
    );
  }
  return value;
}

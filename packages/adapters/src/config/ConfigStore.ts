/**
 * Config Store
 *
 * Reads and writes composition configs as YAML (`.yaml`, `.yml`) or JSON
 * (any other extension). Loading validates the structure (object shapes and
 * field types) and leaves value-level leniency to the engine's
 * normalization.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, extname } from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

import type {
  ClockInput,
  CompositionConfig,
  EquationConfig,
  MappingInput,
  WindowInput,
} from "@equatone/contracts";

export type ConfigErrorCode = "not_found" | "unreadable" | "invalid";

export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    public readonly path: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigFormat = "yaml" | "json";

export function configFormatFor(path: string): ConfigFormat {
  const ext = extname(path).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}

export class ConfigStore {
  /**
   * Throws ConfigError: `not_found` when the file is missing, `unreadable`
   * when it cannot be read or parsed, `invalid` when the document does not
   * describe a composition.
   */
  async load(path: string): Promise<CompositionConfig> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        throw new ConfigError("not_found", path, `Config file not found: ${path}`);
      }
      throw new ConfigError("unreadable", path, `Cannot read ${path}: ${describeError(err)}`);
    }

    const format = configFormatFor(path);
    let data: unknown;
    try {
      data = format === "yaml" ? parseYaml(text) : JSON.parse(text);
    } catch (err) {
      const label = format === "yaml" ? "YAML" : "JSON";
      throw new ConfigError("unreadable", path, `${path} is not valid ${label}: ${describeError(err)}`);
    }

    return parseCompositionConfig(data, path);
  }

  /**
   * Write `config` as YAML or indented JSON by extension, creating parent
   * directories.
   */
  async save(path: string, config: CompositionConfig): Promise<void> {
    const text =
      configFormatFor(path) === "yaml"
        ? stringifyYaml(config)
        : JSON.stringify(config, null, 2) + "\n";
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, text, "utf8");
    } catch (err) {
      throw new ConfigError("unreadable", path, `Cannot write ${path}: ${describeError(err)}`);
    }
  }
}

// ============================================================================
// Validation
// ============================================================================

type Scalar = number | string;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === "number" || typeof value === "string";
}

/**
 * Validate a parsed document as a CompositionConfig.
 */
export function parseCompositionConfig(data: unknown, path = "<config>"): CompositionConfig {
  const fail = (where: string, expected: string): never => {
    throw new ConfigError("invalid", path, `${path}: ${where} must be ${expected}`);
  };

  if (!isRecord(data)) {
    return fail("the top level", "an object");
  }

  const config: CompositionConfig = {};

  if (data.tempo !== undefined) {
    const tempo = typeof data.tempo === "string" ? Number(data.tempo) : data.tempo;
    if (typeof tempo !== "number" || Number.isNaN(tempo)) {
      return fail("tempo", "a number");
    }
    config.tempo = tempo;
  }

  if (data.equations !== undefined) {
    if (!Array.isArray(data.equations)) {
      return fail("equations", "a list");
    }
    const entries: unknown[] = data.equations;
    config.equations = entries.map((entry, i) => parseEquation(entry, `equations[${i}]`, fail));
  }

  return config;
}

type Fail = (where: string, expected: string) => never;

function parseEquation(entry: unknown, where: string, fail: Fail): EquationConfig {
  if (!isRecord(entry)) {
    return fail(where, "an object");
  }

  const equation: EquationConfig = {};

  const text = (key: string): string | undefined => {
    const value = entry[key];
    if (value === undefined) return undefined;
    return typeof value === "string" ? value : fail(`${where}.${key}`, "text");
  };
  const scalar = (key: string): Scalar | undefined => {
    const value = entry[key];
    if (value === undefined) return undefined;
    return isScalar(value) ? value : fail(`${where}.${key}`, "a number or text");
  };

  equation.name = text("name");
  equation.expr = text("expr");
  equation.eval_rate = scalar("eval_rate");
  equation.duration = scalar("duration");

  if (entry.vars !== undefined) {
    const vars = entry.vars;
    if (!isRecord(vars)) {
      return fail(`${where}.vars`, "an object");
    }
    const parsed: Record<string, Scalar> = {};
    for (const [name, value] of Object.entries(vars)) {
      parsed[name] = isScalar(value) ? value : fail(`${where}.vars.${name}`, "a number or text");
    }
    equation.vars = parsed;
  }

  if (entry.updates !== undefined) {
    const updates = entry.updates;
    if (!Array.isArray(updates)) {
      return fail(`${where}.updates`, "a list of rules");
    }
    const rules: unknown[] = updates;
    equation.updates = rules.map((rule, i) =>
      typeof rule === "string" ? rule : fail(`${where}.updates[${i}]`, "text")
    );
  }

  equation.active_window = parseWindowInput(entry.active_window, `${where}.active_window`, fail);
  equation.activeWindow = parseWindowInput(entry.activeWindow, `${where}.activeWindow`, fail);

  if (entry.mapping !== undefined) {
    equation.mapping = parseMapping(entry.mapping, `${where}.mapping`, fail);
  }

  if (entry.limits !== undefined) {
    if (!isRecord(entry.limits)) {
      return fail(`${where}.limits`, "an object");
    }
    // Entries are checked during normalization, which skips bad ones
    equation.limits = { ...entry.limits };
  }

  return dropUndefined(equation);
}

function parseWindowInput(value: unknown, where: string, fail: Fail): WindowInput | null | undefined {
  if (value === undefined || value === null || typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    const start = items[0];
    const end = items[1];
    if (items.length === 2 && isScalar(start) && isScalar(end)) {
      const pair: readonly [ClockInput, ClockInput] = [start, end];
      return pair;
    }
  }
  return fail(where, "a [start, end] pair or \"start,end\" text");
}

function parseMapping(value: unknown, where: string, fail: Fail): MappingInput {
  if (!isRecord(value)) {
    return fail(where, "an object");
  }

  const text = (key: string): string | undefined => {
    const field = value[key];
    if (field === undefined) return undefined;
    return typeof field === "string" ? field : fail(`${where}.${key}`, "text");
  };
  const scalar = (key: string): Scalar | undefined => {
    const field = value[key];
    if (field === undefined) return undefined;
    return isScalar(field) ? field : fail(`${where}.${key}`, "a number or text");
  };

  return dropUndefined({
    base_midi: scalar("base_midi"),
    scale: text("scale"),
    octave_range: scalar("octave_range"),
    instrument: text("instrument"),
    polyphony: scalar("polyphony"),
    poly: scalar("poly"),
    rhythm_quant: scalar("rhythm_quant"),
    velocity_curve: text("velocity_curve"),
  });
}

/**
 * Remove keys whose value is undefined, so saved files stay minimal and
 * loaded configs compare equal to what was written.
 */
function dropUndefined<T extends object>(value: T): T {
  const copy = { ...value };
  for (const key of Object.keys(copy)) {
    if (Reflect.get(copy, key) === undefined) {
      Reflect.deleteProperty(copy, key);
    }
  }
  return copy;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Command-line entry: compose from a config file, the built-in example, or
 * an interactive session, and write the rendered artifacts.
 */

import { join } from "path";
import { parseArgs } from "util";

import type { Composition, CompositionConfig, IRenderTarget } from "@equatone/contracts";
import {
  DuplicateEquationError,
  EquationScheduler,
  InvalidExpressionError,
  composeFromConfig,
} from "@equatone/engine";
import {
  ConfigError,
  ConfigStore,
  IntakeSession,
  MidiFileRenderer,
  ReadlinePrompter,
  UstRenderer,
  writeArtifacts,
} from "@equatone/adapters";
import type { IntakePrompter, IntakeResult } from "@equatone/adapters";

export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  configNotFound: 2,
  configInvalid: 3,
  equationInvalid: 4,
  renderFailed: 5,
} as const;

export const EXAMPLE_CONFIG: CompositionConfig = {
  tempo: 100,
  equations: [
    {
      name: "lead",
      expr: "sin(x)",
      vars: { x: 0 },
      updates: ["x = x + 0.25"],
      eval_rate: "1/8",
      mapping: { base_midi: 60 },
    },
  ],
};

export const USAGE = `Usage: equatone [options]

Generate music from math equations.

Options:
  -c, --config <file>   Compose from a YAML or JSON config file
      --example         Compose the built-in example
  -o, --output <name>   Output file name without extension (default: song_<timestamp>)
      --out-dir <dir>   Output directory (default: output)
      --config-only     Interactive mode: save the config without rendering
      --ust             Also write a UTAU project (.ust)
      --lyrics <text>   Syllables for the UTAU project (default: a)
  -h, --help            Show this help

Without --config or --example an interactive session collects equations.`;

const OPTIONS = {
  config: { type: "string", short: "c" },
  example: { type: "boolean" },
  output: { type: "string", short: "o" },
  "out-dir": { type: "string" },
  "config-only": { type: "boolean" },
  ust: { type: "boolean" },
  lyrics: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

/**
 * Injection points for tests and embedding hosts.
 */
export interface CliDeps {
  /** Interactive input; defaults to stdin/stdout */
  prompter?: IntakePrompter;

  /** Scheduler for interactive mode; defaults to capacity 3 with real timers */
  scheduler?: EquationScheduler;

  /**
   * Directory for configs saved by the interactive session.
   * @default "configs"
   */
  configDir?: string;

  /** Interrupts the interactive wait; defaults to SIGINT */
  signal?: AbortSignal;

  /** Clock for the default output name */
  now?: () => Date;
}

interface RenderOptions {
  outDir: string;
  baseName: string;
  ust: boolean;
  lyrics?: string;
}

function parseOptions(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: false }).values;
}

export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let values: ReturnType<typeof parseOptions>;
  try {
    values = parseOptions(argv);
  } catch (err) {
    console.error(`[cli] ${describeError(err)}`);
    console.error(USAGE);
    return EXIT_CODES.usage;
  }

  if (values.help) {
    console.log(USAGE);
    return EXIT_CODES.ok;
  }

  const now = deps.now ?? (() => new Date());
  const renderOptions: RenderOptions = {
    outDir: values["out-dir"] ?? "output",
    baseName: values.output ?? `song_${Math.floor(now().getTime() / 1000)}`,
    ust: values.ust ?? false,
    lyrics: values.lyrics,
  };

  let config: CompositionConfig;
  if (values.example) {
    config = EXAMPLE_CONFIG;
  } else if (values.config !== undefined) {
    try {
      config = await new ConfigStore().load(values.config);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      console.error(`[cli] ${err.message}`);
      return err.code === "not_found" ? EXIT_CODES.configNotFound : EXIT_CODES.configInvalid;
    }
  } else {
    const configOnly = values["config-only"] ?? false;
    const result = await runIntake(configOnly, deps);
    if (result.config === null || configOnly) {
      return EXIT_CODES.ok;
    }
    config = result.config;
  }

  return render(config, renderOptions);
}

async function runIntake(configOnly: boolean, deps: CliDeps): Promise<IntakeResult> {
  const prompter = deps.prompter ?? new ReadlinePrompter();
  const scheduler = deps.scheduler ?? new EquationScheduler();
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const session = new IntakeSession(prompter, {
      scheduler,
      configPath: join(deps.configDir ?? "configs", "saved_config.yaml"),
      configOnly,
      signal: deps.signal ?? controller.signal,
    });
    return await session.run();
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    prompter.close?.();
    if (!deps.scheduler) {
      // Lifetimes still running after an interrupted wait end with the process
      scheduler.dispose();
    }
  }
}

async function render(config: CompositionConfig, options: RenderOptions): Promise<number> {
  let composition: Composition;
  try {
    composition = composeFromConfig(config);
  } catch (err) {
    if (err instanceof InvalidExpressionError || err instanceof DuplicateEquationError) {
      console.error(`[cli] ${err.message}`);
      return EXIT_CODES.equationInvalid;
    }
    throw err;
  }

  for (const diagnostic of composition.diagnostics) {
    const repeats = diagnostic.occurrences > 1 ? ` (x${diagnostic.occurrences})` : "";
    console.warn(`[engine] ${diagnostic.message}${repeats}`);
  }

  const targets: IRenderTarget[] = [new MidiFileRenderer()];
  if (options.ust) {
    targets.push(new UstRenderer({ lyrics: options.lyrics }));
  }

  try {
    await writeArtifacts(composition, targets, {
      outDir: options.outDir,
      baseName: options.baseName,
    });
  } catch (err) {
    console.error(`[cli] Rendering failed: ${describeError(err)}`);
    return EXIT_CODES.renderFailed;
  }
  return EXIT_CODES.ok;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

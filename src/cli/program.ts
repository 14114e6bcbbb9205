/**
 * CLI program definition for gfx-prune.
 *
 * Uses Commander to define the command structure:
 *   gfx-prune <targets>          prune everything the targets do not need
 *   gfx-prune list [--torch]     print the ISA table
 *   gfx-prune show <name>        print one ISA entry
 *   gfx-prune resolve <targets>  print the families and generations kept
 */
import { Command } from "commander";
import { VERSION } from "../version.js";
import { loadConfig } from "../config/index.js";
import type { GfxPruneConfig } from "../config/index.js";
import { APP_SCOPE, configureLogging } from "../logging/config.js";
import { createLogger } from "../shared/logger.js";
import type { Logger } from "../shared/logger.js";
import { errorMessage } from "../shared/guards.js";
import { defaultRegistry, UnknownIsaError } from "../isa/registry.js";
import { IsaTableError } from "../isa/table.js";
import type { IsaRegistry } from "../isa/registry.js";
import { formatIsaEntry, hsaOverrideVersion, shortGfx, shortIsa } from "../isa/entry.js";
import { findTorchDir } from "../prune/torch.js";
import type { CommandRunner } from "../prune/torch.js";
import { PlanError, planPrune } from "../prune/planner.js";
import { executePlan, formatSummary, PruneError } from "../prune/executor.js";
import { TemplateError } from "../prune/templates.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_UNKNOWN_ISA = 2;

export interface PruneCliOptions {
  dryRun?: boolean;
  verbose?: boolean;
  root?: string;
  config?: string;
  logFile?: string;
  python?: string;
}

/** Seams for tests; production uses the process environment and real processes. */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  runCommand?: CommandRunner;
  registry?: IsaRegistry;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name("gfx-prune")
    .description("Remove unused GFX support files from AMD ROCm")
    .version(VERSION)
    .argument("<targets>", 'GPU targets to keep, ";"-separated (e.g. "gfx90a:xnack-;gfx1100")')
    .option("--dry-run", "only log what would be removed")
    .option("--verbose", "enable debug logging")
    .option("--root <dir>", "sysroot that all ROCm and torch paths live under")
    .option("--config <file>", "config file (default: ~/.gfx-prune/config.yaml)")
    .option("--log-file <file>", "also append JSON log lines to this file")
    .option("--python <path>", "python interpreter used to locate torch")
    .action((targets: string, opts: PruneCliOptions) => {
      process.exitCode = handlePrune(targets, opts, deps);
    });

  program
    .command("list")
    .description("List known GPU ISA variants")
    .option("--torch", "only variants the reference PyTorch build ships")
    .action((opts: { torch?: boolean }) => {
      handleList(opts, deps);
    });

  program
    .command("show")
    .description("Show one GPU ISA variant")
    .argument("<name>", 'exact ISA name, e.g. "gfx906:xnack-"')
    .action((name: string) => {
      process.exitCode = handleShow(name, deps);
    });

  program
    .command("resolve")
    .description("Show which ISA families and generations a target list keeps")
    .argument("<targets>", 'GPU targets, ";"-separated')
    .action((targets: string) => {
      process.exitCode = handleResolve(targets, deps);
    });

  return program;
}

/**
 * Plan and run a prune. Returns the process exit code.
 */
export function handlePrune(targets: string, opts: PruneCliOptions, deps: CliDeps = {}): number {
  let config: GfxPruneConfig;
  let logger: Logger;
  try {
    config = loadConfig({
      configPath: opts.config,
      env: deps.env,
      overrides: { root: opts.root, python: opts.python },
    });
    const levels = opts.verbose
      ? configureLogging({ logLevel: "DEBUG", debugLevel: 1 })
      : configureLogging({ logLevel: config.logLevel });
    logger = createLogger(APP_SCOPE, { levels, logFile: opts.logFile });
    const overrides = Object.entries(levels.moduleLevels()).map(([scope, lvl]) => `${scope}=${lvl}`);
    logger.debug(`Log levels: root=${[levels.rootLevel, ...overrides].join(", ")}`);
  } catch (error: unknown) {
    console.error(`[${APP_SCOPE}] ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }

  try {
    const registry = deps.registry ?? defaultRegistry();

    // Resolve before probing or reading anything so a typo fails fast.
    const resolved = registry.resolveTargets(targets, logger.child("isa"));

    const torchDir = findTorchDir({
      python: config.python,
      runCommand: deps.runCommand,
      logger: logger.child("torch"),
    });

    if (config.root) logger.debug(`Using sysroot ${config.root}`);
    const plan = planPrune(resolved, {
      registry,
      basedirs: config.basedirs,
      dirtrees: config.dirtrees,
      torchDir,
      root: config.root,
      logger: logger.child("plan"),
    });
    logger.info(`Keeping ${plan.keepIsas.join(", ")} (${plan.keepGfxs.join(", ")})`);

    const summary = executePlan(plan, {
      dryRun: opts.dryRun ?? false,
      logger: logger.child("prune"),
    });
    logger.info(formatSummary(summary));
    return EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof UnknownIsaError) {
      logger.fatal(`${error.message}. Run "gfx-prune list" to see known targets.`);
      return EXIT_UNKNOWN_ISA;
    }
    if (
      error instanceof PruneError ||
      error instanceof PlanError ||
      error instanceof TemplateError ||
      error instanceof IsaTableError
    ) {
      logger.fatal(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

export function handleList(opts: { torch?: boolean }, deps: CliDeps = {}): void {
  const registry = deps.registry ?? defaultRegistry();
  const entries = registry
    .entries()
    .filter((entry) => !opts.torch || entry.supportedByReferenceToolkit);

  const width = Math.max(4, ...entries.map((entry) => entry.name.length));
  console.log(
    `${"NAME".padEnd(width)}  ${"VERSION".padEnd(8)}  ${"SRAMECC".padEnd(11)}  ${"XNACK".padEnd(11)}  WAVE  TORCH`,
  );
  for (const entry of entries) {
    console.log(
      [
        entry.name.padEnd(width),
        hsaOverrideVersion(entry).padEnd(8),
        entry.sramecc.padEnd(11),
        entry.xnack.padEnd(11),
        String(entry.wavefrontSize).padEnd(4),
        entry.supportedByReferenceToolkit ? "yes" : "no",
      ].join("  "),
    );
  }
}

export function handleShow(name: string, deps: CliDeps = {}): number {
  const registry = deps.registry ?? defaultRegistry();
  if (!registry.has(name)) {
    console.error(`[${APP_SCOPE}] Unknown GPU ISA "${name}"`);
    const family = registry.byShortIsa(name.split(":")[0] ?? name);
    if (family.length > 0) {
      console.error(`[${APP_SCOPE}] Known variants: ${family.map((e) => e.name).join(", ")}`);
    }
    return EXIT_UNKNOWN_ISA;
  }

  const entry = registry.lookup(name);
  console.log(formatIsaEntry(entry));
  console.log(`  family:     ${shortIsa(entry)}`);
  console.log(`  generation: ${shortGfx(entry)}`);
  console.log(`  HSA_OVERRIDE_GFX_VERSION=${hsaOverrideVersion(entry)}`);
  return EXIT_OK;
}

export function handleResolve(targets: string, deps: CliDeps = {}): number {
  const registry = deps.registry ?? defaultRegistry();
  try {
    const resolved = registry.resolveTargets(targets);
    console.log(`isas: ${[...resolved.shortIsas].sort().join(" ")}`);
    console.log(`gfx:  ${[...resolved.shortGfxs].sort().join(" ")}`);
    return EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof UnknownIsaError) {
      console.error(`[${APP_SCOPE}] ${error.message}`);
      return EXIT_UNKNOWN_ISA;
    }
    throw error;
  }
}

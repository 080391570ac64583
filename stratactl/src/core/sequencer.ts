import path from "node:path";
import type { CacheStore } from "../cache/store.js";
import { exitCodeFor, EXIT } from "../commands/exit-codes.js";
import { composeEnvironment } from "../env/compose.js";
import { loadProject } from "../install/project.js";
import { LayerComposer, type LayerReport } from "../layers/composer.js";
import { defaultLayers } from "../layers/layers.js";
import { launch } from "../launch/supervisor.js";
import type { Spawner } from "../launch/spawner.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { StrataConfig } from "../types/config.js";
import { bootstrapFailure, diag, silentReporter, type Reporter } from "./diagnostics.js";
import { errorMessage, isBootstrapError } from "./errors.js";

export type BootstrapStep = "dependencies" | "project" | "launch";

export type StepResult = {
  status: "success" | "failed";
  duration_ms: number;
  error?: string;
};

export type SequencerResult = {
  ok: boolean;
  /** Application exit code after a launch, otherwise the bootstrap exit code. */
  exitCode: number;
  phase: "bootstrap" | "application";
  steps: Partial<Record<BootstrapStep, StepResult>>;
  layers: LayerReport[];
  error?: Error;
};

export type BootstrapPlan = {
  projectRoot: string;
  config: StrataConfig;
  cache: CacheStore;
  /** Omitted for a build-only run. */
  entrypoint?: string;
  args?: string[];
  /** false runs the dependency layer only. */
  installProject?: boolean;
  inheritedEnv?: NodeJS.ProcessEnv;
  reporter?: Reporter;
  registry?: SchemaRegistry;
  spawner?: Spawner;
  signal?: AbortSignal;
  forwardSignals?: NodeJS.Signals[];
};

/** Times steps and records their outcome. */
class StepTracker {
  readonly results: SequencerResult["steps"] = {};
  private current: BootstrapStep | null = null;
  private startedAt = 0;

  constructor(private readonly reporter: Reporter) {}

  begin(step: BootstrapStep): void {
    this.current = step;
    this.startedAt = Date.now();
  }

  finish(step: BootstrapStep): void {
    this.results[step] = { status: "success", duration_ms: Date.now() - this.startedAt };
    this.reporter.report(diag("info", `${step.toUpperCase()}_OK`, `${step} OK`));
    this.current = null;
  }

  /** Mark the running step, if any, as failed. */
  fail(e: unknown): void {
    if (this.current === null) return;
    this.results[this.current] = { status: "failed", duration_ms: Date.now() - this.startedAt, error: errorMessage(e) };
    this.current = null;
  }
}

function stepForLayer(name: string): BootstrapStep {
  return name === "dependencies" ? "dependencies" : "project";
}

/** Steps for a plan, in execution order. */
export function planSteps(plan: Pick<BootstrapPlan, "config" | "entrypoint" | "installProject">): BootstrapStep[] {
  const steps: BootstrapStep[] = [];
  const launching = plan.entrypoint !== undefined;
  if (!(launching && plan.config.no_sync)) {
    steps.push("dependencies");
    if (plan.installProject !== false) steps.push("project");
  }
  if (launching) steps.push("launch");
  return steps;
}

/**
 * Bootstrap Sequencer: dependency layer, project layer, then launch, strictly
 * in that order. The first bootstrap failure ends the run with its own exit
 * code; once launched, the application's exit code is the result.
 */
export class BootstrapSequencer {
  private readonly reporter: Reporter;

  constructor(private readonly plan: BootstrapPlan) {
    this.reporter = plan.reporter ?? silentReporter;
  }

  async run(): Promise<SequencerResult> {
    const { plan } = this;
    const tracker = new StepTracker(this.reporter);
    const steps = tracker.results;
    const layers: LayerReport[] = [];
    const order = planSteps(plan);
    const envDir = path.resolve(plan.projectRoot, plan.config.env_dir);

    try {
      if (order.includes("dependencies")) {
        tracker.begin("dependencies");
        const project = await loadProject(plan.projectRoot, plan.config, plan.registry);
        const composer = new LayerComposer(plan.cache, this.reporter);
        const layerDefs = defaultLayers({
          manifest: plan.config.manifest,
          lockfile: plan.config.lockfile,
          envDir: plan.config.env_dir,
          sources: project.lockfile.packages.map((p) => p.source.path),
        });

        await composer.compose(project, envDir, {
          layers: layerDefs,
          frozen: plan.config.frozen,
          noDev: plan.config.no_dev,
          compileBytecode: plan.config.compile_bytecode,
          linkMode: plan.config.link_mode,
          concurrency: plan.config.concurrency,
          until: order.includes("project") ? undefined : "dependencies",
          onLayerStart: (layer) => tracker.begin(stepForLayer(layer.name)),
          onLayerDone: (report) => {
            layers.push(report);
            tracker.finish(stepForLayer(report.name));
          },
        });
      }

      if (plan.entrypoint === undefined) {
        return { ok: true, exitCode: EXIT.SUCCESS, phase: "bootstrap", steps, layers };
      }

      tracker.begin("launch");
      const launched = await launch({
        entrypoint: plan.entrypoint,
        args: plan.args,
        env: composeEnvironment(envDir, plan.inheritedEnv ?? process.env),
        cwd: plan.projectRoot,
        noSync: true,
        signal: plan.signal,
        forwardSignals: plan.forwardSignals,
        spawner: plan.spawner,
      });
      if (!launched.ok) throw launched.error;

      tracker.finish("launch");
      return {
        ok: launched.exitCode === 0,
        exitCode: launched.exitCode,
        phase: "application",
        steps,
        layers,
      };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      tracker.fail(e);
      if (isBootstrapError(error)) {
        this.reporter.report(bootstrapFailure(error));
        return { ok: false, exitCode: exitCodeFor(error.code), phase: "bootstrap", steps, layers, error };
      }
      this.reporter.report(diag("error", "UNEXPECTED", error.message, { details: { phase: "bootstrap" } }));
      return { ok: false, exitCode: EXIT.UNEXPECTED, phase: "bootstrap", steps, layers, error };
    }
  }
}

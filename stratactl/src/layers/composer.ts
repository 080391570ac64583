import { RecordingCacheStore } from "../cache/recording-store.js";
import type { CacheStore } from "../cache/store.js";
import { diag, silentReporter, type Reporter } from "../core/diagnostics.js";
import { install, type InstallReport } from "../install/installer.js";
import type { LoadedProject } from "../install/project.js";
import type { LinkMode } from "../types/config.js";
import { fingerprintLayer, type LayerDefinition } from "./layers.js";

export type LayerReport = {
  name: string;
  mode: LayerDefinition["mode"];
  cacheScope: LayerDefinition["cacheScope"];
  fingerprint: string;
  fetched: string[];
  stored: string[];
  install: InstallReport;
};

export type ComposeOptions = {
  layers: LayerDefinition[];
  frozen: boolean;
  noDev: boolean;
  compileBytecode: boolean;
  linkMode: LinkMode;
  concurrency?: number;
  /** Stop after this layer (e.g. "dependencies" for a dependency-only build). */
  until?: string;
  onLayerStart?: (layer: LayerDefinition) => void;
  onLayerDone?: (report: LayerReport) => void;
};

/** A layer touched cache keys outside its declared scope. */
export class LayerScopeError extends Error {
  constructor(
    readonly layer: string,
    readonly keys: string[],
    reason: string,
  ) {
    super(`Layer ${layer} ${reason}: ${keys.slice(0, 3).join(", ")}${keys.length > 3 ? ", ..." : ""}`);
    this.name = "LayerScopeError";
  }
}

/**
 * Check one layer's cache traffic against its declared scope and against the
 * keys earlier layers of other scopes own.
 */
export function assertLayerScope(
  layer: LayerDefinition,
  recorder: RecordingCacheStore,
  owners: Map<string, LayerDefinition>,
): void {
  const touched = [...recorder.touched()].sort();
  if (layer.cacheScope === "none" && touched.length > 0) {
    throw new LayerScopeError(layer.name, touched, "has cache scope none but touched cache keys");
  }
  const foreign = touched.filter((k) => {
    const owner = owners.get(k);
    return owner !== undefined && owner.cacheScope !== layer.cacheScope;
  });
  if (foreign.length > 0) {
    throw new LayerScopeError(layer.name, foreign, "touched cache keys owned by an earlier layer");
  }
}

/**
 * Layer Composer: runs the install layers in order against one environment
 * and one cache store. The first failing layer ends the sequence.
 */
export class LayerComposer {
  constructor(
    private readonly cache: CacheStore,
    private readonly reporter: Reporter = silentReporter,
  ) {}

  async compose(project: LoadedProject, envDir: string, opts: ComposeOptions): Promise<LayerReport[]> {
    if (opts.until !== undefined && !opts.layers.some((l) => l.name === opts.until)) {
      throw new Error(`Unknown layer: ${opts.until}`);
    }

    const reports: LayerReport[] = [];
    const owners = new Map<string, LayerDefinition>();

    for (const layer of opts.layers) {
      opts.onLayerStart?.(layer);
      const recorder = new RecordingCacheStore(this.cache);
      const fingerprint = await fingerprintLayer(project.root, layer);

      const result = await install(project, envDir, {
        mode: layer.mode,
        cache: recorder,
        frozen: opts.frozen,
        noDev: opts.noDev,
        compileBytecode: opts.compileBytecode,
        linkMode: opts.linkMode,
        concurrency: opts.concurrency,
        layer: { name: layer.name, fingerprint },
        reporter: this.reporter,
      });

      assertLayerScope(layer, recorder, owners);
      for (const key of recorder.touched()) {
        if (!owners.has(key)) owners.set(key, layer);
      }

      this.reporter.report(
        diag(
          "info",
          "LAYER_OK",
          `${layer.name}: ${result.installed.length} installed (${result.cacheHits} cached), ${result.skipped.length} up to date, ${result.removed.length} removed`,
          { details: { layer: layer.name, fingerprint } },
        ),
      );

      const report: LayerReport = {
        name: layer.name,
        mode: layer.mode,
        cacheScope: layer.cacheScope,
        fingerprint,
        fetched: [...recorder.fetched],
        stored: [...recorder.stored],
        install: result,
      };
      reports.push(report);
      opts.onLayerDone?.(report);

      if (layer.name === opts.until) break;
    }

    return reports;
  }
}

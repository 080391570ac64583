import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { run } from "../src/commands/run.js";
import { sync } from "../src/commands/sync.js";
import { CollectingReporter } from "../src/core/diagnostics.js";
import { BootstrapSequencer, planSteps } from "../src/core/sequencer.js";
import { FsCacheStore } from "../src/cache/store.js";
import { listFiles } from "../src/cache/tree.js";
import type { ProcessExit, SpawnRequest, Spawner } from "../src/launch/spawner.js";
import { makeProject, testConfig, writeManifest } from "./fixtures.js";

/** Inode, mtime and content of every file in every published cache entry. */
async function cacheState(cacheDir: string): Promise<Record<string, string>> {
  const cache = new FsCacheStore(cacheDir);
  const out: Record<string, string> = {};
  for (const key of await cache.keys()) {
    const dir = cache.entryDir(key);
    for (const rel of await listFiles(dir)) {
      const file = path.join(dir, rel);
      const st = fs.statSync(file);
      out[`${key}/${rel}`] = `${st.ino}:${st.mtimeMs}:${fs.readFileSync(file, "utf8")}`;
    }
  }
  return out;
}

function exitingSpawner(result: ProcessExit): { spawner: Spawner; requests: SpawnRequest[] } {
  const requests: SpawnRequest[] = [];
  const spawner: Spawner = (req) => {
    requests.push(req);
    return { exited: Promise.resolve(result), kill() {} };
  };
  return { spawner, requests };
}

describe("planSteps", () => {
  const config = testConfig({ cacheDir: "/unused" });

  it("builds both layers then launches", () => {
    expect(planSteps({ config, entrypoint: "app.js" })).toEqual(["dependencies", "project", "launch"]);
  });

  it("builds only when there is no entrypoint", () => {
    expect(planSteps({ config })).toEqual(["dependencies", "project"]);
    expect(planSteps({ config, installProject: false })).toEqual(["dependencies"]);
  });

  it("skips the build entirely with no_sync", () => {
    expect(planSteps({ config: { ...config, no_sync: true }, entrypoint: "app.js" })).toEqual(["launch"]);
  });
});

describe("BootstrapSequencer", () => {
  it("runs dependencies, project and launch in order", async () => {
    const fx = await makeProject();
    const { spawner, requests } = exitingSpawner({ code: 0, signal: null });
    const reporter = new CollectingReporter();

    const result = await new BootstrapSequencer({
      projectRoot: fx.root,
      config: testConfig(fx),
      cache: new FsCacheStore(fx.cacheDir),
      entrypoint: "app.js",
      inheritedEnv: { PATH: "/usr/bin" },
      reporter,
      spawner,
    }).run();

    expect(result.ok).toBe(true);
    expect(result.phase).toBe("application");
    expect(Object.keys(result.steps)).toEqual(["dependencies", "project", "launch"]);
    expect(result.layers.map((l) => l.name)).toEqual(["dependencies", "project"]);
    expect(reporter.codes()).toEqual(["LAYER_OK", "DEPENDENCIES_OK", "LAYER_OK", "PROJECT_OK", "LAUNCH_OK"]);
    expect(requests[0]?.env.PATH).toBe(`${path.join(fx.envDir, "bin")}:/usr/bin`);
    expect(requests[0]?.cwd).toBe(fx.root);
  });
});

describe("run command", () => {
  it("returns the application's exit code after bootstrap", async () => {
    const fx = await makeProject();
    const { spawner } = exitingSpawner({ code: 3, signal: null });

    const res = await run({
      project: fx.root,
      entrypoint: "app.js",
      overrides: { cache_dir: fx.cacheDir },
      env: { PATH: "/usr/bin" },
      reporter: new CollectingReporter(),
      spawner,
    });

    expect(res.ok).toBe(false);
    expect(res.exitCode).toBe(3);
    expect(res.phase).toBe("application");
    expect(res.ok ? undefined : res.error).toBeUndefined();
  });

  it("exits 65 on a lock mismatch without launching", async () => {
    const fx = await makeProject();
    writeManifest(fx.root, { ...fx.manifest, dependencies: { "left-pad": "^1.4.0" } });
    const { spawner, requests } = exitingSpawner({ code: 0, signal: null });
    const reporter = new CollectingReporter();

    const res = await run({
      project: fx.root,
      entrypoint: "app.js",
      overrides: { cache_dir: fx.cacheDir },
      env: {},
      reporter,
      spawner,
    });

    expect(res.exitCode).toBe(65);
    expect(res.phase).toBe("bootstrap");
    expect(res.ok ? undefined : res.error?.code).toBe("LOCK_MISMATCH");
    expect(requests).toEqual([]);
    expect(reporter.diagnostics.at(-1)?.details?.phase).toBe("bootstrap");
    expect(fs.existsSync(fx.envDir)).toBe(false);
  });

  it("exits 78 when the manifest is missing", async () => {
    const fx = await makeProject();
    fs.rmSync(path.join(fx.root, "strata.yaml"));

    const res = await run({ project: fx.root, overrides: { cache_dir: fx.cacheDir }, env: {}, reporter: new CollectingReporter() });

    expect(res.exitCode).toBe(78);
    expect(res.ok ? undefined : res.error?.code).toBe("CONFIG_MISSING");
  });

  it("exits 78 on invalid configuration", async () => {
    const fx = await makeProject();

    const res = await run({ project: fx.root, env: { STRATA_CONCURRENCY: "0" }, reporter: new CollectingReporter() });

    expect(res.exitCode).toBe(78);
    expect(res.ok ? undefined : res.error?.code).toBe("CONFIG_MISSING");
  });

  it("exits 76 on an integrity failure", async () => {
    const fx = await makeProject();
    fs.writeFileSync(path.join(fx.root, "vendor", "tiny-util-2.0.1", "extra.js"), "1;\n");

    const res = await run({ project: fx.root, overrides: { cache_dir: fx.cacheDir }, env: {}, reporter: new CollectingReporter() });

    expect(res.exitCode).toBe(76);
  });

  it("exits 69 when the entrypoint cannot be started, after a complete build", async () => {
    const fx = await makeProject();

    const res = await run({
      project: fx.root,
      entrypoint: "missing.js",
      overrides: { cache_dir: fx.cacheDir },
      env: {},
      reporter: new CollectingReporter(),
      spawner: exitingSpawner({ code: 0, signal: null }).spawner,
    });

    expect(res.exitCode).toBe(69);
    expect(res.phase).toBe("bootstrap");
    expect(res.result?.steps.dependencies?.status).toBe("success");
    expect(res.result?.steps.project?.status).toBe("success");
    expect(res.result?.steps.launch?.status).toBe("failed");
  });

  it("launches without building under no_sync", async () => {
    const fx = await makeProject();
    const { spawner, requests } = exitingSpawner({ code: 0, signal: null });

    const res = await run({
      project: fx.root,
      entrypoint: "app.js",
      overrides: { cache_dir: fx.cacheDir, no_sync: true },
      env: {},
      reporter: new CollectingReporter(),
      spawner,
    });

    expect(res.exitCode).toBe(0);
    expect(requests.length).toBe(1);
    expect(Object.keys(res.result?.steps ?? {})).toEqual(["launch"]);
    expect(fs.existsSync(fx.envDir)).toBe(false);
  });
});

describe("sync command", () => {
  it("builds dependencies only when the project is left out", async () => {
    const fx = await makeProject();

    const res = await sync({
      project: fx.root,
      overrides: { cache_dir: fx.cacheDir },
      env: {},
      installProject: false,
      reporter: new CollectingReporter(),
    });

    expect(res.exitCode).toBe(0);
    expect(res.result?.layers.map((l) => l.name)).toEqual(["dependencies"]);
    expect(fs.existsSync(path.join(fx.envDir, "lib", "node_modules", "left-pad", "index.js"))).toBe(true);
    expect(fs.existsSync(path.join(fx.envDir, "lib", "node_modules", "demo-app"))).toBe(false);
  });

  it("leaves the cache unchanged on a repeated sync", async () => {
    const fx = await makeProject();
    const base = { project: fx.root, overrides: { cache_dir: fx.cacheDir }, env: {}, reporter: new CollectingReporter() };

    await sync(base);
    const keys = await new FsCacheStore(fx.cacheDir).keys();
    const second = await sync(base);

    expect(second.exitCode).toBe(0);
    expect(await new FsCacheStore(fx.cacheDir).keys()).toEqual(keys);
    expect(second.result?.layers[0]?.install.skipped.length).toBe(3);
  });

  it("keeps application edits out of the dependency cache", async () => {
    const fx = await makeProject();
    const base = { project: fx.root, overrides: { cache_dir: fx.cacheDir }, env: {}, reporter: new CollectingReporter() };

    await sync(base);
    const before = await cacheState(fx.cacheDir);
    fs.writeFileSync(path.join(fx.root, "app.js"), "console.log('edited');\n");

    const second = await sync(base);

    expect(second.exitCode).toBe(0);
    expect(Object.keys(before).length).toBeGreaterThan(0);
    expect(await cacheState(fx.cacheDir)).toEqual(before);
    expect(second.result?.layers[0]?.fetched).toEqual([]);
    expect(second.result?.layers[0]?.stored).toEqual([]);
    expect(second.result?.layers[1]?.fetched).toEqual([]);
    expect(second.result?.layers[1]?.stored).toEqual([]);
    expect(second.result?.layers[1]?.install.projectLinked).toBe(true);
    expect(fs.readFileSync(path.join(fx.envDir, "lib", "node_modules", "demo-app", "app.js"), "utf8")).toBe(
      "console.log('edited');\n",
    );
  });
});

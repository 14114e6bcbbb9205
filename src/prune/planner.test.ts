import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultRegistry, resolveTargets } from "../isa/registry.js";
import { PlanError, extractIsaTokens, isPrunableFile, planPrune } from "./planner.js";
import { TemplateError } from "./templates.js";

function touch(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, "kernel", "utf-8");
}

describe("extractIsaTokens", () => {
  it("finds family names in kernel file names", () => {
    expect(extractIsaTokens("Kernels.so-000-gfx906-xnack-.hsaco")).toEqual(["gfx906"]);
    expect(extractIsaTokens("TensileLibrary_lazy_gfx90a.dat")).toEqual(["gfx90a"]);
    expect(extractIsaTokens("TensileLibrary_gfx1030_gfx1100.dat")).toEqual(["gfx1030", "gfx1100"]);
  });

  it("reports each family once", () => {
    expect(extractIsaTokens("gfx942-gfx942.co")).toEqual(["gfx942"]);
  });

  it("returns nothing for generic files", () => {
    expect(extractIsaTokens("TensileLibrary_Type_HH_fallback.dat")).toEqual([]);
    expect(extractIsaTokens("librocblas.so.4")).toEqual([]);
  });
});

describe("isPrunableFile", () => {
  const registry = defaultRegistry();
  const keep = new Set(["gfx906", "gfx1030"]);

  it("prunes files that only serve unneeded families", () => {
    expect(isPrunableFile("Kernels.so-000-gfx803.hsaco", keep, registry)).toBe(true);
  });

  it("keeps files for a needed family", () => {
    expect(isPrunableFile("Kernels.so-000-gfx906-xnack-.hsaco", keep, registry)).toBe(false);
  });

  it("keeps files shared with a needed family", () => {
    expect(isPrunableFile("TensileLibrary_gfx1030_gfx1100.dat", keep, registry)).toBe(false);
  });

  it("keeps files without a known family", () => {
    expect(isPrunableFile("TensileLibrary_Type_HH_fallback.dat", keep, registry)).toBe(false);
    expect(isPrunableFile("TensileLibrary_gfx1200.dat", keep, registry)).toBe(false);
  });
});

describe("planPrune", () => {
  let root: string;
  const registry = defaultRegistry();

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "gfx-prune-planner-test-"));
    for (const generation of ["gfx8", "gfx9", "gfx10", "gfx11"]) {
      touch(path.join(root, "usr/lib64/rocm", generation, "lib/libkernels.so"));
    }
    const library = path.join(root, "usr/lib64/rocblas/library");
    touch(path.join(library, "Kernels.so-000-gfx803.hsaco"));
    touch(path.join(library, "Kernels.so-000-gfx906-xnack-.hsaco"));
    touch(path.join(library, "TensileLibrary_lazy_gfx1030.dat"));
    touch(path.join(library, "TensileLibrary_Type_HH_fallback.dat"));
    touch(path.join(library, "TensileLibrary_gfx1200.dat"));
    fs.mkdirSync(path.join(library, "gfx803"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("plans trees of unneeded generations and files of unneeded families", () => {
    const targets = resolveTargets("gfx906:xnack-;gfx1030");
    const plan = planPrune(targets, { registry, root });

    expect(plan.keepIsas).toEqual(["gfx1030", "gfx906"]);
    expect(plan.keepGfxs).toEqual(["gfx10", "gfx9"]);
    expect(plan.actions).toEqual([
      { kind: "file", path: path.join(root, "usr/lib64/rocblas/library/Kernels.so-000-gfx803.hsaco") },
      { kind: "tree", path: path.join(root, "usr/lib64/rocm/gfx11") },
      { kind: "tree", path: path.join(root, "usr/lib64/rocm/gfx8") },
    ]);
  });

  it("does not modify the filesystem", () => {
    planPrune(resolveTargets("gfx1100"), { registry, root });
    expect(fs.existsSync(path.join(root, "usr/lib64/rocm/gfx8"))).toBe(true);
    expect(fs.readdirSync(path.join(root, "usr/lib64/rocblas/library"))).toHaveLength(6);
  });

  it("keeps everything when every generation and family present is targeted", () => {
    const targets = resolveTargets("gfx803;gfx906;gfx1030;gfx1100");
    expect(planPrune(targets, { registry, root }).actions).toEqual([]);
  });

  it("includes torch library dirs when torch is installed", () => {
    const torchDir = "/opt/venv/site-packages/torch";
    const hipblaslt = path.join(root, torchDir, "lib/hipblaslt/library");
    touch(path.join(hipblaslt, "extop_gfx942.co"));
    touch(path.join(hipblaslt, "extop_gfx1030.co"));

    const plan = planPrune(resolveTargets("gfx1030"), {
      registry,
      root,
      torchDir,
      dirtrees: [],
    });

    expect(plan.actions).toEqual([
      { kind: "file", path: path.join(hipblaslt, "extop_gfx942.co") },
      { kind: "file", path: path.join(root, "usr/lib64/rocblas/library/Kernels.so-000-gfx803.hsaco") },
      {
        kind: "file",
        path: path.join(root, "usr/lib64/rocblas/library/Kernels.so-000-gfx906-xnack-.hsaco"),
      },
    ]);
  });

  it("skips torch templates when torch is not installed", () => {
    const plan = planPrune(resolveTargets("gfx1030"), {
      registry,
      root,
      basedirs: ["{torch}/lib/rocblas/library"],
      dirtrees: [],
    });
    expect(plan.actions).toEqual([]);
  });

  it("treats missing directories as nothing to do", () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), "gfx-prune-empty-root-"));
    try {
      expect(planPrune(resolveTargets("gfx900"), { registry, root: empty }).actions).toEqual([]);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });

  it("wraps unreadable library directories in PlanError", () => {
    touch(path.join(root, "opt/library/Kernels.so-000-gfx803.hsaco"));
    const spy = vi.spyOn(fs, "readdirSync").mockImplementation(() => {
      throw new Error("EACCES: permission denied");
    });

    let thrown: unknown;
    try {
      planPrune(resolveTargets("gfx900"), { registry, root, basedirs: ["/opt/library"], dirtrees: [] });
    } catch (error: unknown) {
      thrown = error;
    }
    spy.mockRestore();

    expect(thrown).toBeInstanceOf(PlanError);
    if (thrown instanceof PlanError) {
      expect(thrown.path).toBe(path.join(root, "opt/library"));
      expect(thrown.message).toBe(`Cannot read ${path.join(root, "opt/library")}: EACCES: permission denied`);
    }
  });

  it("rejects an unknown placeholder before reading anything", () => {
    expect(() =>
      planPrune(resolveTargets("gfx900"), { registry, root, basedirs: ["/opt/{rocm}/lib"] }),
    ).toThrow(TemplateError);
  });
});

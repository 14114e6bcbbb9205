import { describe, expect, it } from "vitest";
import {
  BASEDIRS,
  DIRTREES,
  TemplateError,
  expandTemplate,
  validateTemplate,
  withRoot,
} from "./templates.js";

describe("path templates", () => {
  it("covers system and torch rocBLAS/hipBLASLt libraries", () => {
    expect(BASEDIRS).toEqual([
      "/usr/lib/rocblas/library",
      "/usr/lib64/rocblas/library",
      "{torch}/lib/rocblas/library",
      "{torch}/lib/hipblaslt/library",
    ]);
    expect(DIRTREES).toEqual(["/usr/lib/rocm/gfx{shortversion}", "/usr/lib64/rocm/gfx{shortversion}"]);
  });

  it("all defaults are valid templates", () => {
    for (const template of [...BASEDIRS, ...DIRTREES]) {
      expect(() => validateTemplate(template)).not.toThrow();
    }
  });
});

describe("expandTemplate", () => {
  it("returns templates without placeholders unchanged", () => {
    expect(expandTemplate("/usr/lib/rocblas/library", {})).toBe("/usr/lib/rocblas/library");
  });

  it("substitutes the torch directory", () => {
    expect(
      expandTemplate("{torch}/lib/hipblaslt/library", { torch: "/opt/venv/site-packages/torch" }),
    ).toBe("/opt/venv/site-packages/torch/lib/hipblaslt/library");
  });

  it("substitutes the generation", () => {
    expect(expandTemplate("/usr/lib64/rocm/gfx{shortversion}", { shortversion: "11" })).toBe(
      "/usr/lib64/rocm/gfx11",
    );
  });

  it("returns null when a placeholder has no value", () => {
    expect(expandTemplate("{torch}/lib/rocblas/library", {})).toBeNull();
    expect(expandTemplate("{torch}/lib/rocblas/library", { torch: null })).toBeNull();
  });

  it("rejects unknown placeholders", () => {
    expect(() => expandTemplate("/opt/{rocm}/lib", { torch: "/t" })).toThrow(TemplateError);
    expect(() => expandTemplate("/opt/{rocm}/lib", {})).toThrow(
      'Unknown placeholder "{rocm}" in path template "/opt/{rocm}/lib". Known: {torch}, {shortversion}',
    );
  });
});

describe("withRoot", () => {
  it("prefixes a sysroot", () => {
    expect(withRoot("/mnt/image", "/usr/lib/rocm/gfx9")).toBe("/mnt/image/usr/lib/rocm/gfx9");
  });

  it("leaves paths alone without a sysroot", () => {
    expect(withRoot(undefined, "/usr/lib/rocm/gfx9")).toBe("/usr/lib/rocm/gfx9");
    expect(withRoot("", "/usr/lib/rocm/gfx9")).toBe("/usr/lib/rocm/gfx9");
  });
});

/**
 * Install-location templates for ROCm kernel libraries.
 *
 * Placeholders: {torch} is the installed torch package directory,
 * {shortversion} a GPU generation's major version ("9" for gfx9).
 */
import path from "node:path";

/** Directories whose per-ISA kernel files are pruned one by one. */
export const BASEDIRS: readonly string[] = [
  "/usr/lib/rocblas/library",
  "/usr/lib64/rocblas/library",
  "{torch}/lib/rocblas/library",
  "{torch}/lib/hipblaslt/library",
];

/** Per-generation trees removed as a whole, e.g. /usr/lib64/rocm/gfx11. */
export const DIRTREES: readonly string[] = [
  "/usr/lib/rocm/gfx{shortversion}",
  "/usr/lib64/rocm/gfx{shortversion}",
];

export const TEMPLATE_VARIABLES = ["torch", "shortversion"] as const;

export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

export type TemplateVars = Partial<Record<TemplateVariable, string | null>>;

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

const PLACEHOLDER_RE = /\{([^{}]*)\}/g;

function isTemplateVariable(name: string): name is TemplateVariable {
  return (TEMPLATE_VARIABLES as readonly string[]).includes(name);
}

/** Check that a template only uses known placeholders. */
export function validateTemplate(template: string): void {
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const name = match[1] ?? "";
    if (!isTemplateVariable(name)) {
      throw new TemplateError(
        `Unknown placeholder "{${name}}" in path template "${template}". ` +
          `Known: ${TEMPLATE_VARIABLES.map((v) => `{${v}}`).join(", ")}`,
      );
    }
  }
}

/**
 * Fill in a path template.
 *
 * @returns The expanded path, or null when a placeholder has no value
 *   (e.g. {torch} without a torch installation).
 * @throws TemplateError on an unknown placeholder.
 */
export function expandTemplate(template: string, vars: TemplateVars): string | null {
  validateTemplate(template);

  let missing = false;
  const expanded = template.replace(PLACEHOLDER_RE, (_whole, name: string) => {
    const value = isTemplateVariable(name) ? vars[name] : undefined;
    if (value === undefined || value === null) {
      missing = true;
      return "";
    }
    return value;
  });
  return missing ? null : expanded;
}

/** Place an absolute path under a sysroot, if one is set. */
export function withRoot(root: string | undefined, target: string): string {
  return root ? path.join(root, target) : target;
}

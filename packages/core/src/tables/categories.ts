import { basename, extname } from "path";

export const DEFAULT_CATEGORY = "Misc";

/** Directory under the scan root whose children name categories */
export const MODELS_DIRECTORY = "Models";

export interface CategoryRule {
  category: string;
  keywords: readonly string[];
}

export const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: "Buildings", keywords: ["building", "house", "skyscraper"] },
  { category: "Characters", keywords: ["character", "person", "human"] },
  { category: "Props", keywords: ["prop", "object", "item"] },
  { category: "Environment", keywords: ["tree", "plant", "nature"] },
  { category: "Vehicles", keywords: ["vehicle", "car", "truck"] },
];

export const CATEGORY_NAMES: readonly string[] = CATEGORY_RULES.map((rule) => rule.category);

/**
 * Category from filename keywords. The keyword occurring earliest in the
 * name wins; ties go to the rule listed first.
 */
export function categorizeByFilename(fileName: string): string | null {
  const stem = basename(fileName, extname(fileName)).toLowerCase();
  let best: { category: string; index: number } | null = null;

  for (const rule of CATEGORY_RULES) {
    for (const keyword of rule.keywords) {
      const index = stem.indexOf(keyword);
      if (index !== -1 && (best === null || index < best.index)) {
        best = { category: rule.category, index };
      }
    }
  }

  return best?.category ?? null;
}

/**
 * Category from the directory directly under `Models/`, e.g.
 * `Models/Vehicles/sedan.obj` -> Vehicles.
 */
export function categorizeByDirectory(relativePath: string): string | null {
  const segments = relativePath.split(/[\\/]/).filter((segment) => segment.length > 0);
  if (segments.length < 3 || segments[0] !== MODELS_DIRECTORY) {
    return null;
  }

  const folder = segments[1]?.toLowerCase();
  return CATEGORY_NAMES.find((name) => name.toLowerCase() === folder) ?? null;
}

/**
 * Filename keywords take precedence over directory structure, so
 * `Models/Vehicles/tree_prop.obj` lands in Environment.
 */
export function categorize(relativePath: string): string {
  return (
    categorizeByFilename(basename(relativePath)) ??
    categorizeByDirectory(relativePath) ??
    DEFAULT_CATEGORY
  );
}

// Line-level helpers for Wavefront OBJ meshes and MTL material libraries

/** Material-library directives that point at an image file */
export const TEXTURE_DIRECTIVES: ReadonlySet<string> = new Set([
  "map_Kd",
  "map_Ks",
  "map_Ka",
  "map_Ns",
  "map_d",
  "map_Bump",
  "map_bump",
  "bump",
  "disp",
  "norm",
]);

export type ObjLineKind = "vertex" | "face" | "material-use" | "material-library" | "other";

export interface WavefrontLine {
  keyword: string;
  args: string[];
}

/**
 * Drop a trailing `#` comment and surrounding whitespace.
 */
export function stripComment(line: string): string {
  const hash = line.indexOf("#");
  return (hash === -1 ? line : line.slice(0, hash)).trim();
}

/**
 * Split a line into keyword and arguments; null for blank or comment-only lines.
 */
export function tokenize(line: string): WavefrontLine | null {
  const content = stripComment(line);
  if (content.length === 0) return null;
  const [keyword = "", ...args] = content.split(/\s+/);
  return { keyword, args };
}

export function classifyObjLine(line: string): ObjLineKind {
  const parsed = tokenize(line);
  if (!parsed) return "other";
  switch (parsed.keyword) {
    case "v":
      return "vertex";
    case "f":
      return "face";
    case "usemtl":
      return "material-use";
    case "mtllib":
      return "material-library";
    default:
      return "other";
  }
}

/**
 * Material libraries named by an `mtllib` line, or an empty list.
 */
export function parseMaterialLibraries(line: string): string[] {
  const parsed = tokenize(line);
  if (!parsed || parsed.keyword !== "mtllib") return [];
  return parsed.args;
}

/**
 * Texture path named by a texture directive, or null for any other line.
 * Options such as `-bm 0.5` precede the path, so the last token is taken.
 */
export function parseTextureDirective(line: string): string | null {
  const parsed = tokenize(line);
  if (!parsed || !TEXTURE_DIRECTIVES.has(parsed.keyword)) return null;
  return parsed.args.at(-1) ?? null;
}

export function isMaterialDefinition(line: string): boolean {
  return tokenize(line)?.keyword === "newmtl";
}

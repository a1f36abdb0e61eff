import type { CodingPath } from "./types/structured";

export function appendPath(path: CodingPath, ...segments: ReadonlyArray<string | number>): CodingPath {
  return [...path, ...segments];
}

export function formatPath(path: CodingPath): string {
  if (path.length === 0) {
    return "<root>";
  }
  return path
    .map((segment, index) => {
      if (typeof segment === "number") return `[${segment}]`;
      return index === 0 ? segment : `.${segment}`;
    })
    .join("");
}

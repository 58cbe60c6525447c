import fs from "node:fs";
import path from "node:path";

/** Finds a file under `resources/`, whether running from sources or from `dist/`. */
export function resolveResource(fileName: string): string {
  const candidates = [
    path.resolve(__dirname, "../../../resources", fileName),
    path.resolve(__dirname, "../../../../resources", fileName),
    path.resolve(process.cwd(), "resources", fileName),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`${fileName} not found (looked in ${candidates.join(", ")})`);
  }
  return found;
}

export function readResource(fileName: string): string {
  return fs.readFileSync(resolveResource(fileName), "utf8");
}

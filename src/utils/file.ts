import { readFileSync, existsSync, mkdirSync } from "fs";
import YAML from "yaml";

export function ensureDir(dir: string) {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

export function readYAML(path: string): unknown {
  if (!existsSync(path)) return null;
  return YAML.parse(readFileSync(path, "utf-8"));
}

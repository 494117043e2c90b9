import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

/** Copy the shipped base.yaml into `dir/config`, optionally edited, and return the config directory. */
export function writeConfigDir(dir: string, edit?: (config: Record<string, unknown>) => void): string {
  const configDir = path.join(dir, "config");
  fs.mkdirSync(configDir, { recursive: true });
  const parsed: unknown = YAML.parse(fs.readFileSync(path.join(CONFIG_DIR, "base.yaml"), "utf8"));
  const config: Record<string, unknown> = parsed !== null && typeof parsed === "object" ? { ...parsed } : {};
  edit?.(config);
  fs.writeFileSync(path.join(configDir, "base.yaml"), YAML.stringify(config), "utf8");
  return configDir;
}

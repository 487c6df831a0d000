import fs from "fs";
import path from "path";
import type { ConfigProbeResult, Env } from "./tool.js";

export interface NotionConfig {
  token: string;
  defaultDatabaseId?: string;
}

export interface TodoistConfig {
  token: string;
}

export interface ObsidianConfig {
  vaultPath: string;
  templatesPath: string;
}

export const DEFAULT_TEMPLATES_PATH = "templates/";

// Whitespace-only values count as unset
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function probeNotion(env: Env): ConfigProbeResult<NotionConfig> {
  const token = read(env, "NOTION_TOKEN");
  if (!token) {
    return {
      ok: false,
      reason: "NOTION_TOKEN environment variable is not set. Get one from https://www.notion.so/my-integrations",
    };
  }
  const config: NotionConfig = { token };
  const defaultDatabaseId = read(env, "NOTION_DATABASE_ID");
  if (defaultDatabaseId) config.defaultDatabaseId = defaultDatabaseId;
  return { ok: true, config };
}

export function probeTodoist(env: Env): ConfigProbeResult<TodoistConfig> {
  const token = read(env, "TODOIST_TOKEN");
  if (!token) {
    return {
      ok: false,
      reason: "TODOIST_TOKEN environment variable is not set. Get one from https://todoist.com/app/settings/integrations",
    };
  }
  return { ok: true, config: { token } };
}

/**
 * The vault root must exist and be a directory. The templates subpath is
 * only resolved when a template is actually used.
 */
export function probeObsidian(env: Env): ConfigProbeResult<ObsidianConfig> {
  const vault = read(env, "OBSIDIAN_VAULT_PATH");
  if (!vault) {
    return {
      ok: false,
      reason:
        "OBSIDIAN_VAULT_PATH environment variable is not set. Set it to your vault path (e.g., /Users/username/Documents/Obsidian/Vault)",
    };
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(vault);
  } catch {
    return { ok: false, reason: `Obsidian vault path does not exist: ${vault}` };
  }
  if (!stats.isDirectory()) {
    return { ok: false, reason: `Obsidian vault path is not a directory: ${vault}` };
  }

  return {
    ok: true,
    config: {
      vaultPath: path.resolve(vault),
      templatesPath: read(env, "OBSIDIAN_TEMPLATES_PATH") ?? DEFAULT_TEMPLATES_PATH,
    },
  };
}

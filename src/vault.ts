import fs from "fs/promises";
import path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";

const FrontmatterSchema = z.record(z.unknown());

// Path validation helper - ensures paths stay within vault
export function isPathWithinVault(targetPath: string, vaultBase: string): boolean {
  const resolved = path.resolve(targetPath);
  const base = path.resolve(vaultBase);
  return resolved === base || resolved.startsWith(base + path.sep);
}

/** Resolve a vault-relative note path, appending `.md` when missing. */
export function resolveNotePath(vaultPath: string, notePath: string): string {
  const withExtension = notePath.endsWith(".md") ? notePath : `${notePath}.md`;
  const fullPath = path.resolve(vaultPath, withExtension);
  if (!isPathWithinVault(fullPath, vaultPath) || fullPath === path.resolve(vaultPath)) {
    throw new Error(`Path must be within the vault: ${notePath}`);
  }
  return fullPath;
}

/** Vault-relative path with forward slashes. */
export function toVaultPath(vaultPath: string, fullPath: string): string {
  return path.relative(vaultPath, fullPath).split(path.sep).join("/");
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function parseFrontmatter(content: string): { frontmatter: Record<string, unknown>; body: string } | null {
  if (!content.startsWith("---")) {
    return null;
  }

  const match = content.match(/^---\n(.*?)\n---\n?(.*)$/s);
  if (!match) {
    return null;
  }

  try {
    const loaded = FrontmatterSchema.safeParse(yaml.load(match[1]));
    return { frontmatter: loaded.success ? loaded.data : {}, body: match[2] };
  } catch {
    return null;
  }
}

/** Prefix `body` with a YAML front-matter block; empty front matter is omitted. */
export function withFrontmatter(body: string, frontmatter?: Record<string, unknown>): string {
  if (!frontmatter || Object.keys(frontmatter).length === 0) {
    return body;
  }
  return `---\n${yaml.dump(frontmatter)}---\n\n${body}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Replace `{{title}}`, `{{date}}`, `{{time}}` and `{{<variable>}}` placeholders.
 * Unknown placeholders are left as written.
 */
export function renderTemplate(
  template: string,
  values: { title: string; now: Date; variables?: Record<string, string> },
): string {
  const { title, now } = values;
  const builtins: Record<string, string> = {
    title,
    date: `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`,
    time: `${pad(now.getHours())}:${pad(now.getMinutes())}`,
  };
  const lookup: Record<string, string> = { ...builtins, ...values.variables };
  return template.replace(/\{\{\s*([\w.-]+)\s*\}\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(lookup, key) ? lookup[key] : placeholder,
  );
}

export interface NoteFile {
  fullPath: string;
  relativePath: string;
}

/**
 * Recursively collect `.md` files below `dir`, skipping dot-entries, sorted by path.
 * Symlinked notes are included; symlinked folders are not walked.
 */
export async function collectNotes(vaultPath: string, dir: string): Promise<NoteFile[]> {
  const notes: NoteFile[] = [];

  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;

      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if ((entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(".md")) {
        notes.push({ fullPath, relativePath: toVaultPath(vaultPath, fullPath) });
      }
    }
  }

  await walk(dir);
  return notes.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}

/** Obsidian vault note tools. */
import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { probeObsidian, type ObsidianConfig } from "../config.js";
import { defineTool, defineToolGroup, errorMessage, type Operation, type ToolGroup } from "../tool.js";
import {
  collectNotes,
  exists,
  isPathWithinVault,
  type NoteFile,
  parseFrontmatter,
  renderTemplate,
  resolveNotePath,
  toVaultPath,
  withFrontmatter,
} from "../vault.js";

export const OBSIDIAN_TOOL_NAMES = [
  "read_note",
  "create_note",
  "update_note",
  "append_to_note",
  "list_notes",
  "search_notes",
  "delete_note",
  "get_note_metadata",
  "create_note_from_template",
] as const;

const MAX_MATCH_LINE_LENGTH = 200;

export interface ObsidianDeps {
  now?: () => Date;
}

const notePath = z.string().min(1).describe('Path to the note relative to vault root (e.g., "folder/note" or "folder/note.md")');

export function createObsidianOperations(config: ObsidianConfig, deps: ObsidianDeps = {}): Operation[] {
  const { vaultPath } = config;
  const now = deps.now ?? (() => new Date());

  async function existingNote(note_path: string): Promise<string> {
    const fullPath = resolveNotePath(vaultPath, note_path);
    if (!(await exists(fullPath))) {
      throw new Error(`Note not found: ${note_path}`);
    }
    return fullPath;
  }

  async function noteInfo(fullPath: string) {
    const stat = await fs.stat(fullPath);
    if (!stat.isFile()) {
      throw new Error(`Not a note file: ${toVaultPath(vaultPath, fullPath)}`);
    }
    return {
      path: toVaultPath(vaultPath, fullPath),
      size: stat.size,
      modified: stat.mtime.toISOString(),
      created: stat.birthtime.toISOString(),
    };
  }

  // A walked note can vanish or be a dangling link by the time it is read
  async function skipUnreadable<T>(note: NoteFile, read: (note: NoteFile) => Promise<T>): Promise<T | null> {
    try {
      return await read(note);
    } catch (error) {
      console.error(`[multi-tool] Skipping ${note.relativePath}: ${errorMessage(error)}`);
      return null;
    }
  }

  async function writeNewNote(note_path: string, content: string, overwrite: boolean) {
    const fullPath = resolveNotePath(vaultPath, note_path);
    if (!overwrite && (await exists(fullPath))) {
      throw new Error(`Note already exists: ${note_path}. Use overwrite=true to replace it.`);
    }
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, "utf-8");
    return noteInfo(fullPath);
  }

  return [
    defineTool({
      name: "read_note",
      description: "Read the content of an Obsidian note",
      schema: { note_path: notePath },
      async run({ note_path }) {
        const fullPath = await existingNote(note_path);
        const content = await fs.readFile(fullPath, "utf-8");
        const { path: relativePath, size, modified, created } = await noteInfo(fullPath);
        return { path: relativePath, content, size, modified, created };
      },
    }),

    defineTool({
      name: "create_note",
      description: "Create a new Obsidian note, optionally with YAML frontmatter",
      schema: {
        note_path: notePath,
        content: z.string().describe("Content of the note"),
        overwrite: z.boolean().default(false).describe("Whether to overwrite if the note already exists"),
        frontmatter: z.record(z.unknown()).optional().describe("Frontmatter fields, written as YAML"),
      },
      async run({ note_path, content, overwrite, frontmatter }) {
        return writeNewNote(note_path, withFrontmatter(content, frontmatter), overwrite);
      },
    }),

    defineTool({
      name: "update_note",
      description: "Completely replace the content of an existing Obsidian note",
      schema: {
        note_path: notePath,
        content: z.string().describe("New content to replace the entire note"),
      },
      async run({ note_path, content }) {
        const fullPath = await existingNote(note_path);
        await fs.writeFile(fullPath, content, "utf-8");
        const { path: relativePath, size, modified } = await noteInfo(fullPath);
        return { path: relativePath, size, modified };
      },
    }),

    defineTool({
      name: "append_to_note",
      description: "Append content to the end of an existing Obsidian note",
      schema: {
        note_path: notePath,
        content: z.string().describe("Content to append"),
        add_newline: z.boolean().default(true).describe("Whether to add a newline before appending"),
      },
      async run({ note_path, content, add_newline }) {
        const fullPath = await existingNote(note_path);
        await fs.appendFile(fullPath, add_newline ? `\n${content}` : content, "utf-8");
        const { path: relativePath, size, modified } = await noteInfo(fullPath);
        return { path: relativePath, size, modified };
      },
    }),

    defineTool({
      name: "list_notes",
      description: "List all notes in a folder (or the entire vault)",
      schema: {
        folder: z.string().default("").describe("Folder path relative to vault root (empty for the whole vault)"),
      },
      async run({ folder }) {
        const searchPath = path.resolve(vaultPath, folder);
        if (!isPathWithinVault(searchPath, vaultPath)) {
          throw new Error(`Path must be within the vault: ${folder}`);
        }
        if (!(await exists(searchPath))) {
          throw new Error(`Folder not found: ${folder}`);
        }

        const notes = await collectNotes(vaultPath, searchPath);
        const infos = await Promise.all(notes.map((note) => skipUnreadable(note, ({ fullPath }) => noteInfo(fullPath))));
        return infos.filter((info) => info !== null);
      },
    }),

    defineTool({
      name: "search_notes",
      description: "Search for notes containing specific text",
      schema: {
        query: z.string().min(1).describe("Text to search for"),
        case_sensitive: z.boolean().default(false).describe("Whether the search is case sensitive"),
      },
      async run({ query, case_sensitive }) {
        const needle = case_sensitive ? query : query.toLowerCase();
        const results: Array<{
          path: string;
          matches: Array<{ line: number; content: string }>;
          match_count: number;
          size: number;
          modified: string;
        }> = [];

        for (const note of await collectNotes(vaultPath, vaultPath)) {
          const found = await skipUnreadable(note, async ({ fullPath }) => {
            const content = await fs.readFile(fullPath, "utf-8");
            const matches = content
              .split("\n")
              .map((line, i) => ({ line: i + 1, text: line }))
              .filter(({ text }) => (case_sensitive ? text : text.toLowerCase()).includes(needle))
              .map(({ line, text }) => ({ line, content: text.slice(0, MAX_MATCH_LINE_LENGTH) }));
            if (matches.length === 0) return null;

            const { size, modified } = await noteInfo(fullPath);
            return { path: note.relativePath, matches, match_count: matches.length, size, modified };
          });
          if (found) results.push(found);
        }

        // collectNotes returns path order, and sort is stable
        return results.sort((a, b) => b.match_count - a.match_count);
      },
    }),

    defineTool({
      name: "delete_note",
      description: "Delete an Obsidian note (renamed to <note>.md.trash when possible, otherwise removed)",
      schema: { note_path: notePath },
      async run({ note_path }) {
        const fullPath = await existingNote(note_path);
        const trashPath = `${fullPath}.trash`;
        try {
          await fs.rename(fullPath, trashPath);
          return { deleted_path: toVaultPath(vaultPath, trashPath), permanent: false };
        } catch (error) {
          console.error(
            `[multi-tool] Could not move ${note_path} to trash, deleting it: ${error instanceof Error ? error.message : String(error)}`,
          );
          await fs.unlink(fullPath);
          return { deleted_path: toVaultPath(vaultPath, fullPath), permanent: true };
        }
      },
    }),

    defineTool({
      name: "get_note_metadata",
      description: "Get metadata for a note (size, dates, word and line counts, frontmatter)",
      schema: { note_path: notePath },
      async run({ note_path }) {
        const fullPath = await existingNote(note_path);
        const content = await fs.readFile(fullPath, "utf-8");
        const { path: relativePath, size, modified, created } = await noteInfo(fullPath);
        const parsed = parseFrontmatter(content);
        return {
          path: relativePath,
          size_bytes: size,
          modified,
          created,
          word_count: content.split(/\s+/).filter((word) => word.length > 0).length,
          line_count: content.split("\n").length,
          has_frontmatter: content.startsWith("---\n"),
          frontmatter: parsed ? parsed.frontmatter : null,
        };
      },
    }),

    defineTool({
      name: "create_note_from_template",
      description:
        "Create a note from a template in the vault's templates folder (OBSIDIAN_TEMPLATES_PATH). " +
        "Replaces {{title}}, {{date}}, {{time}} and {{<variable>}} placeholders.",
      schema: {
        note_path: notePath,
        template: z.string().min(1).describe('Template name relative to the templates folder (e.g., "daily")'),
        variables: z.record(z.string()).optional().describe("Values for custom {{placeholders}}"),
        overwrite: z.boolean().default(false).describe("Whether to overwrite if the note already exists"),
      },
      async run({ note_path, template, variables, overwrite }) {
        const templatesDir = path.resolve(vaultPath, config.templatesPath);
        const templateName = template.endsWith(".md") ? template : `${template}.md`;
        const templatePath = path.resolve(templatesDir, templateName);
        const shownPath = `${config.templatesPath.replace(/\/+$/, "")}/${templateName}`;
        if (!isPathWithinVault(templatePath, vaultPath) || !(await exists(templatePath))) {
          throw new Error(`Template not found: ${shownPath} (check OBSIDIAN_TEMPLATES_PATH)`);
        }

        const source = await fs.readFile(templatePath, "utf-8");
        const title = path.basename(note_path).replace(/\.md$/, "");
        const content = renderTemplate(source, { title, now: now(), variables });
        return { ...(await writeNewNote(note_path, content, overwrite)), template: shownPath };
      },
    }),
  ];
}

export function createObsidianGroup(deps: ObsidianDeps = {}): ToolGroup {
  return defineToolGroup<ObsidianConfig>({
    name: "Obsidian",
    requiredConfigKeys: ["OBSIDIAN_VAULT_PATH"],
    operationNames: OBSIDIAN_TOOL_NAMES,
    probe: probeObsidian,
    createOperations: (config) => createObsidianOperations(config, deps),
  });
}

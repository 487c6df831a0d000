import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ToolRegistry } from '../registry.js';
import type { ToolResult } from '../tool.js';
import { createObsidianGroup } from './obsidian.js';

let vault: string;
let registry: ToolRegistry;

function dataOf(result: ToolResult): unknown {
  if (!result.success) throw new Error(`expected success, got: ${result.error}`);
  return result.data;
}

async function writeVaultFile(relative: string, content: string): Promise<void> {
  const full = path.join(vault, relative);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, content, 'utf-8');
}

function readVaultFile(relative: string): Promise<string> {
  return fs.readFile(path.join(vault, relative), 'utf-8');
}

beforeEach(async () => {
  vault = await fs.mkdtemp(path.join(os.tmpdir(), 'obsidian-vault-'));
  registry = new ToolRegistry([createObsidianGroup({ now: () => new Date(2026, 9, 18, 9, 5) })], () => {});
  registry.build({ OBSIDIAN_VAULT_PATH: vault });
});

afterEach(async () => {
  await fs.rm(vault, { recursive: true, force: true });
});

describe('create_note and read_note', () => {
  it('should round-trip content including frontmatter', async () => {
    const created = await registry.invoke('create_note', {
      note_path: 'inbox/idea',
      content: 'Body text',
      frontmatter: { title: 'Hello', tags: ['a', 'b'] },
    });
    expect(dataOf(created)).toMatchObject({ path: 'inbox/idea.md' });

    const read = await registry.invoke('read_note', { note_path: 'inbox/idea.md' });
    expect(dataOf(read)).toMatchObject({
      path: 'inbox/idea.md',
      content: '---\ntitle: Hello\ntags:\n  - a\n  - b\n---\n\nBody text',
    });
  });

  it('should write plain content when frontmatter is empty', async () => {
    await registry.invoke('create_note', { note_path: 'plain', content: 'Just text', frontmatter: {} });

    expect(await readVaultFile('plain.md')).toBe('Just text');
  });

  it('should refuse to overwrite unless asked', async () => {
    await registry.invoke('create_note', { note_path: 'inbox/idea', content: 'first' });

    await expect(registry.invoke('create_note', { note_path: 'inbox/idea', content: 'second' })).resolves.toEqual({
      success: false,
      error: 'Note already exists: inbox/idea. Use overwrite=true to replace it.',
    });

    const replaced = await registry.invoke('create_note', { note_path: 'inbox/idea', content: 'second', overwrite: true });
    expect(replaced.success).toBe(true);
    expect(await readVaultFile('inbox/idea.md')).toBe('second');
  });

  it('should report a missing note', async () => {
    await expect(registry.invoke('read_note', { note_path: 'nope' })).resolves.toEqual({
      success: false,
      error: 'Note not found: nope',
    });
  });

  it('should keep note paths inside the vault', async () => {
    await expect(registry.invoke('read_note', { note_path: '../outside' })).resolves.toEqual({
      success: false,
      error: 'Path must be within the vault: ../outside',
    });
    await expect(registry.invoke('create_note', { note_path: '/etc/evil', content: 'x' })).resolves.toEqual({
      success: false,
      error: 'Path must be within the vault: /etc/evil',
    });
  });
});

describe('update_note and append_to_note', () => {
  beforeEach(async () => {
    await writeVaultFile('log.md', 'first');
  });

  it('should replace the whole note', async () => {
    const result = await registry.invoke('update_note', { note_path: 'log', content: 'replaced' });

    expect(dataOf(result)).toMatchObject({ path: 'log.md', size: 8 });
    expect(await readVaultFile('log.md')).toBe('replaced');
  });

  it('should not create a note that does not exist', async () => {
    await expect(registry.invoke('update_note', { note_path: 'missing', content: 'x' })).resolves.toEqual({
      success: false,
      error: 'Note not found: missing',
    });
  });

  it('should append on a new line by default', async () => {
    await registry.invoke('append_to_note', { note_path: 'log', content: 'second' });

    expect(await readVaultFile('log.md')).toBe('first\nsecond');
  });

  it('should append directly when add_newline is false', async () => {
    await registry.invoke('append_to_note', { note_path: 'log', content: 'second', add_newline: false });

    expect(await readVaultFile('log.md')).toBe('firstsecond');
  });
});

describe('list_notes', () => {
  it('should return an empty list for an empty vault', async () => {
    await expect(registry.invoke('list_notes', {})).resolves.toEqual({ success: true, data: [] });
  });

  it('should list markdown notes sorted by path, skipping hidden folders', async () => {
    await writeVaultFile('b.md', 'b');
    await writeVaultFile('a/c.md', 'c');
    await writeVaultFile('a/image.png', 'binary');
    await writeVaultFile('.obsidian/workspace.md', 'hidden');

    const notes = dataOf(await registry.invoke('list_notes', {}));
    expect(notes).toEqual([
      expect.objectContaining({ path: 'a/c.md', size: 1 }),
      expect.objectContaining({ path: 'b.md', size: 1 }),
    ]);
  });

  it('should scope the listing to a folder', async () => {
    await writeVaultFile('b.md', 'b');
    await writeVaultFile('a/c.md', 'c');

    const notes = dataOf(await registry.invoke('list_notes', { folder: 'a' }));
    expect(notes).toEqual([expect.objectContaining({ path: 'a/c.md' })]);
  });

  it('should include symlinked notes and skip dangling links', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    await writeVaultFile('real/target.md', 'linked');
    await fs.symlink(path.join(vault, 'real', 'target.md'), path.join(vault, 'linked.md'));
    await fs.symlink(path.join(vault, 'missing-target.md'), path.join(vault, 'dangling.md'));

    const notes = dataOf(await registry.invoke('list_notes', {}));
    expect(notes).toEqual([
      expect.objectContaining({ path: 'linked.md', size: 6 }),
      expect.objectContaining({ path: 'real/target.md', size: 6 }),
    ]);
    expect(logged).toHaveBeenCalledWith(expect.stringMatching(/^\[multi-tool\] Skipping dangling\.md: /));
    logged.mockRestore();
  });

  it('should report a missing folder', async () => {
    await expect(registry.invoke('list_notes', { folder: 'nope' })).resolves.toEqual({
      success: false,
      error: 'Folder not found: nope',
    });
  });
});

describe('search_notes', () => {
  beforeEach(async () => {
    await writeVaultFile('one.md', 'Alpha\nalpha beta\ngamma');
    await writeVaultFile('two.md', 'ALPHA');
    await writeVaultFile('three.md', 'nothing here');
  });

  it('should rank notes by number of matching lines', async () => {
    const results = dataOf(await registry.invoke('search_notes', { query: 'alpha' }));

    expect(results).toEqual([
      expect.objectContaining({
        path: 'one.md',
        matches: [
          { line: 1, content: 'Alpha' },
          { line: 2, content: 'alpha beta' },
        ],
        match_count: 2,
      }),
      expect.objectContaining({ path: 'two.md', matches: [{ line: 1, content: 'ALPHA' }], match_count: 1 }),
    ]);
  });

  it('should honour case sensitivity', async () => {
    const results = dataOf(await registry.invoke('search_notes', { query: 'alpha', case_sensitive: true }));

    expect(results).toEqual([
      expect.objectContaining({ path: 'one.md', matches: [{ line: 2, content: 'alpha beta' }], match_count: 1 }),
    ]);
  });

  it('should skip notes that cannot be read', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    await fs.symlink(path.join(vault, 'missing-target.md'), path.join(vault, 'broken.md'));

    const results = dataOf(await registry.invoke('search_notes', { query: 'ALPHA', case_sensitive: true }));
    expect(results).toEqual([expect.objectContaining({ path: 'two.md', match_count: 1 })]);
    expect(logged).toHaveBeenCalledTimes(1);
    logged.mockRestore();
  });

  it('should truncate long matching lines', async () => {
    await writeVaultFile('long.md', `needle ${'x'.repeat(300)}`);

    const results = dataOf(await registry.invoke('search_notes', { query: 'needle' }));
    expect(results).toEqual([
      expect.objectContaining({ path: 'long.md', matches: [{ line: 1, content: `needle ${'x'.repeat(193)}` }] }),
    ]);
  });
});

describe('delete_note', () => {
  it('should move the note aside as a .trash file', async () => {
    await writeVaultFile('gone.md', 'bye');

    await expect(registry.invoke('delete_note', { note_path: 'gone' })).resolves.toEqual({
      success: true,
      data: { deleted_path: 'gone.md.trash', permanent: false },
    });
    expect(await readVaultFile('gone.md.trash')).toBe('bye');
    await expect(registry.invoke('list_notes', {})).resolves.toEqual({ success: true, data: [] });
  });

  it('should report a missing note', async () => {
    await expect(registry.invoke('delete_note', { note_path: 'gone' })).resolves.toEqual({
      success: false,
      error: 'Note not found: gone',
    });
  });
});

describe('get_note_metadata', () => {
  it('should count words and lines and parse frontmatter', async () => {
    await writeVaultFile('meta.md', '---\ntitle: Hi\n---\n\nhello world foo\nbar');

    const metadata = dataOf(await registry.invoke('get_note_metadata', { note_path: 'meta' }));
    expect(metadata).toMatchObject({
      path: 'meta.md',
      size_bytes: 38,
      word_count: 8,
      line_count: 6,
      has_frontmatter: true,
      frontmatter: { title: 'Hi' },
    });
  });

  it('should report notes without frontmatter', async () => {
    await writeVaultFile('bare.md', 'one two');

    const metadata = dataOf(await registry.invoke('get_note_metadata', { note_path: 'bare.md' }));
    expect(metadata).toMatchObject({ word_count: 2, line_count: 1, has_frontmatter: false, frontmatter: null });
  });
});

describe('create_note_from_template', () => {
  it('should fill built-in and custom placeholders', async () => {
    await writeVaultFile('templates/daily.md', '# {{title}}\nDate: {{date}} {{time}}\nMood: {{ mood }}\n{{unknown}}');

    const result = await registry.invoke('create_note_from_template', {
      note_path: 'journal/2026-10-18',
      template: 'daily',
      variables: { mood: 'good' },
    });

    expect(dataOf(result)).toMatchObject({ path: 'journal/2026-10-18.md', template: 'templates/daily.md' });
    expect(await readVaultFile('journal/2026-10-18.md')).toBe(
      '# 2026-10-18\nDate: 2026-10-18 09:05\nMood: good\n{{unknown}}',
    );
  });

  it('should report a missing template at call time', async () => {
    await expect(
      registry.invoke('create_note_from_template', { note_path: 'x', template: 'weekly' }),
    ).resolves.toEqual({
      success: false,
      error: 'Template not found: templates/weekly.md (check OBSIDIAN_TEMPLATES_PATH)',
    });
  });

  it('should read templates from a custom folder', async () => {
    const custom = new ToolRegistry([createObsidianGroup()], () => {});
    custom.build({ OBSIDIAN_VAULT_PATH: vault, OBSIDIAN_TEMPLATES_PATH: 'Meta/Templates' });
    await writeVaultFile('Meta/Templates/meeting.md', 'Meeting: {{title}}');

    await custom.invoke('create_note_from_template', { note_path: 'standup', template: 'meeting.md' });

    expect(await readVaultFile('standup.md')).toBe('Meeting: standup');
  });

  it('should not overwrite an existing note by default', async () => {
    await writeVaultFile('templates/daily.md', 'new');
    await writeVaultFile('today.md', 'old');

    await expect(
      registry.invoke('create_note_from_template', { note_path: 'today', template: 'daily' }),
    ).resolves.toEqual({
      success: false,
      error: 'Note already exists: today. Use overwrite=true to replace it.',
    });
    expect(await readVaultFile('today.md')).toBe('old');
  });
});

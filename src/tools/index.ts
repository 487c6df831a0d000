import type { FetchLike } from "../http.js";
import type { ToolGroup } from "../tool.js";
import { createNotionGroup } from "./notion.js";
import { createObsidianGroup, type ObsidianDeps } from "./obsidian.js";
import { createTodoistGroup } from "./todoist.js";

export interface ToolGroupDeps extends ObsidianDeps {
  fetch?: FetchLike;
}

/** The fixed set of tool groups, in registration order. */
export function createToolGroups(deps: ToolGroupDeps = {}): ToolGroup[] {
  return [createNotionGroup(deps.fetch), createTodoistGroup(deps.fetch), createObsidianGroup(deps)];
}

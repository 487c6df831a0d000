/** Todoist task and project tools. */
import { z } from "zod";
import { probeTodoist, type TodoistConfig } from "../config.js";
import { ApiClient, buildQs, type FetchLike } from "../http.js";
import { defineTool, defineToolGroup, type Operation, type ToolGroup } from "../tool.js";

export const TODOIST_API_URL = "https://api.todoist.com/rest/v2";

export const TODOIST_TOOL_NAMES = [
  "create_task",
  "get_tasks",
  "complete_task",
  "update_task",
  "delete_task",
  "get_projects",
  "reopen_task",
  "get_task",
] as const;

const DueSchema = z
  .object({
    string: z.string(),
    date: z.string(),
    is_recurring: z.boolean(),
    datetime: z.string().nullable().optional(),
    timezone: z.string().nullable().optional(),
  })
  .passthrough();

const TaskSchema = z.object({
  id: z.string(),
  content: z.string(),
  description: z.string().default(""),
  project_id: z.string().nullable().default(null),
  section_id: z.string().nullable().default(null),
  parent_id: z.string().nullable().default(null),
  order: z.number().default(0),
  labels: z.array(z.string()).default([]),
  priority: z.number().default(1),
  due: DueSchema.nullable().default(null),
  url: z.string().default(""),
  comment_count: z.number().default(0),
  is_completed: z.boolean().default(false),
  created_at: z.string().nullable().default(null),
});

const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  color: z.string().default(""),
  parent_id: z.string().nullable().default(null),
  order: z.number().default(0),
  comment_count: z.number().default(0),
  is_shared: z.boolean().default(false),
  is_favorite: z.boolean().default(false),
  url: z.string().default(""),
  is_inbox_project: z.boolean().default(false),
  is_team_inbox: z.boolean().default(false),
});

type Task = z.infer<typeof TaskSchema>;

function formatTask(task: Task) {
  return {
    id: task.id,
    content: task.content,
    description: task.description,
    project_id: task.project_id,
    section_id: task.section_id,
    parent_id: task.parent_id,
    order: task.order,
    labels: task.labels,
    priority: task.priority,
    due: task.due,
    url: task.url,
    comment_count: task.comment_count,
    completed: task.is_completed,
    created_at: task.created_at,
  };
}

// Drops undefined values so only the fields the caller set reach the API
function compact(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

const priority = z.number().int().min(1).max(4);

const dueFields = {
  due_string: z.string().optional().describe('Human-readable due date (e.g., "tomorrow at 12:00", "every day")'),
  due_date: z.string().optional().describe("Specific due date in YYYY-MM-DD format"),
  due_datetime: z.string().optional().describe("Specific due datetime in RFC3339 format"),
  due_lang: z.string().optional().describe('Language for due_string (e.g., "en", "es")'),
  assignee_id: z.string().optional().describe("Assignee ID (for shared projects)"),
};

const taskId = z.string().min(1).describe("The ID of the task");

export function createTodoistOperations(config: TodoistConfig, fetchImpl?: FetchLike): Operation[] {
  const client = new ApiClient({ baseUrl: TODOIST_API_URL, token: config.token, fetch: fetchImpl });

  return [
    defineTool({
      name: "create_task",
      description: "Create a new task in Todoist",
      schema: {
        content: z.string().min(1).describe("Task content"),
        description: z.string().optional().describe("Task description"),
        project_id: z.string().optional().describe("Project ID (use get_projects to find available projects)"),
        section_id: z.string().optional().describe("Section ID"),
        parent_id: z.string().optional().describe("Parent task ID (for sub-tasks)"),
        order: z.number().int().optional().describe("Task order"),
        labels: z.array(z.string()).optional().describe("Label names"),
        priority: priority.optional().describe("Task priority (1-4, where 4 is highest)"),
        ...dueFields,
      },
      async run(args) {
        return formatTask(TaskSchema.parse(await client.post("/tasks", compact(args))));
      },
    }),

    defineTool({
      name: "get_tasks",
      description: "Get active tasks from Todoist, optionally filtered by project, section, label or a filter query",
      schema: {
        project_id: z.string().optional().describe("Filter by project ID"),
        section_id: z.string().optional().describe("Filter by section ID"),
        label: z.string().optional().describe("Filter by label"),
        filter_query: z.string().optional().describe('Todoist filter syntax (e.g., "today", "p1", "@home")'),
        lang: z.string().optional().describe("Language for filter_query"),
        ids: z.array(z.string()).optional().describe("Specific task IDs to retrieve"),
      },
      async run({ project_id, section_id, label, filter_query, lang, ids }) {
        const qs = buildQs({ project_id, section_id, label, filter: filter_query, lang, ids });
        const tasks = z.array(TaskSchema).parse(await client.get(`/tasks${qs}`));
        return tasks.map(formatTask);
      },
    }),

    defineTool({
      name: "complete_task",
      description: "Mark a task as completed",
      schema: { task_id: taskId },
      async run({ task_id }) {
        await client.post(`/tasks/${encodeURIComponent(task_id)}/close`);
        return { task_id, completed: true };
      },
    }),

    defineTool({
      name: "update_task",
      description: "Update an existing task in Todoist",
      schema: {
        task_id: taskId,
        content: z.string().optional().describe("New task content"),
        description: z.string().optional().describe("New task description"),
        labels: z.array(z.string()).optional().describe("New list of label names"),
        priority: priority.optional().describe("New priority (1-4, where 4 is highest)"),
        ...dueFields,
      },
      async run({ task_id, ...fields }) {
        const task = TaskSchema.parse(await client.post(`/tasks/${encodeURIComponent(task_id)}`, compact(fields)));
        return formatTask(task);
      },
    }),

    defineTool({
      name: "delete_task",
      description: "Delete a task from Todoist",
      schema: { task_id: taskId },
      async run({ task_id }) {
        await client.delete(`/tasks/${encodeURIComponent(task_id)}`);
        return { task_id, deleted: true };
      },
    }),

    defineTool({
      name: "get_projects",
      description: "Get all projects from Todoist",
      schema: {},
      async run() {
        return z.array(ProjectSchema).parse(await client.get("/projects"));
      },
    }),

    defineTool({
      name: "reopen_task",
      description: "Reopen a completed task",
      schema: { task_id: taskId },
      async run({ task_id }) {
        await client.post(`/tasks/${encodeURIComponent(task_id)}/reopen`);
        return { task_id, completed: false };
      },
    }),

    defineTool({
      name: "get_task",
      description: "Get a specific task by ID",
      schema: { task_id: taskId },
      async run({ task_id }) {
        return formatTask(TaskSchema.parse(await client.get(`/tasks/${encodeURIComponent(task_id)}`)));
      },
    }),
  ];
}

export function createTodoistGroup(fetchImpl?: FetchLike): ToolGroup {
  return defineToolGroup<TodoistConfig>({
    name: "Todoist",
    requiredConfigKeys: ["TODOIST_TOKEN"],
    operationNames: TODOIST_TOOL_NAMES,
    probe: probeTodoist,
    createOperations: (config) => createTodoistOperations(config, fetchImpl),
  });
}

/** Notion page and database tools. */
import { z } from "zod";
import { probeNotion, type NotionConfig } from "../config.js";
import { ApiClient, type FetchLike } from "../http.js";
import { defineTool, defineToolGroup, type Operation, type ToolGroup } from "../tool.js";

export const NOTION_API_URL = "https://api.notion.com/v1";
export const NOTION_VERSION = "2022-06-28";

export const NOTION_TOOL_NAMES = [
  "create_database_page",
  "get_database",
  "get_page",
  "update_page",
  "create_page",
  "archive_page",
] as const;

const PageSchema = z
  .object({
    id: z.string(),
    url: z.string(),
    created_time: z.string(),
    last_edited_time: z.string().optional(),
    archived: z.boolean().optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

const QueryResultSchema = z.object({
  results: z.array(PageSchema),
  has_more: z.boolean().optional(),
  next_cursor: z.string().nullable().optional(),
});

const BlockListSchema = z.object({
  results: z.array(z.unknown()),
});

// Minimal shape of a sort object; extra fields are passed to Notion untouched
const SortSchema = z
  .object({
    property: z.string().optional(),
    timestamp: z.enum(["created_time", "last_edited_time"]).optional(),
    direction: z.enum(["ascending", "descending"]),
  })
  .passthrough();

const PropertiesSchema = z.union([z.record(z.unknown()), z.string()]);

/**
 * Accepts either a bare page id or a notion.so URL and returns the id.
 * URLs end in `<slug>-<32 hex id>`; the hex id is extracted when present.
 */
export function extractNotionId(idOrUrl: string): string {
  if (!idOrUrl.includes("notion.so")) return idOrUrl;
  const last = idOrUrl.split("/").pop() ?? idOrUrl;
  const segment = last.split("?")[0].split("#")[0];
  const hex = segment.match(/([0-9a-f]{32})$/i);
  return hex ? hex[1] : segment;
}

export function parseJsonObject(value: string | Record<string, unknown>, message: string): Record<string, unknown> {
  if (typeof value !== "string") return value;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new Error(message);
  }
  const result = z.record(z.unknown()).safeParse(parsed);
  if (!result.success) throw new Error(message);
  return result.data;
}

function titleProperty(title: string) {
  return { title: [{ text: { content: title } }] };
}

export function createNotionOperations(config: NotionConfig, fetchImpl?: FetchLike): Operation[] {
  const client = new ApiClient({
    baseUrl: NOTION_API_URL,
    token: config.token,
    headers: { "Notion-Version": NOTION_VERSION },
    fetch: fetchImpl,
  });

  // Resolved at call time: the default id is optional at registration
  const resolveDatabaseId = (databaseId: string | undefined): string => {
    // An empty or blank id falls back to the configured default
    const id = databaseId?.trim() || config.defaultDatabaseId;
    if (!id) {
      throw new Error("no database_id provided and NOTION_DATABASE_ID environment variable is not set");
    }
    return extractNotionId(id);
  };

  return [
    defineTool({
      name: "create_database_page",
      description: "Create a new page in a Notion database. Uses NOTION_DATABASE_ID when database_id is omitted.",
      schema: {
        title: z.string().describe("The title of the page"),
        database_id: z.string().optional().describe("The ID of the database (defaults to NOTION_DATABASE_ID)"),
        properties: PropertiesSchema.optional().describe(
          "Additional Notion properties to set on the page, as an object or JSON string",
        ),
      },
      async run({ title, database_id, properties }) {
        const parent = { database_id: resolveDatabaseId(database_id) };
        const pageProperties: Record<string, unknown> = { title: titleProperty(title) };
        if (properties !== undefined) {
          Object.assign(pageProperties, parseJsonObject(properties, "properties must be a JSON object"));
        }

        const page = PageSchema.parse(await client.post("/pages", { parent, properties: pageProperties }));
        return { page_id: page.id, url: page.url, created_time: page.created_time };
      },
    }),

    defineTool({
      name: "get_database",
      description: "Query a Notion database and return its pages",
      schema: {
        database_id: z.string().optional().describe("The ID of the database (defaults to NOTION_DATABASE_ID)"),
        filter_json: z.string().optional().describe("JSON string for filtering results (Notion API filter format)"),
        sorts: z
          .array(SortSchema)
          .optional()
          .describe('Sort objects, e.g. [{"property": "Name", "direction": "ascending"}]'),
        start_cursor: z.string().optional().describe("Cursor from a previous call's next_cursor"),
        page_size: z.number().int().min(1).max(100).optional().describe("Max pages to return (Notion default: 100)"),
      },
      async run({ database_id, filter_json, sorts, start_cursor, page_size }) {
        const id = resolveDatabaseId(database_id);
        const body: Record<string, unknown> = {};
        if (filter_json !== undefined) {
          body["filter"] = parseJsonObject(filter_json, "filter_json must be a valid JSON object");
        }
        if (sorts !== undefined) body["sorts"] = sorts;
        if (start_cursor !== undefined) body["start_cursor"] = start_cursor;
        if (page_size !== undefined) body["page_size"] = page_size;

        const response = QueryResultSchema.parse(await client.post(`/databases/${id}/query`, body));
        return {
          pages: response.results.map((page) => ({
            id: page.id,
            url: page.url,
            created_time: page.created_time,
            properties: page.properties ?? {},
          })),
          has_more: response.has_more ?? false,
          next_cursor: response.next_cursor ?? null,
        };
      },
    }),

    defineTool({
      name: "get_page",
      description: "Get a Notion page by ID (or URL) together with its content blocks",
      schema: {
        page_id: z.string().describe("The ID of the page (full URL or just the ID)"),
      },
      async run({ page_id }) {
        const id = extractNotionId(page_id);
        const page = PageSchema.parse(await client.get(`/pages/${id}`));
        const blocks = BlockListSchema.parse(await client.get(`/blocks/${id}/children`));
        return {
          id: page.id,
          url: page.url,
          created_time: page.created_time,
          last_edited_time: page.last_edited_time,
          properties: page.properties ?? {},
          content_blocks: blocks.results,
        };
      },
    }),

    defineTool({
      name: "update_page",
      description: "Update properties of a Notion page",
      schema: {
        page_id: z.string().describe("The ID of the page to update"),
        properties: PropertiesSchema.describe("Properties to update, as an object or JSON string"),
      },
      async run({ page_id, properties }) {
        const id = extractNotionId(page_id);
        const page = PageSchema.parse(
          await client.patch(`/pages/${id}`, {
            properties: parseJsonObject(properties, "properties must be a JSON object"),
          }),
        );
        return { page_id: page.id, url: page.url, last_edited_time: page.last_edited_time };
      },
    }),

    defineTool({
      name: "create_page",
      description: "Create a standalone Notion page (not in a database)",
      schema: {
        title: z.string().describe("The title of the page"),
        parent_page_id: z.string().optional().describe("Parent page ID (workspace root when omitted)"),
        content: z.string().optional().describe("Text added to the page as a paragraph"),
      },
      async run({ title, parent_page_id, content }) {
        const body: Record<string, unknown> = {
          parent: parent_page_id
            ? { page_id: extractNotionId(parent_page_id) }
            : { type: "workspace", workspace: true },
          properties: { title: titleProperty(title) },
        };
        if (content) {
          body["children"] = [
            {
              object: "block",
              type: "paragraph",
              paragraph: { rich_text: [{ type: "text", text: { content } }] },
            },
          ];
        }

        const page = PageSchema.parse(await client.post("/pages", body));
        return { page_id: page.id, url: page.url, created_time: page.created_time };
      },
    }),

    defineTool({
      name: "archive_page",
      description: "Archive (delete) a Notion page",
      schema: {
        page_id: z.string().describe("The ID of the page to archive"),
      },
      async run({ page_id }) {
        const page = PageSchema.parse(await client.patch(`/pages/${extractNotionId(page_id)}`, { archived: true }));
        return { page_id: page.id, archived: page.archived ?? true };
      },
    }),
  ];
}

export function createNotionGroup(fetchImpl?: FetchLike): ToolGroup {
  return defineToolGroup<NotionConfig>({
    name: "Notion",
    requiredConfigKeys: ["NOTION_TOKEN"],
    operationNames: NOTION_TOOL_NAMES,
    probe: probeNotion,
    createOperations: (config) => createNotionOperations(config, fetchImpl),
  });
}

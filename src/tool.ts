import { z } from "zod";

/**
 * Normalized envelope returned by every tool invocation.
 * Exactly one of `data` / `error` is present, matching `success`.
 */
export type ToolResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: string };

export function success<T>(data: T): ToolResult<T> {
  return { success: true, data };
}

export function failure(error: string): ToolResult<never> {
  return { success: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

// A bound, name-addressable operation. `invoke` validates its arguments.
export interface Operation {
  readonly name: string;
  readonly description: string;
  readonly schema: z.ZodRawShape;
  invoke(args: unknown): Promise<unknown>;
}

export type ToolArgs<S extends z.ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, "strip">;

export interface ToolDefinition<S extends z.ZodRawShape> {
  name: string;
  description: string;
  schema: S;
  run(args: ToolArgs<S>): Promise<unknown>;
}

export class InvalidArgumentsError extends Error {
  constructor(toolName: string, cause: z.ZodError) {
    super(`Invalid arguments for ${toolName}: ${errorMessage(cause)}`);
    this.name = "InvalidArgumentsError";
  }
}

export function defineTool<S extends z.ZodRawShape>(definition: ToolDefinition<S>): Operation {
  const parser = z.object(definition.schema);
  return {
    name: definition.name,
    description: definition.description,
    schema: definition.schema,
    async invoke(args: unknown) {
      const parsed = parser.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidArgumentsError(definition.name, parsed.error);
      }
      return definition.run(parsed.data);
    },
  };
}

export type ConfigProbeResult<C> =
  | { ok: true; config: C }
  | { ok: false; reason: string };

export type Env = Record<string, string | undefined>;

export type RegistrationOutcome =
  | { status: "loaded"; operations: Operation[] }
  | { status: "skipped"; reason: string };

export interface ToolGroup {
  readonly name: string;
  readonly requiredConfigKeys: readonly string[];
  readonly operationNames: readonly string[];
  register(env: Env): RegistrationOutcome;
}

export interface ToolGroupDefinition<C> {
  name: string;
  requiredConfigKeys: readonly string[];
  operationNames: readonly string[];
  probe(env: Env): ConfigProbeResult<C>;
  createOperations(config: C): Operation[];
}

/**
 * Wraps a group's probe and operation factory into a registration routine.
 * Operations are built only after a successful probe, closing over the
 * resolved config, and must match the declared `operationNames`.
 */
export function defineToolGroup<C>(definition: ToolGroupDefinition<C>): ToolGroup {
  return {
    name: definition.name,
    requiredConfigKeys: definition.requiredConfigKeys,
    operationNames: definition.operationNames,
    register(env: Env): RegistrationOutcome {
      const probed = definition.probe(env);
      if (!probed.ok) {
        return { status: "skipped", reason: probed.reason };
      }

      const operations = definition.createOperations(probed.config);
      const built = operations.map((op) => op.name);
      const declared = [...definition.operationNames];
      if (built.length !== declared.length || built.some((name, i) => name !== declared[i])) {
        throw new Error(
          `${definition.name} operations [${built.join(", ")}] do not match declared [${declared.join(", ")}]`,
        );
      }
      return { status: "loaded", operations };
    },
  };
}

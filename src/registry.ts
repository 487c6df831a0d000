import { errorMessage, failure, success, type Env, type Operation, type ToolGroup, type ToolResult } from "./tool.js";

export interface RegistrationReport {
  loaded: string[];
  skipped: Record<string, string>;
  totalOperationCount: number;
}

export type LogSink = (line: string) => void;

// "a, b or c" from each group's first required key
function noToolsWarning(groups: readonly ToolGroup[]): string {
  const keys = groups.flatMap((group) => group.requiredConfigKeys.slice(0, 1));
  if (keys.length === 0) {
    return "⚠ Warning: No tools loaded.";
  }
  const listed = keys.length === 1 ? keys[0] : `${keys.slice(0, -1).join(", ")} or ${keys[keys.length - 1]}`;
  return `⚠ Warning: No tools loaded. Set ${listed} to enable tools.`;
}

/**
 * Registers tool groups in a fixed order and dispatches invocations by name.
 *
 * A group that fails its config probe, or throws while registering, is
 * recorded as skipped; it never stops the remaining groups from loading.
 * `invoke` always resolves to a ToolResult.
 */
export class ToolRegistry {
  private readonly operations = new Map<string, Operation>();
  private readonly owners = new Map<string, string>();
  private built: RegistrationReport | null = null;

  constructor(
    private readonly groups: readonly ToolGroup[],
    private readonly log: LogSink = (line) => console.error(line),
  ) {
    for (const group of groups) {
      for (const name of group.operationNames) {
        this.owners.set(name, group.name);
      }
    }
  }

  build(env: Env): RegistrationReport {
    if (this.built) return this.built;

    const report: RegistrationReport = { loaded: [], skipped: {}, totalOperationCount: 0 };

    for (const group of this.groups) {
      let reason: string;
      try {
        const outcome = group.register(env);
        if (outcome.status === "loaded") {
          for (const op of outcome.operations) {
            this.operations.set(op.name, op);
          }
          report.loaded.push(group.name);
          report.totalOperationCount += outcome.operations.length;
          this.log(`✓ ${group.name} tools: LOADED (${outcome.operations.length} tools)`);
          continue;
        }
        reason = outcome.reason;
      } catch (error) {
        reason = errorMessage(error);
      }
      report.skipped[group.name] = reason;
      this.log(`⚠ ${group.name} tools not registered: ${reason}`);
    }

    this.log(
      report.loaded.length > 0
        ? `✓ Server ready with tools: ${report.loaded.join(", ")}`
        : noToolsWarning(this.groups),
    );

    this.built = report;
    return report;
  }

  get report(): RegistrationReport {
    if (!this.built) {
      throw new Error("ToolRegistry.build() has not been called");
    }
    return this.built;
  }

  /** Operations of every loaded group, in registration order. */
  list(): Operation[] {
    return [...this.operations.values()];
  }

  /** Operation names of every skipped group, keyed by group name. */
  unavailable(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const group of this.groups) {
      if (this.built && group.name in this.built.skipped) {
        result[group.name] = [...group.operationNames];
      }
    }
    return result;
  }

  async invoke(name: string, args: unknown): Promise<ToolResult> {
    const op = this.operations.get(name);
    if (!op) {
      const owner = this.owners.get(name);
      if (owner === undefined) {
        return failure(`Unknown tool: ${name}`);
      }
      const reason = this.built?.skipped[owner];
      return failure(
        `${name} is not available: ${owner} tools are not loaded (${reason ?? "registration has not run"})`,
      );
    }

    try {
      return success(await op.invoke(args));
    } catch (error) {
      return failure(errorMessage(error));
    }
  }
}

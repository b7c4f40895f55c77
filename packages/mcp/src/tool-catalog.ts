import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BaseDriveTool } from './tools/base-drive-tool.js';

/**
 * Immutable set of tools, looked up by exact name.
 */
export class ToolCatalog {
  private readonly tools: ReadonlyMap<string, BaseDriveTool>;

  public constructor(tools: readonly BaseDriveTool[]) {
    const byName = new Map<string, BaseDriveTool>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      byName.set(tool.name, tool);
    }
    this.tools = byName;
  }

  public get(name: string): BaseDriveTool | undefined {
    return this.tools.get(name);
  }

  public names(): string[] {
    return [...this.tools.keys()];
  }

  public list(): BaseDriveTool[] {
    return [...this.tools.values()];
  }

  public describe(): Tool[] {
    return this.list().map((tool) => tool.tool);
  }
}

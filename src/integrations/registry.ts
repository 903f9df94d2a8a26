/**
 * ToolRegistry -- name → integration map, filled once at startup.
 */

import { getLogger } from "../util/logger.js";
import { editorIntegration, terminalIntegration } from "./launchers.js";
import type { ToolIntegration } from "./types.js";

const log = getLogger("tool-registry");

export class ToolRegistry {
  private tools = new Map<string, ToolIntegration>();

  register(tool: ToolIntegration): void {
    if (this.tools.has(tool.name)) log.warn({ tool: tool.name }, "replacing registered tool");
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolIntegration | undefined {
    return this.tools.get(name);
  }

  /** Every registered tool, in registration order. */
  list(): ToolIntegration[] {
    return [...this.tools.values()];
  }

  available(): ToolIntegration[] {
    return this.list().filter((t) => t.isAvailable());
  }

  /** First available tool in registration order. */
  defaultTool(): ToolIntegration | undefined {
    return this.list().find((t) => t.isAvailable());
  }

  /** Launch through the named tool. False for unknown or unavailable tools. */
  async launch(name: string, path: string): Promise<boolean> {
    const tool = this.tools.get(name);
    if (!tool) {
      log.warn({ tool: name }, "unknown tool");
      return false;
    }
    if (!tool.isAvailable()) {
      log.warn({ tool: name }, "tool not available");
      return false;
    }
    return tool.launch(path);
  }
}

export function createDefaultToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(editorIntegration({ name: "cursor", displayName: "Cursor", icon: "⚡", command: "cursor", macApp: "Cursor" }));
  registry.register(
    editorIntegration({ name: "code", displayName: "VS Code", icon: "💙", command: "code", macApp: "Visual Studio Code" }),
  );
  registry.register(
    editorIntegration({
      name: "code-insiders",
      displayName: "VS Code Insiders",
      icon: "💚",
      command: "code-insiders",
      macApp: "Visual Studio Code - Insiders",
    }),
  );
  registry.register(terminalIntegration());
  return registry;
}

/**
 * Registry of the tools docs-bridge serves.
 *
 * Both surfaces read from the same catalog: the REST routes and the MCP
 * endpoint list {@link ToolCatalog.list} and dispatch through the entry
 * returned by {@link ToolCatalog.get}. Order of registration is the order
 * clients see.
 */

import type { ToolDeclaration } from '../types/tool.js';
import type { ToolRequest } from '../types/protocol.js';
import { createLogger, type Logger } from './logger.js';

/** Runs a tool whose arguments already passed schema validation. */
export type ToolHandler = (request: ToolRequest) => Promise<Record<string, unknown>>;

export interface RegisteredTool {
  readonly tool: ToolDeclaration;
  readonly handler: ToolHandler;
}

export class ToolCatalog {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('tool-catalog');
  }

  /** @throws If `tool.name` is taken. */
  register(tool: ToolDeclaration, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: "${tool.name}"`);
    }
    this.tools.set(tool.name, { tool, handler });
    this.logger.debug('tool registered', { tool: tool.name });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  list(): ToolDeclaration[] {
    return Array.from(this.tools.values(), (entry) => entry.tool);
  }
}

import type { Tool, ToolContext, ToolDefinition, ToolResult } from './types.js';
import { getLogger } from '../core/logger.js';
import { ToolExecutionError } from '../core/errors.js';
import { ReadFileTool } from './builtin/read-file.js';
import { WriteFileTool } from './builtin/write-file.js';
import { RunShellTool } from './builtin/run-shell.js';
import { SearchCodebaseTool } from './builtin/search-codebase.js';
import { TakeScreenshotTool, type ScreenCapture } from './builtin/take-screenshot.js';
import { createDelegationTools, type Delegator } from './builtin/delegate.js';

export interface DefaultToolOptions {
  /** Registers take_screenshot when given */
  capture?: ScreenCapture;
  /** Registers delegate_to_* when given */
  delegator?: Delegator;
  shellTimeoutMs?: number;
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();
  private logger = getLogger();

  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolExecutionError(
        `Tool "${name}" not found. Available: ${this.list().map(t => t.name).join(', ')}`,
        name,
      );
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  definitions(): ToolDefinition[] {
    return this.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  /**
   * Run a tool by name. Failures, thrown errors and unknown tools all come
   * back as an unsuccessful result.
   */
  async execute(name: string, args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    this.logger.debug({ tool: name, args: Object.keys(args) }, 'Executing tool');

    try {
      const result = await this.get(name).execute(args, context);
      this.logger.debug({ tool: name, success: result.success }, 'Tool result');
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ tool: name, error: message }, 'Tool execution failed');
      return {
        success: false,
        output: '',
        error: err instanceof ToolExecutionError ? message : `Tool "${name}" failed: ${message}`,
      };
    }
  }

  static createDefault(options: DefaultToolOptions = {}): ToolRegistry {
    const registry = new ToolRegistry();
    registry.register(new ReadFileTool());
    registry.register(new WriteFileTool());
    registry.register(new RunShellTool(options.shellTimeoutMs));
    registry.register(new SearchCodebaseTool());
    if (options.capture) {
      registry.register(new TakeScreenshotTool(options.capture));
    }
    if (options.delegator) {
      for (const tool of createDelegationTools(options.delegator)) {
        registry.register(tool);
      }
    }
    return registry;
  }
}

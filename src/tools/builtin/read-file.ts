import { readFileSync } from 'fs';
import { optionalNumber, requireString } from '../args.js';
import { resolveInside } from '../paths.js';
import type { Tool, ToolParameters, ToolContext, ToolResult } from '../types.js';

export class ReadFileTool implements Tool {
  name = 'read_file';
  description = 'Read a file inside the working directory. Returns the content with line numbers.';
  parameters: ToolParameters = {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Path to the file, relative to the working directory' },
      offset: { type: 'number', description: 'Line number to start reading from (1-based)' },
      limit: { type: 'number', description: 'Maximum number of lines to read' },
    },
    required: ['path'],
  };

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const filePath = resolveInside(context.workingDir, requireString(args, 'path', this.name), this.name);
    const offset = optionalNumber(args, 'offset') ?? 1;
    const limit = optionalNumber(args, 'limit') ?? 2000;

    try {
      const lines = readFileSync(filePath, 'utf-8').split('\n');
      const startLine = Math.max(0, offset - 1);
      const endLine = Math.min(lines.length, startLine + limit);

      const numbered = lines
        .slice(startLine, endLine)
        .map((line, i) => `${String(startLine + i + 1).padStart(5)} | ${line}`)
        .join('\n');

      return {
        success: true,
        output: numbered,
        metadata: { lineCount: lines.length, path: filePath },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, output: '', error: `Failed to read file: ${message}` };
    }
  }
}

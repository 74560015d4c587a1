import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { requireString } from '../args.js';
import { resolveInside } from '../paths.js';
import type { Tool, ToolParameters, ToolContext, ToolResult } from '../types.js';

export class WriteFileTool implements Tool {
  name = 'write_file';
  description = 'Create or overwrite a file inside the working directory. Parent directories are created.';
  parameters: ToolParameters = {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Path to the file, relative to the working directory' },
      content: { type: 'string', description: 'Full content to write' },
    },
    required: ['path', 'content'],
  };

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const filePath = resolveInside(context.workingDir, requireString(args, 'path', this.name), this.name);
    const content = typeof args.content === 'string' ? args.content : '';

    try {
      const existed = existsSync(filePath);
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, content, 'utf-8');

      const lines = content.split('\n').length;
      return {
        success: true,
        output: `${existed ? 'Updated' : 'Created'} ${filePath} (${lines} lines)`,
        metadata: { path: filePath, action: existed ? 'modified' : 'created', lines },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, output: '', error: `Failed to write file: ${message}` };
    }
  }
}

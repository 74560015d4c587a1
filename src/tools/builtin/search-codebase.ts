import { readFileSync } from 'fs';
import { join } from 'path';
import { glob } from 'glob';
import { optionalNumber, optionalString } from '../args.js';
import { filterInside, requireContainedPattern, resolveInside } from '../paths.js';
import type { Tool, ToolParameters, ToolContext, ToolResult } from '../types.js';

const IGNORE = ['node_modules/**', '.git/**', 'dist/**', 'coverage/**', '.cycleforge/**'];
const MAX_LINE_LENGTH = 200;

export class SearchCodebaseTool implements Tool {
  name = 'search_codebase';
  description =
    'Find files by glob pattern and, when a query is given, the lines containing it (case-insensitive).';
  parameters: ToolParameters = {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Text to look for inside files' },
      pattern: { type: 'string', description: 'Glob pattern of files to consider (e.g. "src/**/*.ts")', default: '**/*' },
      path: { type: 'string', description: 'Directory to search in, relative to the working directory' },
      maxResults: { type: 'number', description: 'Maximum number of results to return', default: 50 },
    },
    required: [],
  };

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const query = optionalString(args, 'query');
    const pattern = requireContainedPattern(optionalString(args, 'pattern') ?? '**/*', this.name);
    const cwd = resolveInside(context.workingDir, optionalString(args, 'path') ?? '.', this.name);
    const maxResults = optionalNumber(args, 'maxResults') ?? 50;

    try {
      const found = await glob(pattern, { cwd, ignore: IGNORE, nodir: true, maxDepth: 15 });
      const files = filterInside(context.workingDir, cwd, found).sort();

      if (!query) {
        const limited = files.slice(0, maxResults);
        const output = limited.length > 0 ? limited.join('\n') : 'No files found matching the pattern.';
        return {
          success: true,
          output: files.length > maxResults ? `${output}\n\n... and ${files.length - maxResults} more files` : output,
          metadata: { totalMatches: files.length, returned: limited.length },
        };
      }

      const needle = query.toLowerCase();
      const matches: string[] = [];
      let total = 0;

      for (const file of files) {
        let content: string;
        try {
          content = readFileSync(join(cwd, file), 'utf-8');
        } catch {
          // unreadable entries (sockets, permission errors) are not matches
          continue;
        }
        const lines = content.split('\n');
        lines.forEach((line, index) => {
          if (!line.toLowerCase().includes(needle)) return;
          total++;
          if (matches.length < maxResults) {
            matches.push(`${file}:${index + 1}: ${line.trim().substring(0, MAX_LINE_LENGTH)}`);
          }
        });
      }

      const output = matches.length > 0 ? matches.join('\n') : `No matches for "${query}".`;
      return {
        success: true,
        output: total > maxResults ? `${output}\n\n... and ${total - maxResults} more matches` : output,
        metadata: { totalMatches: total, returned: matches.length, filesSearched: files.length },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, output: '', error: `Search failed: ${message}` };
    }
  }
}

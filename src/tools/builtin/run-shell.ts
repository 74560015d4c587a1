import { execSync } from 'child_process';
import { optionalNumber, requireString } from '../args.js';
import type { Tool, ToolParameters, ToolContext, ToolResult } from '../types.js';

const BLOCKED_PATTERNS = ['rm -rf /', 'rm -rf ~', 'mkfs', 'dd if=', ':(){', 'chmod -R 777 /', 'sudo ', 'shutdown', 'reboot'];

const MAX_OUTPUT = 10000;
const MAX_ERROR_OUTPUT = 5000;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max)}\n\n[... output truncated at ${max} chars ...]` : text;
}

function field(err: unknown, key: 'stdout' | 'stderr'): string {
  if (typeof err !== 'object' || err === null || !(key in err)) return '';
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : '';
}

function exitStatus(err: unknown): number {
  if (typeof err !== 'object' || err === null || !('status' in err)) return 1;
  const value: unknown = Reflect.get(err, 'status');
  return typeof value === 'number' ? value : 1;
}

export class RunShellTool implements Tool {
  name = 'run_shell';
  description = 'Run a shell command in the working directory and return its output.';
  parameters: ToolParameters = {
    type: 'object',
    properties: {
      command: { type: 'string', description: 'The shell command to run' },
      timeout: { type: 'number', description: 'Timeout in milliseconds', default: 30000 },
    },
    required: ['command'],
  };

  constructor(private readonly defaultTimeoutMs = 30000) {}

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const command = requireString(args, 'command', this.name);
    const timeout = optionalNumber(args, 'timeout') ?? this.defaultTimeoutMs;

    const blocked = BLOCKED_PATTERNS.find(pattern => command.includes(pattern));
    if (blocked) {
      return { success: false, output: '', error: `Blocked dangerous command: "${blocked.trim()}"` };
    }

    try {
      const output = execSync(command, {
        cwd: context.workingDir,
        encoding: 'utf-8',
        timeout,
        stdio: ['pipe', 'pipe', 'pipe'],
        maxBuffer: 10 * 1024 * 1024,
      });

      return {
        success: true,
        output: truncate(output, MAX_OUTPUT).trim(),
        metadata: { command, fullLength: output.length },
      };
    } catch (err) {
      const output = field(err, 'stdout') + field(err, 'stderr');
      const message = err instanceof Error ? err.message : String(err);
      return {
        success: false,
        output: truncate(output, MAX_ERROR_OUTPUT).trim(),
        error: `Command exited with code ${exitStatus(err)}: ${message.substring(0, 200)}`,
      };
    }
  }
}

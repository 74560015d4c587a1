import type { TaskContext, TaskResult } from '../../agents/types.js';
import type { AgentRole } from '../../models/types.js';
import { ROLE_TABLE } from '../../agents/roles.js';
import { optionalString, requireString } from '../args.js';
import type { Tool, ToolParameters, ToolContext, ToolResult } from '../types.js';

/** Something that can hand a task to a specialist, normally the CycleAgentManager */
export interface Delegator {
  delegate(role: AgentRole, task: string, context?: Partial<TaskContext>): Promise<TaskResult>;
}

export const DELEGATE_ROLES: readonly AgentRole[] = ['coder', 'researcher', 'vision'];

export class DelegateTool implements Tool {
  readonly name: string;
  readonly description: string;
  parameters: ToolParameters = {
    type: 'object',
    properties: {
      task: { type: 'string', description: 'What the specialist should do' },
      context: { type: 'string', description: 'Extra information the specialist needs' },
    },
    required: ['task'],
  };

  constructor(
    private readonly role: AgentRole,
    private readonly delegator: Delegator,
  ) {
    this.name = `delegate_to_${role}`;
    this.description = `Hand a subtask to the ${ROLE_TABLE[role].displayName} (${ROLE_TABLE[role].description.toLowerCase()}).`;
  }

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const task = requireString(args, 'task', this.name);
    const extra = optionalString(args, 'context');

    const result = await this.delegator.delegate(this.role, task, {
      workingDirectory: context.workingDir,
      previousResults: extra ? [extra] : [],
    });

    return {
      success: true,
      output: result.output,
      metadata: {
        role: result.role,
        executionTime: result.executionTime,
        tokensUsed: result.tokensUsed,
      },
    };
  }
}

export function createDelegationTools(delegator: Delegator): DelegateTool[] {
  return DELEGATE_ROLES.map(role => new DelegateTool(role, delegator));
}

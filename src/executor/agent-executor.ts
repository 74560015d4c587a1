/**
 * AgentExecutor: autonomous single-agent loop ("infinite mode").
 *
 * Each iteration asks the ReasoningModel for one action and records the
 * outcome as an AgentStep. The step log is append-only; `stop()` is
 * cooperative and observed at the next iteration boundary.
 */

import { AgentStateError, IterationBudgetExceededError, toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import { retry } from '../utils/retry.js';
import { buildAgentPrompt, buildAgentSystemPrompt } from './prompt-builder.js';
import { AgentSteps, STOPPED_TEXT } from './steps.js';
import type {
  AgentOutcome,
  AgentStep,
  ExecutorState,
  FileContextProvider,
  ReasoningAction,
  ReasoningModel,
} from './types.js';

export interface AgentExecutorOptions {
  reasoner: ReasoningModel;
  tools: ToolRegistry;
  events?: EventBus;
  fileContext?: FileContextProvider;
  /** Upper bound on reasoning calls per run */
  maxLoops?: number;
  /** Retries of a failed reasoning call */
  retryLimit?: number;
  retryBaseDelayMs?: number;
}

type Finish = Pick<AgentOutcome, 'status' | 'summary'>;

export class AgentExecutor {
  private logger = getLogger();
  private reasoner: ReasoningModel;
  private tools: ToolRegistry;
  private events?: EventBus;
  private fileContext?: FileContextProvider;
  private maxLoops: number;
  private retryLimit: number;
  private retryBaseDelayMs: number;

  private stepLog: AgentStep[] = [];
  private running = false;
  private stopRequested = false;
  private currentState: ExecutorState = 'idle';
  private loops = 0;
  private task = '';
  private workingDirectory?: string;
  private pendingInput: { question: string; resolve: (answer: string | null) => void } | null = null;

  constructor(options: AgentExecutorOptions) {
    this.reasoner = options.reasoner;
    this.tools = options.tools;
    this.events = options.events;
    this.fileContext = options.fileContext;
    this.maxLoops = options.maxLoops ?? 50;
    this.retryLimit = options.retryLimit ?? 1;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  get steps(): readonly AgentStep[] {
    return this.stepLog;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get state(): ExecutorState {
    return this.currentState;
  }

  get waitingForUser(): boolean {
    return this.pendingInput !== null;
  }

  /** The question the agent is waiting on, if any */
  get pendingQuestion(): string | null {
    return this.pendingInput?.question ?? null;
  }

  get loopCount(): number {
    return this.loops;
  }

  /**
   * Start a run. The returned promise settles when the run ends and never
   * rejects.
   */
  start(task: string, workingDirectory?: string): Promise<AgentOutcome> {
    if (this.running) {
      throw new AgentStateError('Agent is already running');
    }

    this.running = true;
    this.stopRequested = false;
    this.stepLog = [];
    this.loops = 0;
    this.task = task;
    this.workingDirectory = workingDirectory;
    this.pendingInput = null;

    this.logger.info({ task, workingDirectory, maxLoops: this.maxLoops }, 'Agent run started');
    return this.runLoop();
  }

  stop(): void {
    if (!this.running) return;
    this.stopRequested = true;
    this.logger.info('Agent stop requested');

    const pending = this.pendingInput;
    if (pending) {
      this.pendingInput = null;
      pending.resolve(null);
    }
  }

  provideUserInput(text: string): void {
    const pending = this.pendingInput;
    if (!pending) {
      throw new AgentStateError('Agent is not waiting for user input');
    }
    this.pendingInput = null;
    this.append(AgentSteps.answer(text));
    pending.resolve(text);
  }

  private async runLoop(): Promise<AgentOutcome> {
    let finish: Finish;
    try {
      this.append(AgentSteps.system(`Starting task: ${this.task}`));
      finish = await this.iterate();
    } catch (err) {
      const message = toError(err).message;
      this.logger.error({ error: message }, 'Agent loop crashed');
      this.append(AgentSteps.error(message));
      finish = { status: 'error', summary: message };
    } finally {
      this.running = false;
      this.pendingInput = null;
    }

    this.setState(finish.status === 'complete' ? 'complete' : finish.status === 'stopped' ? 'stopped' : 'error');
    this.logger.info({ status: finish.status, loops: this.loops, steps: this.stepLog.length }, 'Agent run finished');
    return { ...finish, steps: this.stepLog, loops: this.loops };
  }

  private async iterate(): Promise<Finish> {
    for (;;) {
      if (this.stopRequested) return this.stopped();

      if (this.loops >= this.maxLoops) {
        const error = new IterationBudgetExceededError(this.maxLoops);
        this.append(AgentSteps.error(error.message));
        return { status: 'error', summary: error.message };
      }
      this.loops++;
      this.setState('thinking');

      let action: ReasoningAction;
      try {
        action = await this.reason();
      } catch (err) {
        if (this.stopRequested) return this.stopped();
        const message = `Reasoning failed: ${toError(err).message}`;
        this.append(AgentSteps.error(message));
        return { status: 'error', summary: message };
      }

      if (this.stopRequested) return this.stopped();

      const finish = await this.apply(action);
      if (finish) return finish;
    }
  }

  private async apply(action: ReasoningAction): Promise<Finish | null> {
    switch (action.type) {
      case 'think':
        this.append(AgentSteps.thinking(action.thought));
        return null;

      case 'tool': {
        if (action.thought) this.append(AgentSteps.thinking(action.thought));
        this.setState('tool');
        const result = await this.tools.execute(action.tool, action.args, {
          workingDir: this.workingDirectory ?? process.cwd(),
          executionId: `agent-${this.loops}`,
        });
        this.setState('observing');
        const output = result.success ? result.output : [result.error, result.output].filter(Boolean).join('\n');
        this.append(AgentSteps.tool(action.tool, action.args, output, result.success));
        return null;
      }

      case 'askUser': {
        // Pending before the question step goes out, so step listeners can answer it
        const answered = new Promise<string | null>(resolve => {
          this.pendingInput = { question: action.question, resolve };
        });
        this.append(AgentSteps.question(action.question));
        if (this.pendingInput) this.setState('waitingForUser');
        await answered;
        return null;
      }

      case 'complete':
        this.append(AgentSteps.complete(action.summary));
        return { status: 'complete', summary: action.summary };
    }
  }

  private async reason(): Promise<ReasoningAction> {
    const fileContext = this.fileContext
      ? await this.fileContext.getContext(this.task, this.workingDirectory)
      : undefined;
    const definitions = this.tools.definitions();

    return retry(
      () =>
        this.reasoner.next({
          systemPrompt: buildAgentSystemPrompt(definitions),
          prompt: buildAgentPrompt({
            task: this.task,
            steps: this.stepLog,
            fileContext,
            workingDirectory: this.workingDirectory,
          }),
          tools: definitions,
        }),
      {
        maxRetries: this.retryLimit,
        baseDelay: this.retryBaseDelayMs,
        jitter: this.retryBaseDelayMs,
        shouldRetry: () => !this.stopRequested,
        onRetry: (attempt, error) => {
          this.logger.warn({ attempt, error: error.message }, 'Retrying reasoning call');
        },
      },
    );
  }

  private stopped(): Finish {
    this.append(AgentSteps.system(STOPPED_TEXT));
    return { status: 'stopped', summary: STOPPED_TEXT };
  }

  private append(step: AgentStep): void {
    this.stepLog.push(step);
    this.events?.emit('agent:step', { step });
  }

  private setState(state: ExecutorState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.events?.emit('agent:state', { state });
  }
}

/**
 * CycleAgentManager: runs a task across the specialist models that fit
 * in memory.
 *
 * Owns the immutable agent pool built from the fitted configuration,
 * picks Auto or Pipeline execution, keeps one model warm at a time and
 * accounts for every switch. Progress is kept as pollable state and
 * emitted on the event bus.
 */

import { ConfigurationError, TaskExecutionError, toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { AsyncMutex } from '../core/mutex.js';
import type { PresetType } from '../core/types.js';
import type { ModelTierManager } from '../models/tier-manager.js';
import type { AgentRole, ConfigurationAnalysis, CustomConfiguration, MemorySettings } from '../models/types.js';
import { getVariant } from '../models/catalog.js';
import { getPreset, phaseBudget, type BudgetedPhase, type QualityPreset } from '../policy/quality-presets.js';
import type { InvocationContext, InvocationResult, ModelInvoker } from '../providers/types.js';
import { retry } from '../utils/retry.js';
import { stopwatch } from '../utils/timer.js';
import { KeywordCapabilityClassifier, type CapabilityClassifier } from './capability-classifier.js';
import { ROLE_TABLE } from './roles.js';
import type {
  AgentDefinition,
  ExecutionStrategy,
  OrchestrationState,
  OrchestrationStatistics,
  RunOptions,
  TaskContext,
  TaskResult,
  VerificationReport,
  VerificationVerdict,
} from './types.js';
import { WarmSlot } from './warm-slot.js';

export interface CycleAgentManagerOptions {
  tierManager: ModelTierManager;
  invoker: ModelInvoker;
  classifier?: CapabilityClassifier;
  events?: EventBus;
  /** Defaults to the tier manager's active configuration */
  configuration?: CustomConfiguration;
  preset?: PresetType;
  retryBaseDelayMs?: number;
  /** Millisecond clock for step timing */
  now?: () => number;
}

const MAX_JUDGES = 2;
const REVISE_PATTERN = /^\s*REVISE\s*:\s*([\s\S]*)$/im;

export function buildStepInput(task: string, prior?: string): string {
  return prior === undefined ? task : `${task}\n\nPrevious result:\n${prior}`;
}

function planPrompt(task: string, agents: readonly AgentDefinition[]): string {
  const roles = agents.map(a => a.role).join(', ');
  return `Create a short numbered plan (at most 5 steps) for the task below.
For each step name the specialist that should do it (${roles}).

TASK: ${task}`;
}

function reviewPrompt(task: string, output: string): string {
  return `Review the result below against the task.
Answer "APPROVE" if it fully solves the task, otherwise "REVISE: <what must change>".

TASK: ${task}

RESULT:
${output}`;
}

function revisionInput(input: string, feedback: string): string {
  return `${input}\n\nReviewer feedback:\n${feedback}`;
}

/**
 * A reply containing a line that starts with `REVISE:` rejects the output;
 * anything else approves it.
 */
export function parseVerdict(reviewer: AgentRole, reply: string): VerificationVerdict {
  const match = REVISE_PATTERN.exec(reply);
  if (match) {
    return { reviewer, approved: false, feedback: match[1].trim() };
  }
  return { reviewer, approved: true, feedback: reply.trim() };
}

export class CycleAgentManager {
  readonly agents: readonly AgentDefinition[];
  readonly analysis: ConfigurationAnalysis;
  readonly memorySettings: MemorySettings;

  private logger = getLogger();
  private tierManager: ModelTierManager;
  private invoker: ModelInvoker;
  private classifier: CapabilityClassifier;
  private events?: EventBus;
  private presetType: PresetType;
  private retryBaseDelayMs: number;
  private now?: () => number;

  private mutex = new AsyncMutex();
  private warm = new WarmSlot<AgentRole>();

  private currentState: OrchestrationState = 'idle';
  private currentProgress = 0;
  private currentStatus = '';
  private running = false;
  private cancelRequested = false;
  private currentTask = '';
  private resultLog: TaskResult[] = [];
  private plan: string | null = null;
  private verification: VerificationReport | null = null;
  private strategy: ExecutionStrategy | null = null;

  constructor(options: CycleAgentManagerOptions) {
    this.tierManager = options.tierManager;
    this.invoker = options.invoker;
    this.classifier = options.classifier ?? new KeywordCapabilityClassifier();
    this.events = options.events;
    this.presetType = options.preset ?? 'balanced';
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.now = options.now;

    const configuration = options.configuration ?? this.tierManager.getActiveConfiguration();
    this.analysis = this.tierManager.analyzeConfiguration(configuration);
    this.memorySettings = this.tierManager.getMemorySettings(configuration);

    this.agents = Object.freeze(
      configuration.selections
        .filter(selection => selection.enabled)
        .map(selection => {
          const profile = ROLE_TABLE[selection.role];
          return Object.freeze({
            id: selection.role,
            role: selection.role,
            model: getVariant(selection.role, selection.tier),
            capabilities: new Set(profile.capabilities),
            priority: profile.priority,
          });
        }),
    );

    this.logger.info(
      {
        agents: this.agents.map(a => `${a.role}:${a.model.tag}`),
        canFit: this.analysis.canFit,
        estimatedRAM: this.analysis.estimatedRAM,
        preset: this.presetType,
      },
      'Cycle agent manager initialized',
    );
  }

  get state(): OrchestrationState {
    return this.currentState;
  }

  get progress(): number {
    return this.currentProgress;
  }

  get statusMessage(): string {
    return this.currentStatus;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** TaskResults of the current or last run */
  get results(): readonly TaskResult[] {
    return [...this.resultLog];
  }

  get lastPlan(): string | null {
    return this.plan;
  }

  get lastVerification(): VerificationReport | null {
    return this.verification;
  }

  get lastStrategy(): ExecutionStrategy | null {
    return this.strategy;
  }

  getAgent(role: AgentRole): AgentDefinition | undefined {
    return this.agents.find(agent => agent.role === role);
  }

  getStatistics(): OrchestrationStatistics {
    const footprints = this.agents
      .map(agent => this.tierManager.estimateVariantRAM(agent.model))
      .sort((a, b) => b - a);

    return {
      availableRAM: this.tierManager.systemRAM,
      canRunParallel: footprints.length >= 2 && footprints[0] + footprints[1] <= this.tierManager.usableRAM,
      modelSwitchCount: this.warm.switchCount,
      totalSwitchTime: this.warm.totalSwitchTime,
      averageSwitchTime: this.warm.averageSwitchTime,
      warmAgent: this.warm.current,
      warmHits: this.warm.hits,
      warmMisses: this.warm.misses,
      registeredAgents: this.agents.length,
    };
  }

  /**
   * Run a task and return the final output. Runs are serialized; a second
   * call waits for the first to finish.
   */
  async planAndExecute(task: string, context: Partial<TaskContext> = {}, options: RunOptions = {}): Promise<string> {
    return this.mutex.withLock(() => this.run(task, context, options));
  }

  /**
   * Request cancellation. Observed between steps; the run resolves with
   * the last produced output.
   */
  cancel(): void {
    if (!this.running) return;
    this.cancelRequested = true;
    this.setStatus('Cancelling...');
    this.logger.info({ task: this.currentTask }, 'Cancellation requested');
  }

  /**
   * Single invocation of one role, serialized with runs.
   */
  async delegate(role: AgentRole, task: string, context: Partial<TaskContext> = {}): Promise<TaskResult> {
    return this.mutex.withLock(async () => {
      this.ensureRunnable();
      const agent = this.getAgent(role);
      if (!agent) {
        throw new ConfigurationError(`Agent "${role}" is not enabled`);
      }
      const ctx = this.createContext(context);
      const prior = ctx.previousResults.length > 0 ? ctx.previousResults.join('\n\n') : undefined;
      return this.executeStep(agent, buildStepInput(task, prior), ctx, null, getPreset(this.presetType), 0, []);
    });
  }

  private async run(task: string, context: Partial<TaskContext>, options: RunOptions): Promise<string> {
    const preset = getPreset(options.preset ?? this.presetType);
    const explicit = options.agents ?? [];

    this.ensureRunnable();
    const pipeline = explicit.map(role => {
      const agent = this.getAgent(role);
      if (!agent) {
        throw new ConfigurationError(`Agent "${role}" is not enabled`);
      }
      return agent;
    });

    this.running = true;
    this.cancelRequested = false;
    this.currentTask = task;
    this.resultLog = [];
    this.plan = null;
    this.verification = null;
    this.currentProgress = 0;

    const ctx = this.createContext(context);
    const strategy: ExecutionStrategy = pipeline.length > 0 ? 'pipeline' : 'auto';
    const steps = strategy === 'pipeline' ? pipeline : [this.selectAgent(task, options.images)];
    this.strategy = strategy;

    const orchestrator = this.getAgent('orchestrator');
    const planning = preset.requiresPlanning && orchestrator !== undefined;
    const verifying = preset.verificationLevel !== 'none' && this.reviewersFor(preset).length > 0;
    const totalUnits = steps.length + (planning ? 1 : 0) + (verifying ? 1 : 0);
    let doneUnits = 0;

    this.logger.info(
      { task, strategy, preset: preset.type, agents: steps.map(a => a.id) },
      'Orchestration run started',
    );

    try {
      if (planning && orchestrator) {
        this.setState('planning');
        this.setStatus(`Planning with ${orchestrator.model.name}...`);
        const planTimer = stopwatch(this.now);
        const planResult = await this.executeStep(orchestrator, planPrompt(task, this.agents), ctx, null, preset, -1, []);
        this.plan = planResult.output;
        this.events?.emit('orchestration:plan', { plan: planResult.output });
        this.checkBudget(preset, 'planning', planTimer.elapsed());
        this.setProgress(++doneUnits / totalUnits);
      }

      this.setState('executing');
      const executeTimer = stopwatch(this.now);
      for (let i = 0; i < steps.length; i++) {
        if (this.cancelRequested) return this.finishCancelled();

        const prior = i === 0 ? undefined : this.resultLog[i - 1].output;
        const result = await this.executeStep(steps[i], buildStepInput(task, prior), ctx, this.plan, preset, i, this.resultLog);
        this.resultLog.push(result);
        ctx.previousResults.push(result.output);

        this.events?.emit('orchestration:step', { index: i, total: steps.length, result });
        this.setProgress(++doneUnits / totalUnits);
      }

      if (this.cancelRequested) return this.finishCancelled();
      this.checkBudget(preset, 'executing', executeTimer.elapsed());

      if (verifying) {
        this.setState('verifying');
        const verifyTimer = stopwatch(this.now);
        await this.verify(task, ctx, preset);
        if (this.cancelRequested) return this.finishCancelled();
        this.checkBudget(preset, 'verifying', verifyTimer.elapsed());
      }

      this.setProgress(1);
      this.setStatus(`Completed ${this.resultLog.length} step(s)`);
      this.setState('completed');
      return this.lastOutput();
    } catch (err) {
      this.setState('failed');
      this.setStatus(`Failed: ${toError(err).message}`);
      this.logger.error({ task, error: toError(err).message }, 'Orchestration run failed');
      throw err;
    } finally {
      this.running = false;
      this.cancelRequested = false;
    }
  }

  /**
   * Pick the agent for an Auto run: most capability overlap, ties by
   * priority. Falls back to the orchestrator (or the highest-priority
   * agent) on no match or an uncertain tie.
   */
  selectAgent(task: string, images?: string[]): AgentDefinition {
    const classification = this.classifier.classify(task, { images });
    const fallback = this.getAgent('orchestrator') ?? this.byPriority(this.agents)[0];

    const scored = this.agents.map(agent => ({
      agent,
      score: classification.capabilities.filter(c => agent.capabilities.has(c)).length,
    }));
    const best = Math.max(0, ...scored.map(s => s.score));
    if (best === 0) {
      this.logger.debug({ task }, 'No capability match, using fallback agent');
      return fallback;
    }

    const top = scored.filter(s => s.score === best).map(s => s.agent);
    if (top.length > 1 && classification.confidence === 'low') {
      this.logger.debug({ task, tied: top.map(a => a.id) }, 'Uncertain tie, using fallback agent');
      return fallback;
    }

    const chosen = this.byPriority(top)[0];
    this.logger.debug({ task, agent: chosen.id, matched: classification.matched }, 'Agent selected');
    return chosen;
  }

  private async verify(task: string, ctx: TaskContext, preset: QualityPreset): Promise<void> {
    const reviewers = this.reviewersFor(preset);
    const lastIndex = this.resultLog.length - 1;
    let revisions = 0;
    let verdicts: VerificationVerdict[] = [];

    for (;;) {
      const final = this.resultLog[lastIndex];
      verdicts = [];
      for (const reviewer of reviewers) {
        this.setStatus(`[${reviewer.role}] reviewing result...`);
        const review = await this.executeStep(reviewer, reviewPrompt(task, final.output), ctx, this.plan, preset, lastIndex, this.resultLog);
        const verdict = parseVerdict(reviewer.role, review.output);
        verdicts.push(verdict);
        this.events?.emit('orchestration:verdict', verdict);
      }

      const rejected = verdicts.filter(v => !v.approved);
      if (rejected.length === 0 || revisions >= preset.retryLimit || this.cancelRequested) break;

      revisions++;
      const feedback = rejected.map(v => `- ${v.reviewer}: ${v.feedback}`).join('\n');
      const agent = this.getAgent(final.role);
      if (!agent) break;

      this.logger.info({ revision: revisions, agent: agent.id }, 'Revising final step');
      const revised = await this.executeStep(agent, revisionInput(final.input, feedback), ctx, this.plan, preset, lastIndex, this.resultLog);
      this.resultLog[lastIndex] = revised;
      ctx.previousResults[ctx.previousResults.length - 1] = revised.output;
    }

    this.verification = {
      verdicts,
      revisions,
      approved: verdicts.every(v => v.approved),
    };
  }

  /**
   * Orchestrator for llmReview; orchestrator plus up to two other agents
   * for expertJudge.
   */
  private reviewersFor(preset: QualityPreset): AgentDefinition[] {
    const orchestrator = this.getAgent('orchestrator');
    switch (preset.verificationLevel) {
      case 'none':
        return [];
      case 'llmReview':
        return orchestrator ? [orchestrator] : [];
      case 'expertJudge': {
        const judges = this.byPriority(this.agents.filter(a => a.role !== 'orchestrator')).slice(0, MAX_JUDGES);
        return orchestrator ? [orchestrator, ...judges] : judges;
      }
    }
  }

  private async executeStep(
    agent: AgentDefinition,
    input: string,
    ctx: TaskContext,
    plan: string | null,
    preset: QualityPreset,
    stepIndex: number,
    completed: readonly TaskResult[],
  ): Promise<TaskResult> {
    const total = stopwatch(this.now);
    const modelSwitchTime = await this.ensureWarm(agent);

    this.setStatus(`[${agent.role}] ${input.slice(0, 50)}${input.length > 50 ? '...' : ''}`);

    const profile = ROLE_TABLE[agent.role];
    const invocation: InvocationContext = {
      model: agent.model,
      systemPrompt: profile.systemPrompt,
      temperature: profile.temperature,
      memory: this.memorySettings,
      plan: plan ?? undefined,
      files: ctx.files,
      workingDirectory: ctx.workingDirectory,
    };

    let response: InvocationResult;
    try {
      response = await retry(() => this.invoker.invoke(agent.role, input, invocation), {
        maxRetries: preset.retryLimit,
        baseDelay: this.retryBaseDelayMs,
        jitter: this.retryBaseDelayMs,
        onRetry: (attempt, error) => {
          this.logger.warn({ role: agent.role, attempt, error: error.message }, 'Retrying model invocation');
          this.events?.emit('orchestration:retry', { role: agent.role, attempt, error: error.message });
        },
      });
    } catch (err) {
      const error = toError(err);
      const where = stepIndex < 0 ? 'Planning' : `Step ${stepIndex + 1}`;
      throw new TaskExecutionError(
        `${where} (${agent.id}) failed: ${error.message}`,
        stepIndex,
        agent.id,
        [...completed],
        error,
      );
    }

    return Object.freeze({
      output: response.text,
      agentId: agent.id,
      role: agent.role,
      input,
      executionTime: total.elapsed(),
      modelSwitchTime,
      tokensUsed: response.tokensUsed ?? Math.ceil(response.text.length / 4),
    });
  }

  /**
   * Warm-slot bookkeeping. Returns the switch time, 0 on a hit.
   */
  private async ensureWarm(agent: AgentDefinition): Promise<number> {
    const { hit, previous } = this.warm.touch(agent.role);
    if (hit) return 0;

    this.setStatus(`Loading ${agent.model.name}...`);
    const timer = stopwatch(this.now);
    if (this.invoker.load) {
      try {
        await this.invoker.load(agent.role, agent.model);
      } catch (err) {
        // invoke() loads the model on demand
        this.logger.warn({ role: agent.role, error: toError(err).message }, 'Model warm-up failed');
      }
    }
    const durationMs = timer.elapsed();
    this.warm.recordSwitch(durationMs);
    this.events?.emit('orchestration:switch', { from: previous, to: agent.role, durationMs });
    this.logger.debug({ from: previous, to: agent.role, durationMs }, 'Model switch');
    return durationMs;
  }

  private checkBudget(preset: QualityPreset, phase: BudgetedPhase, elapsedMs: number): void {
    const budgetMs = Math.round(phaseBudget(preset, phase) * 1000);
    if (budgetMs === 0 || elapsedMs <= budgetMs) return;
    this.logger.warn({ phase, elapsedMs, budgetMs, preset: preset.type }, 'Phase exceeded its time budget');
    this.events?.emit('orchestration:overrun', { phase, elapsedMs, budgetMs });
  }

  private ensureRunnable(): void {
    if (!this.analysis.canFit) {
      throw new ConfigurationError(
        `Model configuration does not fit in memory (${this.analysis.estimatedRAM} GB needed, ${this.analysis.usableRAM} GB usable). ${this.analysis.recommendation}`,
      );
    }
    if (this.agents.length === 0) {
      throw new ConfigurationError('No agents are enabled');
    }
  }

  private createContext(context: Partial<TaskContext>): TaskContext {
    return {
      workingDirectory: context.workingDirectory,
      files: { ...context.files },
      previousResults: [...(context.previousResults ?? [])],
    };
  }

  private byPriority(agents: readonly AgentDefinition[]): AgentDefinition[] {
    return [...agents].sort((a, b) => b.priority - a.priority);
  }

  private lastOutput(): string {
    return this.resultLog.length > 0 ? this.resultLog[this.resultLog.length - 1].output : '';
  }

  private finishCancelled(): string {
    this.setStatus('Cancelled');
    this.setState('cancelled');
    this.logger.info({ task: this.currentTask, completed: this.resultLog.length }, 'Orchestration run cancelled');
    return this.lastOutput();
  }

  private setState(state: OrchestrationState): void {
    this.currentState = state;
    this.events?.emit('orchestration:state', { state, task: this.currentTask });
  }

  private setStatus(message: string): void {
    this.currentStatus = message;
    this.events?.emit('orchestration:progress', { progress: this.currentProgress, statusMessage: message });
  }

  private setProgress(progress: number): void {
    this.currentProgress = Math.min(1, Math.max(0, progress));
    this.events?.emit('orchestration:progress', { progress: this.currentProgress, statusMessage: this.currentStatus });
  }
}

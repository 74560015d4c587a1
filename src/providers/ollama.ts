/**
 * Ollama Provider: local model invocation via the Ollama REST API.
 *
 * Raw fetch() against Ollama's HTTP API (default: http://localhost:11434):
 * - Chat via POST /api/chat, with num_ctx / num_predict / keep_alive taken
 *   from the memory settings
 * - Model warm-up via POST /api/generate with an empty prompt
 * - Health check and installed models via GET /api/tags
 */

import { z } from 'zod';
import { ModelInvocationError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { parseReasoningAction } from '../executor/prompt-builder.js';
import type { ReasoningAction, ReasoningModel, ReasoningRequest } from '../executor/types.js';
import type { AgentRole, MemorySettings, ModelVariant } from '../models/types.js';
import type { ChatMessage, InvocationContext, InvocationResult, ModelInvoker } from './types.js';

export interface OllamaProviderConfig {
  baseUrl?: string;
  timeoutMs?: number;
  /** Defaults for calls that carry no memory settings */
  memory?: MemorySettings;
  /** Model tag used by the autonomous loop */
  reasoningModel?: string;
  reasoningTemperature?: number;
}

const DEFAULT_MEMORY: MemorySettings = { contextWindow: 4096, maxTokens: 2048, keepAlive: '5m' };

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

interface ChatOptions {
  temperature?: number;
  memory: MemorySettings;
  role?: AgentRole;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export class OllamaProvider implements ModelInvoker, ReasoningModel {
  readonly name = 'ollama';

  private logger = getLogger();
  private baseUrl: string;
  private timeoutMs: number;
  private memory: MemorySettings;
  private reasoningModel: string;
  private reasoningTemperature: number;

  constructor(config: OllamaProviderConfig = {}) {
    this.baseUrl = (config.baseUrl || process.env.OLLAMA_BASE_URL || 'http://localhost:11434').replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 120000;
    this.memory = config.memory ?? DEFAULT_MEMORY;
    this.reasoningModel = config.reasoningModel ?? 'qwen3:8b';
    this.reasoningTemperature = config.reasoningTemperature ?? 0.2;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.request('/api/tags', { method: 'GET' }, 3000);
      return response.ok;
    } catch (err) {
      this.logger.debug({ error: toError(err).message }, 'Ollama not reachable');
      return false;
    }
  }

  /** Tags of the models installed in the runtime, e.g. `qwen3:8b` */
  async listModels(): Promise<string[]> {
    let response: Response;
    try {
      response = await this.request('/api/tags', { method: 'GET' }, this.timeoutMs);
    } catch (err) {
      throw new ModelInvocationError(`Cannot reach Ollama at ${this.baseUrl}: ${toError(err).message}`, 'network', undefined, toError(err));
    }
    if (!response.ok) {
      throw new ModelInvocationError(`Ollama API error (${response.status}): ${await response.text()}`, 'unavailable');
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err) {
      throw new ModelInvocationError('Ollama returned a non-JSON response', 'malformed', undefined, toError(err));
    }
    const parsed = TagsResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ModelInvocationError('Unexpected Ollama tags response', 'malformed', undefined, parsed.error);
    }
    return parsed.data.models.map(model => model.name);
  }

  async invoke(role: AgentRole, prompt: string, context: InvocationContext): Promise<InvocationResult> {
    const messages: ChatMessage[] = [{ role: 'system', content: context.systemPrompt }];

    if (context.plan) {
      messages.push({ role: 'system', content: `PLAN:\n${context.plan}` });
    }
    const files = Object.entries(context.files);
    if (files.length > 0) {
      const rendered = files.map(([name, content]) => `### ${name}\n${content}`).join('\n\n');
      messages.push({ role: 'system', content: `FILES:\n${rendered}` });
    }
    messages.push({ role: 'user', content: prompt });

    return this.chat(context.model.tag, messages, {
      temperature: context.temperature,
      memory: context.memory ?? this.memory,
      role,
    });
  }

  async load(role: AgentRole, model: ModelVariant): Promise<void> {
    const response = await this.send(
      '/api/generate',
      { model: model.tag, prompt: '', keep_alive: this.memory.keepAlive, stream: false },
      role,
    );
    // Body is irrelevant; drain it so the connection is released
    await response.text();
    this.logger.debug({ role, model: model.tag }, 'Model loaded');
  }

  async next(request: ReasoningRequest): Promise<ReasoningAction> {
    const { text } = await this.chat(
      this.reasoningModel,
      [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.prompt },
      ],
      { temperature: this.reasoningTemperature, memory: this.memory },
    );
    return parseReasoningAction(text);
  }

  async chat(model: string, messages: ChatMessage[], options: ChatOptions): Promise<InvocationResult> {
    const body = {
      model,
      messages,
      stream: false,
      keep_alive: options.memory.keepAlive,
      options: {
        num_ctx: options.memory.contextWindow,
        num_predict: options.memory.maxTokens,
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      },
    };

    this.logger.debug({ model, role: options.role, messages: messages.length }, 'Ollama chat request');
    const response = await this.send('/api/chat', body, options.role);

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err) {
      throw new ModelInvocationError('Ollama returned a non-JSON response', 'malformed', options.role, toError(err));
    }

    const parsed = ChatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ModelInvocationError(
        `Unexpected Ollama response: ${parsed.error.issues.map(i => i.message).join('; ')}`,
        'malformed',
        options.role,
        parsed.error,
      );
    }

    // Ollama reports eval_count for output tokens and prompt_eval_count for input
    const { prompt_eval_count: inputTokens, eval_count: outputTokens } = parsed.data;
    const tokensUsed =
      inputTokens === undefined && outputTokens === undefined ? undefined : (inputTokens ?? 0) + (outputTokens ?? 0);

    return { text: parsed.data.message.content, tokensUsed };
  }

  private async send(path: string, body: unknown, role?: AgentRole): Promise<Response> {
    let response: Response;
    try {
      response = await this.request(
        path,
        { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) },
        this.timeoutMs,
      );
    } catch (err) {
      const message = isAbort(err)
        ? `Ollama request timed out after ${this.timeoutMs}ms`
        : `Cannot reach Ollama at ${this.baseUrl}: ${toError(err).message}`;
      throw new ModelInvocationError(message, 'network', role, toError(err));
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelInvocationError(`Ollama API error (${response.status}): ${errorText}`, 'unavailable', role);
    }
    return response;
  }

  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetch(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }
}

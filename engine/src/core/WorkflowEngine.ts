/**
 * Workflow Engine - Main Public API
 *
 * Owns a tool registry, a result cache shared across runs, an event bus
 * and a logger, and wires them into plan construction and execution.
 *
 * @example
 * ```ts
 * const engine = new WorkflowEngine({ logLevel: 'warn' });
 * engine.registerTool(fetcher).registerTool(summarizer);
 *
 * const definition = await engine.loadWorkflow('./report.yaml');
 * const result = await engine.run(definition, { concurrency: 4 });
 * console.log(engine.formatResult(result));
 * ```
 *
 * @module core
 */

import type { ToolAdapter } from '../adapters/ToolAdapter.js';
import { ToolRegistry } from '../adapters/ToolRegistry.js';
import { FailureHandler } from '../automation/runtime/FailureHandler.js';
import type { ResultCache } from '../cache/ResultCache.js';
import { ConfigError } from '../errors/ConfigErrors.js';
import type { EngineEvent, EngineEventType } from '../events/EngineEvents.js';
import { EventBus, type EventHandler } from '../events/EventBus.js';
import type { ExecutionPlan } from '../execution/ExecutionPlan.js';
import { ExecutionScheduler, type RunHandle } from '../execution/ExecutionScheduler.js';
import type { RunConfig } from '../execution/RunConfig.js';
import { formatResult, type WorkflowResult } from '../execution/WorkflowResult.js';
import { DependencyResolver } from '../graph/DependencyResolver.js';
import { WorkflowLoader } from '../loader/WorkflowLoader.js';
import type { RunSnapshot } from '../state/WorkflowRun.js';
import type { WorkflowDefinition } from '../types/core-types.js';
import { applyConfigDefaults, validateConfig, type ResolvedEngineConfig, type WorkflowEngineConfig } from './EngineConfig.js';
import { createEngineLogger, type EngineLogger } from './EngineLogger.js';

/**
 * Per-run options; unset values fall back to the engine configuration
 */
export type WorkflowRunOptions = RunConfig;

export class WorkflowEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly registry: ToolRegistry;
  private readonly eventBus: EventBus;
  private readonly logger: EngineLogger;
  private readonly scheduler: ExecutionScheduler;
  private readonly activeRuns: Map<string, RunHandle> = new Map();

  /**
   * @throws {ConfigError} If the configuration is invalid
   */
  constructor(config: WorkflowEngineConfig = {}) {
    validateConfig(config);
    this.config = applyConfigDefaults(config);

    this.logger = this.config.logger ?? createEngineLogger(this.config.logLevel, { file: this.config.logFile });
    this.eventBus = new EventBus(this.logger.child('EventBus', 'system'));
    this.registry = new ToolRegistry();
    this.scheduler = new ExecutionScheduler({
      cache: this.config.cache,
      failureHandler: new FailureHandler(this.config.failurePolicy),
      events: this.eventBus,
      logger: this.logger,
    });

    this.registerTools(this.config.tools);
  }

  /**
   * @throws {DuplicateToolError} If a tool with the same name is registered
   */
  registerTool(adapter: ToolAdapter): this {
    this.registry.register(adapter);
    this.logger.debug(`Registered tool "${adapter.spec().name}"`, { tool: adapter.spec().name });
    return this;
  }

  registerTools(adapters: readonly ToolAdapter[]): this {
    for (const adapter of adapters) {
      this.registerTool(adapter);
    }
    return this;
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  /**
   * Resolve and validate a definition against the registered tools
   *
   * @throws {PlanError} If the definition cannot be planned
   */
  plan(definition: WorkflowDefinition): ExecutionPlan {
    const plan = DependencyResolver.build(definition, this.registry);
    this.logger.debug(`Planned workflow "${definition.name}"`, {
      nodes: plan.nodes.size,
      layers: plan.layers.length,
    });
    return plan;
  }

  /**
   * Load a workflow definition from a YAML or JSON file
   *
   * @throws {DefinitionSchemaError}
   */
  async loadWorkflow(path: string): Promise<WorkflowDefinition> {
    const { definition } = await WorkflowLoader.fromFile(path);
    return definition;
  }

  /**
   * Plan (when given a definition) and execute to completion
   */
  async run(workflow: WorkflowDefinition | ExecutionPlan, options: WorkflowRunOptions = {}): Promise<WorkflowResult> {
    return this.start(workflow, options).result;
  }

  /**
   * Plan (when given a definition) and start executing; the run is tracked
   * until it ends.
   *
   * @throws {PlanError} If the definition cannot be planned
   * @throws {ConfigError} If the options are invalid or the run id is in use
   */
  start(workflow: WorkflowDefinition | ExecutionPlan, options: WorkflowRunOptions = {}): RunHandle {
    const plan = 'nodes' in workflow ? workflow : this.plan(workflow);

    if (options.runId !== undefined && this.activeRuns.has(options.runId)) {
      throw new ConfigError('run options', [{ path: 'runId', message: `run "${options.runId}" is already active` }]);
    }

    const handle = this.scheduler.start(plan, {
      ...options,
      concurrency: options.concurrency ?? this.config.concurrency,
      defaultTimeoutMs: options.defaultTimeoutMs ?? this.config.defaultTimeoutMs,
    });

    this.activeRuns.set(handle.runId, handle);
    const release = (): void => {
      this.activeRuns.delete(handle.runId);
    };
    handle.result.then(release, release);

    return handle;
  }

  /**
   * Snapshot of an active run
   */
  getRun(runId: string): RunSnapshot | undefined {
    return this.activeRuns.get(runId)?.snapshot();
  }

  listActiveRuns(): RunSnapshot[] {
    return Array.from(this.activeRuns.values(), handle => handle.snapshot());
  }

  /**
   * Cancel an active run
   *
   * @returns false if no such run is active or it is already stopping
   */
  cancel(runId: string, reason?: string): boolean {
    const handle = this.activeRuns.get(runId);
    return handle ? handle.cancel(reason) : false;
  }

  /**
   * Subscribe to engine events
   *
   * @returns Unsubscribe function
   */
  on<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEvent<K>>): () => void {
    return this.eventBus.on(eventType, handler);
  }

  onAny(handler: EventHandler<EngineEvent>): () => void {
    return this.eventBus.onAny(handler);
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  /**
   * The engine-wide result cache, if caching is enabled
   */
  getCache(): ResultCache | undefined {
    return this.config.cache;
  }

  getLogger(): EngineLogger {
    return this.logger;
  }

  formatResult(result: WorkflowResult): string {
    return formatResult(result);
  }
}

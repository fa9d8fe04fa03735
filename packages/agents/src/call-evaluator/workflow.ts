/**
 * Call Workflow Engine
 *
 * Runs the call-evaluation stages as an explicit dependency graph.
 * Each node starts once all of its dependencies have settled (completed
 * or failed); independent nodes run concurrently. All mutation is
 * confined to the WorkflowState created for one run.
 *
 * @module call-evaluator/workflow
 */

import { ConfigurationError, getErrorMessage, type ModelFailure } from '@signalrank/lib';
import type { CallTranscript } from './contracts/call-input';
import type { AnalysisStage, StageResult, Verdict } from './contracts/verdict';

// ===========================================
// Types
// ===========================================

export type StageName = AnalysisStage | 'aggregation';

export type StageStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface StageContext {
  call: CallTranscript;
  /** Epoch ms when the evaluation started */
  startedAt: number;
  /** Called when a stage falls back to its heuristic */
  onStageDegraded?: (stage: AnalysisStage, failure: ModelFailure) => void;
}

/** Read-only access to a run's state, handed to nodes */
export interface WorkflowStateView {
  statusOf(name: StageName): StageStatus;
  resultOf(stage: AnalysisStage): StageResult | undefined;
  errorOf(name: StageName): string | undefined;
}

export interface AnalysisNode {
  kind: 'analysis';
  name: AnalysisStage;
  dependsOn: readonly StageName[];
  run(context: StageContext, state: WorkflowStateView): Promise<StageResult>;
}

export interface AggregationNode {
  kind: 'aggregation';
  name: 'aggregation';
  dependsOn: readonly StageName[];
  run(context: StageContext, state: WorkflowStateView): Promise<Verdict>;
}

export type StageNode = AnalysisNode | AggregationNode;

export interface WorkflowObserver {
  stageStarted?(name: StageName): void;
  stageCompleted?(name: StageName, durationMs: number): void;
  stageFailed?(name: StageName, errorMessage: string, durationMs: number): void;
}

// ===========================================
// Workflow State
// ===========================================

export class WorkflowState implements WorkflowStateView {
  private readonly statuses = new Map<StageName, StageStatus>();
  private readonly results: Partial<Record<AnalysisStage, StageResult>> = {};
  private readonly errors = new Map<StageName, string>();
  private verdictValue?: Verdict;

  constructor(names: readonly StageName[]) {
    for (const name of names) {
      this.statuses.set(name, 'pending');
    }
  }

  statusOf(name: StageName): StageStatus {
    const status = this.statuses.get(name);
    if (!status) {
      throw new ConfigurationError(`Unknown stage: ${name}`);
    }
    return status;
  }

  resultOf(stage: AnalysisStage): StageResult | undefined {
    return this.results[stage];
  }

  errorOf(name: StageName): string | undefined {
    return this.errors.get(name);
  }

  get verdict(): Verdict | undefined {
    return this.verdictValue;
  }

  /** Status of every stage, in declaration order */
  snapshot(): Record<string, StageStatus> {
    return Object.fromEntries(this.statuses);
  }

  markRunning(name: StageName): void {
    this.transition(name, 'pending', 'running');
  }

  recordResult(stage: AnalysisStage, result: StageResult): void {
    this.transition(stage, 'running', 'completed');
    this.results[stage] = result;
  }

  recordVerdict(verdict: Verdict): void {
    this.transition('aggregation', 'running', 'completed');
    this.verdictValue = verdict;
  }

  markFailed(name: StageName, errorMessage: string): void {
    this.transition(name, 'running', 'failed');
    this.errors.set(name, errorMessage);
  }

  private transition(name: StageName, from: StageStatus, to: StageStatus): void {
    const current = this.statusOf(name);
    if (current !== from) {
      throw new Error(`Stage ${name} cannot move from ${current} to ${to}`);
    }
    this.statuses.set(name, to);
  }
}

// ===========================================
// Graph Validation
// ===========================================

/**
 * Reject duplicate names, unknown dependencies and cycles.
 * @throws ConfigurationError
 */
export function validateGraph(nodes: readonly StageNode[]): void {
  const byName = new Map<StageName, StageNode>();
  for (const node of nodes) {
    if (byName.has(node.name)) {
      throw new ConfigurationError(`Duplicate stage: ${node.name}`);
    }
    byName.set(node.name, node);
  }

  for (const node of nodes) {
    for (const dep of node.dependsOn) {
      if (!byName.has(dep)) {
        throw new ConfigurationError(`Stage ${node.name} depends on unknown stage ${dep}`);
      }
    }
  }

  const visiting = new Set<StageName>();
  const visited = new Set<StageName>();

  const visit = (name: StageName, path: StageName[]): void => {
    if (visited.has(name)) return;
    if (visiting.has(name)) {
      throw new ConfigurationError(`Stage graph has a cycle: ${[...path, name].join(' -> ')}`);
    }
    visiting.add(name);
    for (const dep of byName.get(name)?.dependsOn ?? []) {
      visit(dep, [...path, name]);
    }
    visiting.delete(name);
    visited.add(name);
  };

  for (const node of nodes) {
    visit(node.name, []);
  }
}

// ===========================================
// Engine
// ===========================================

export class CallWorkflowEngine {
  private readonly nodes: Map<StageName, StageNode>;

  constructor(nodes: readonly StageNode[]) {
    validateGraph(nodes);
    this.nodes = new Map(nodes.map((node) => [node.name, node]));
  }

  get stageNames(): StageName[] {
    return [...this.nodes.keys()];
  }

  /**
   * Execute every node once. Resolves when all nodes have settled;
   * node failures are recorded in the returned state, not thrown.
   */
  async run(context: StageContext, observer: WorkflowObserver = {}): Promise<WorkflowState> {
    const state = new WorkflowState(this.stageNames);
    const scheduled = new Map<StageName, Promise<void>>();

    const schedule = (name: StageName): Promise<void> => {
      const existing = scheduled.get(name);
      if (existing) return existing;

      const node = this.nodes.get(name);
      if (!node) {
        return Promise.reject(new ConfigurationError(`Unknown stage: ${name}`));
      }

      const settled = Promise.all(node.dependsOn.map(schedule)).then(() =>
        this.execute(node, context, state, observer)
      );
      scheduled.set(name, settled);
      return settled;
    };

    await Promise.all(this.stageNames.map(schedule));
    return state;
  }

  private async execute(
    node: StageNode,
    context: StageContext,
    state: WorkflowState,
    observer: WorkflowObserver
  ): Promise<void> {
    const startTime = Date.now();
    state.markRunning(node.name);
    observer.stageStarted?.(node.name);

    let failure: string | undefined;
    try {
      if (node.kind === 'analysis') {
        state.recordResult(node.name, await node.run(context, state));
      } else {
        state.recordVerdict(await node.run(context, state));
      }
    } catch (error) {
      failure = getErrorMessage(error);
      state.markFailed(node.name, failure);
    }

    const durationMs = Date.now() - startTime;
    if (failure === undefined) {
      observer.stageCompleted?.(node.name, durationMs);
    } else {
      observer.stageFailed?.(node.name, failure, durationMs);
    }
  }
}

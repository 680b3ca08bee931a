// Capability interfaces for the engine's external collaborators

import type {
  AssessmentResult,
  DeviceJudgment,
  DevicePlan,
  DeviceTarget,
  InvestigationPlan,
  InvestigationSession,
  LearningContext,
  LearningEntry,
  LearningInsights,
  StepOutcome,
  ToolCall,
  ToolDescriptor,
  ToolExecution,
} from './types.js';

/**
 * Input to one Reasoning Oracle call.
 */
export interface OracleRequest {
  deviceName: string;
  instruction: string;
  objective: string;
  /** Everything recorded for this device so far, oldest first */
  priorOutcomes: readonly StepOutcome[];
  retryFeedback?: string;
}

/**
 * Maps one plan instruction to the concrete tool calls that realise it.
 * An empty list means no applicable tool was found.
 */
export interface ReasoningOracle {
  selectInvocations(request: OracleRequest, signal?: AbortSignal): Promise<ToolCall[]>;
}

/**
 * Performs one tool call against a device.
 *
 * Failures are normally returned as `{ ok: false }`; a thrown error is
 * classified by the caller.
 */
export interface ToolExecutor {
  execute(call: ToolCall, targetDevice: string, signal?: AbortSignal): Promise<ToolExecution>;
}

/** Executors that can advertise their tools to a model. */
export interface ToolCatalog {
  listTools(): Promise<ToolDescriptor[]>;
}

/** Source of the devices a query may target. */
export interface DeviceInventory {
  listDevices(signal?: AbortSignal): Promise<DeviceTarget[]>;
}

/**
 * Resolves a user query to a concrete, non-empty device set.
 * Throws InvalidTargetError when nothing matches.
 */
export interface InputValidator {
  resolveTargets(userQuery: string, signal?: AbortSignal): Promise<DeviceTarget[]>;
}

/** Chooses which plan intent answers a query. */
export interface IntentSelector {
  selectIntent(
    userQuery: string,
    plans: readonly InvestigationPlan[],
    learnings?: LearningContext,
    signal?: AbortSignal
  ): Promise<string>;
}

/**
 * Produces the plans of one session, one per target and in target order.
 * Called once per session, so the intent is chosen afresh every time.
 */
export interface Planner {
  planSession(
    userQuery: string,
    targets: readonly DeviceTarget[],
    learnings?: LearningContext,
    signal?: AbortSignal
  ): Promise<DevicePlan[]>;
}

export interface PlanningContext {
  userQuery: string;
  learnings?: LearningContext;
}

/** Tailors a plan template to one device. */
export interface PlanCustomizer {
  customize(
    template: InvestigationPlan,
    device: DeviceTarget,
    context: PlanningContext,
    signal?: AbortSignal
  ): Promise<InvestigationPlan>;
}

/** Semantic comparison of results against objectives. */
export interface ObjectiveJudge {
  judge(
    session: InvestigationSession,
    deviceNames: readonly string[],
    signal?: AbortSignal
  ): Promise<DeviceJudgment[]>;
}

/** Decision component invoked by the orchestration loop. */
export interface Assessor {
  assess(session: InvestigationSession, signal?: AbortSignal): Promise<AssessmentResult>;
}

/** Turns the terminal session into a human-readable summary. */
export interface ReportSynthesizer {
  synthesize(session: InvestigationSession, signal?: AbortSignal): Promise<string>;
}

/** Persists cross-session insights. */
export interface LearningStore {
  recall(): Promise<LearningContext>;
  remember(entry: LearningEntry): Promise<void>;
}

/** Distils learnings from a reported session. */
export interface InsightExtractor {
  extract(session: InvestigationSession): Promise<LearningInsights>;
}

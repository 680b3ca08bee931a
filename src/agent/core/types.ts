// Shared types for the investigation engine

// ==================== PLANS ====================

/**
 * Immutable investigation template loaded by intent key.
 *
 * Step order is significant: later steps may depend on what earlier
 * steps discovered, so a plan is always executed front to back.
 */
export interface InvestigationPlan {
  /** Unique plan key (also the plan file's stem, e.g. "bgp_health") */
  readonly intent: string;
  /** What a successful investigation must establish */
  readonly objectiveDescription: string;
  /** Ordered natural-language instructions */
  readonly steps: readonly string[];
}

/**
 * The plan one device follows in a session: its template, possibly tailored
 * to the device's role and platform.
 */
export interface DevicePlan extends InvestigationPlan {
  readonly deviceName: string;
}

// ==================== TOOLS ====================

/** Failure categories a tool executor can report. */
export type ToolErrorKind = 'communication' | 'authentication' | 'protocol' | 'validation';

/**
 * Typed failure of a single tool call.
 */
export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

/**
 * A concrete function call chosen by the Reasoning Oracle.
 */
export interface ToolCall {
  /** Name of the device tool (e.g. "get_routing_info") */
  functionName: string;
  /** Arguments to pass to the tool */
  parameters: Record<string, unknown>;
}

/**
 * A tool call plus its outcome. Exactly one of `result` / `error` is set
 * once the call has been executed; neither is set before that.
 */
export interface ToolInvocation extends ToolCall {
  result?: unknown;
  error?: ToolError;
}

/**
 * What a ToolExecutor hands back for one call.
 */
export type ToolExecution = { ok: true; result: unknown } | { ok: false; error: ToolError };

/**
 * Tool metadata advertised by an executor, used to offer tools to a model.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

// ==================== DEVICES ====================

/**
 * A device the Input Validator resolved from the user's request.
 */
export interface DeviceTarget {
  /** Inventory name (e.g. "xrd-pe1") */
  name: string;
  /** Network role if known (e.g. "PE", "P", "RR") */
  role?: string;
  /** Platform / model information */
  profile?: string;
}

/**
 * Record of one plan step executed on one device during one pass.
 */
export interface StepOutcome {
  /** 0-based index into the plan's steps */
  readonly stepIndex: number;
  /** 1-based execution pass that produced this outcome */
  readonly attempt: number;
  readonly instruction: string;
  readonly invocations: readonly ToolInvocation[];
  /** Set when the oracle itself failed for this step */
  readonly reasoningError?: string;
}

/**
 * Per-device investigation state.
 *
 * Owned by exactly one Device Investigator at a time. `stepOutcomes` only
 * ever grows: each pass appends to the history of the previous ones.
 */
export interface DeviceInvestigationState {
  readonly deviceName: string;
  readonly objective: string;
  readonly planSteps: readonly string[];
  readonly stepOutcomes: readonly StepOutcome[];
  /** Free-text summary of empty steps and tool errors from the latest pass */
  readonly limitationsNotes?: string;
  /** Assessor guidance carried into the next pass */
  readonly retryFeedback?: string;
  /** Number of passes this device has been executed in */
  readonly attempts: number;
  /** Unrecoverable investigator failure captured by the coordinator */
  readonly failure?: string;
  /** The latest pass stopped early because the session was aborted */
  readonly cancelled?: boolean;
}

/**
 * Work item handed to a Device Investigator.
 */
export interface DeviceTask {
  deviceName: string;
  objective: string;
  planSteps: readonly string[];
  retryFeedback?: string;
  /** Outcomes recorded by earlier passes (kept and extended) */
  history: readonly StepOutcome[];
  /** 1-based pass number */
  attempt: number;
}

// ==================== ASSESSMENT ====================

/** How the assessor settled a device. */
export type DeviceResolutionStatus = 'met' | 'limited' | 'forced';

export interface DeviceResolution {
  status: DeviceResolutionStatus;
  reason: string;
}

/**
 * Semantic judgment of one device's results against its objective.
 */
export interface DeviceJudgment {
  deviceName: string;
  objectiveMet: boolean;
  /** False when a tool or device limitation makes further passes pointless */
  retryCanHelp: boolean;
  reason: string;
  /** Guidance for the next pass, when a retry is worthwhile */
  feedback?: string;
}

/**
 * Decision returned by the Objective Assessor for one assessment pass.
 */
export interface AssessmentResult {
  objectiveAchieved: boolean;
  /** Guidance for devices that still need another pass */
  feedbackPerDevice: Record<string, string>;
  /** Devices settled during this pass */
  resolutions: Record<string, DeviceResolution>;
  notes: string;
  maxRetriesReached: boolean;
}

// ==================== SESSION ====================

/** Tri-state objective flag plus the cancellation marker. */
export type ObjectiveVerdict = 'unknown' | 'achieved' | 'not_achieved' | 'cancelled';

export type SessionPhase =
  | 'validating'
  | 'planning'
  | 'executing'
  | 'assessing'
  | 'reporting'
  | 'done'
  | 'cancelled';

/**
 * Root aggregate for one user request.
 *
 * Every phase boundary yields a new snapshot with a higher `version`;
 * the terminal snapshot (`done` or `cancelled`) is deep-frozen.
 */
export interface InvestigationSession {
  readonly sessionId: string;
  readonly version: number;
  readonly phase: SessionPhase;
  readonly userQuery: string;
  readonly intent?: string;
  readonly devices: readonly DeviceInvestigationState[];
  readonly resolutions: Readonly<Record<string, DeviceResolution>>;
  readonly currentRetryCount: number;
  readonly maxRetries: number;
  readonly executionPasses: number;
  readonly objectiveAchieved: ObjectiveVerdict;
  readonly assessorNotes?: string;
  readonly cancellationReason?: string;
  readonly learnings?: LearningContext;
  readonly summary?: string;
}

// ==================== LEARNING STORE ====================

/**
 * Cross-session insights handed to the planner and the judge.
 */
export interface LearningContext {
  previousReports: string[];
  learnedPatterns: string[];
  deviceRelationships: string[];
}

/**
 * One persisted session record.
 */
export interface LearningEntry {
  sessionId: string;
  recordedAt: string;
  userQuery: string;
  devices: string[];
  report: string;
  learnedPatterns: string;
  deviceRelationships: string;
}

/**
 * Patterns and relationships distilled from a finished session.
 */
export interface LearningInsights {
  learnedPatterns: string;
  deviceRelationships: string;
}

// ==================== LOGGING ====================

/** Severity tag carried by every structured log entry. */
export type LogLevel = 'INFO' | 'STEP' | 'RESULT' | 'WARN' | 'ERROR';

/**
 * Structured log line emitted by engine components.
 */
export interface LogEntry {
  level: LogLevel;
  /** Component or phase producing the entry (e.g. "Orchestrator", "FanOut") */
  phase: string;
  message: string;
}

export type LogSink = (entry: LogEntry) => void;

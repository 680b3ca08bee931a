/**
 * NetworkInvestigationAgent - wires the investigation engine to its real
 * collaborators.
 *
 * - Device tools and (by default) the inventory: MCP server
 * - Tool selection, assessment, intent selection, plan tailoring, reports,
 *   insights: Claude
 * - Plans: JSON documents in PLANS_DIR
 * - Cross-session memory: JSON learning store
 *
 * The engine itself (orchestrator, fan-out, investigator, assessor policy)
 * knows nothing about these choices; see InvestigationOrchestrator.
 */

import { InvestigationOrchestrator, type RunOptions } from './core/orchestrator.js';
import type { DeviceInventory } from './core/contracts.js';
import type {
  DeviceTarget,
  InvestigationPlan,
  InvestigationSession,
  LearningContext,
  LogSink,
} from './core/types.js';
import { DeviceInvestigator } from './execution/device-investigator.js';
import { FanOutCoordinator } from './execution/fan-out.js';
import { McpToolExecutor } from './execution/mcp-agent.js';
import { ObjectiveAssessor } from './intelligence/assessor.js';
import { AnthropicObjectiveJudge } from './intelligence/evaluator.js';
import { AnthropicInsightExtractor } from './intelligence/insights.js';
import {
  AnthropicIntentSelector,
  AnthropicPlanCustomizer,
  KeywordIntentSelector,
  RepositoryPlanner,
} from './intelligence/planner.js';
import { AnthropicReasoningOracle } from './intelligence/reasoner.js';
import { InventoryInputValidator, JsonDeviceInventory } from './knowledge/inventory.js';
import { JsonLearningStore } from './knowledge/learning-store.js';
import { PlanRepository } from './knowledge/plan-repository.js';
import type { AgentConfig } from '../config/index.js';
import { AnthropicReportSynthesizer } from '../phases/report.js';
import { Logger } from '../utils/logger.js';

export interface AgentOptions {
  /** Receives every structured log entry (worker: Redis Pub/Sub, CLI: JSONL file) */
  onLog?: LogSink;
  /** Print log lines to the console (default: true) */
  console?: boolean;
  /** Receives every session snapshot */
  onSnapshot?: (session: InvestigationSession) => void;
}

export class NetworkInvestigationAgent {
  private readonly config: AgentConfig;
  private readonly logger: Logger;
  private readonly mcp: McpToolExecutor;
  private readonly inventory: DeviceInventory;
  private readonly plans: PlanRepository;
  private readonly learningStore: JsonLearningStore;
  private readonly orchestrator: InvestigationOrchestrator;

  constructor(config: AgentConfig, options: AgentOptions = {}) {
    this.config = config;
    this.logger = new Logger('Agent', { onLog: options.onLog, console: options.console });
    const key = config.anthropicApiKey;
    const { models } = config;

    this.mcp = new McpToolExecutor(config.mcpServerUrl, this.logger.child('MCP'));
    this.inventory = config.inventoryPath ? new JsonDeviceInventory(config.inventoryPath) : this.mcp;
    this.plans = new PlanRepository(config.plansDir);
    this.learningStore = new JsonLearningStore(config.learningStorePath);

    const planner = new RepositoryPlanner(
      this.plans,
      new AnthropicIntentSelector(
        key,
        new KeywordIntentSelector(config.defaultIntent),
        models.planner,
        this.logger.child('Planner')
      ),
      this.logger.child('Planner'),
      new AnthropicPlanCustomizer(key, models.planner)
    );
    const investigator = new DeviceInvestigator(
      new AnthropicReasoningOracle(key, this.mcp, models.reasoner),
      this.mcp,
      this.logger.child('Investigator')
    );

    this.orchestrator = new InvestigationOrchestrator(
      {
        validator: new InventoryInputValidator(this.inventory, this.logger.child('InputValidator')),
        planner,
        coordinator: new FanOutCoordinator(investigator, config.fanoutConcurrency, this.logger.child('FanOut')),
        assessor: new ObjectiveAssessor(
          new AnthropicObjectiveJudge(key, models.assessor, this.logger.child('Assessor')),
          this.logger.child('Assessor')
        ),
        reporter: new AnthropicReportSynthesizer(key, models.report, this.logger.child('Reporter')),
        learningStore: this.learningStore,
        insightExtractor: new AnthropicInsightExtractor(key, models.insights, this.logger.child('Learning')),
      },
      {
        maxRetries: config.maxRetries,
        sessionTimeoutMs: config.sessionTimeoutMs,
        sessionLogsPath: config.sessionLogsPath,
        logger: this.logger.child('Orchestrator'),
        onSnapshot: options.onSnapshot,
      }
    );
  }

  /**
   * Connects to the MCP server. Must be called before investigating.
   */
  async initialize(): Promise<void> {
    this.logger.info('Initializing...');
    await this.mcp.connect();
    const intents = this.plans.listIntents();
    this.logger.info(`Plans available: ${intents.length > 0 ? intents.join(', ') : 'none'} (${this.config.plansDir})`);
  }

  /** Runs one investigation to its terminal session. */
  investigate(userQuery: string, options: RunOptions = {}): Promise<InvestigationSession> {
    return this.orchestrator.run(userQuery, options);
  }

  /** Runs one investigation and returns its report. */
  submit(userQuery: string, options: RunOptions = {}): Promise<string> {
    return this.orchestrator.submit(userQuery, options);
  }

  listPlans(): InvestigationPlan[] {
    return this.plans.loadAll();
  }

  listDevices(): Promise<DeviceTarget[]> {
    return this.inventory.listDevices();
  }

  recallLearnings(): Promise<LearningContext> {
    return this.learningStore.recall();
  }

  async shutdown(): Promise<void> {
    await this.mcp.shutdown();
  }
}

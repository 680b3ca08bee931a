/**
 * Plan Repository - loads investigation templates by intent key.
 *
 * Each plan lives in `<plansDir>/<intent>.json`:
 *
 * ```json
 * {
 *   "intent": "bgp_health",
 *   "description": "Determine whether all BGP sessions are established ...",
 *   "steps": ["Retrieve the BGP neighbor summary", "..."]
 * }
 * ```
 *
 * Plans are validated on first load and cached as frozen objects.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PlanFormatError, PlanNotFoundError, errorMessage } from '../core/errors.js';
import type { InvestigationPlan } from '../core/types.js';

/** Fixed extension appended to the intent to form a plan's filename. */
export const PLAN_FILE_EXTENSION = '.json';

const INTENT_RE = /^[A-Za-z0-9_\-]+$/;

export const planDocumentSchema = z.object({
  intent: z.string().regex(INTENT_RE, 'intent may only contain letters, digits, "_" and "-"'),
  description: z.string().trim().min(1),
  steps: z.array(z.string().trim().min(1)).min(1),
});

export type PlanDocument = z.infer<typeof planDocumentSchema>;

export class PlanRepository {
  private readonly plansDir: string;
  private readonly cache: Map<string, InvestigationPlan> = new Map();

  constructor(plansDir: string) {
    this.plansDir = plansDir;
  }

  /**
   * Returns the intents that have a plan file, sorted alphabetically.
   */
  listIntents(): string[] {
    if (!fs.existsSync(this.plansDir)) return [];
    return fs
      .readdirSync(this.plansDir)
      .filter((file) => file.endsWith(PLAN_FILE_EXTENSION))
      .map((file) => file.slice(0, -PLAN_FILE_EXTENSION.length))
      .filter((intent) => INTENT_RE.test(intent))
      .sort();
  }

  /**
   * Loads the plan for `intent`.
   *
   * @throws PlanNotFoundError when no `<intent>.json` exists
   * @throws PlanFormatError when the document is not valid JSON, fails the
   *   schema, or declares an intent different from its filename
   */
  load(intent: string): InvestigationPlan {
    const cached = this.cache.get(intent);
    if (cached) return cached;

    const file = path.join(this.plansDir, intent + PLAN_FILE_EXTENSION);
    if (!INTENT_RE.test(intent) || !fs.existsSync(file)) {
      throw new PlanNotFoundError(intent, this.listIntents());
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new PlanFormatError(file, `invalid JSON (${errorMessage(error)})`);
    }

    const parsed = planDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PlanFormatError(file, issues);
    }
    if (parsed.data.intent !== intent) {
      throw new PlanFormatError(
        file,
        `declares intent "${parsed.data.intent}" but the filename requires "${intent}"`
      );
    }

    const plan: InvestigationPlan = Object.freeze({
      intent: parsed.data.intent,
      objectiveDescription: parsed.data.description.trim(),
      steps: Object.freeze(parsed.data.steps.map((step) => step.trim())),
    });
    this.cache.set(intent, plan);
    return plan;
  }

  /** Loads every plan in the directory. */
  loadAll(): InvestigationPlan[] {
    return this.listIntents().map((intent) => this.load(intent));
  }
}

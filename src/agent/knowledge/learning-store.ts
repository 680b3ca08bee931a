/**
 * Learning Store - cross-session memory kept in a JSON file.
 *
 * The file holds an array of session entries, oldest first. Only the most
 * recent MAX_LEARNING_ENTRIES survive a write.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { LearningStore } from '../core/contracts.js';
import type { LearningContext, LearningEntry } from '../core/types.js';

/** Entries kept on disk. */
export const MAX_LEARNING_ENTRIES = 20;

/** Most recent entries handed to planning and assessment. */
export const RECALL_LIMIT = 5;

const learningEntrySchema = z.object({
  sessionId: z.string(),
  recordedAt: z.string(),
  userQuery: z.string(),
  devices: z.array(z.string()),
  report: z.string(),
  learnedPatterns: z.string().default(''),
  deviceRelationships: z.string().default(''),
});

const learningFileSchema = z.array(learningEntrySchema);

export class JsonLearningStore implements LearningStore {
  private readonly filePath: string;
  private readonly recallLimit: number;

  constructor(filePath: string, recallLimit: number = RECALL_LIMIT) {
    this.filePath = filePath;
    this.recallLimit = recallLimit;
  }

  /**
   * All stored entries, oldest first. A missing file is an empty store; an
   * unreadable one is an error so that `remember` never overwrites it.
   */
  async entries(): Promise<LearningEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    if (!raw.trim()) return [];

    const parsed = learningFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Learning store ${this.filePath} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  async recall(): Promise<LearningContext> {
    const recent = (await this.entries()).slice(-this.recallLimit);
    return {
      previousReports: recent.map((entry) => entry.report).filter(Boolean),
      learnedPatterns: recent.map((entry) => entry.learnedPatterns).filter(Boolean),
      deviceRelationships: recent.map((entry) => entry.deviceRelationships).filter(Boolean),
    };
  }

  async remember(entry: LearningEntry): Promise<void> {
    const entries = [...(await this.entries()), entry].slice(-MAX_LEARNING_ENTRIES);
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(entries, null, 2) + '\n');
  }
}

/**
 * Where question plans come from. The matching subsystem serves them over
 * HTTP; without one configured, a static plan on disk is used.
 */

import fs from 'fs';
import path from 'path';
import axios from 'axios';
import { z } from 'zod';
import { config } from '../../config';
import { logger } from '../../config/logger';
import type { PlanItemInput } from '../../types';
import { InvalidPlanError } from './errors';

const planItemSchema = z.object({
  id: z.string().min(1).optional(),
  topic: z.string().min(1),
  question: z.string().optional(),
  generate: z.boolean().optional(),
  hint: z.string().optional(),
  expectedPoints: z.array(z.string()).optional(),
  competencyIds: z.array(z.string()).optional(),
  followUpPrompt: z.string().optional(),
  minMs: z.number().int().nonnegative().optional(),
  targetMs: z.number().int().nonnegative().optional(),
  maxMs: z.number().int().nonnegative().optional(),
  weight: z.number().nonnegative().optional(),
});

export const planPayloadSchema = z.object({
  items: z.array(planItemSchema),
});

/** Parses an untrusted plan payload; a bare array is accepted as the item list. */
export function parsePlanPayload(payload: unknown): PlanItemInput[] {
  const result = planPayloadSchema.safeParse(Array.isArray(payload) ? { items: payload } : payload);
  if (!result.success) {
    throw new InvalidPlanError(result.error.issues.map((issue) => `${issue.path.join('.') || 'plan'}: ${issue.message}`));
  }
  return result.data.items;
}

export interface PlanRequest {
  candidateId: string;
  jobId: string;
}

export interface PlanSource {
  fetchPlan(request: PlanRequest): Promise<PlanItemInput[]>;
}

export class HttpPlanSource implements PlanSource {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number = config.planService.timeoutMs
  ) {}

  async fetchPlan(request: PlanRequest): Promise<PlanItemInput[]> {
    const url = `${this.baseUrl.replace(/\/$/, '')}/plans`;
    logger.debug('Fetching question plan', { url, ...request });
    const response = await axios.get<unknown>(url, {
      params: { candidateId: request.candidateId, jobId: request.jobId },
      timeout: this.timeoutMs,
    });
    return parsePlanPayload(response.data);
  }
}

export const DEFAULT_PLAN_PATH = path.resolve(__dirname, '../../../data/default-plan.json');

/** Same plan for every candidate, read once from a JSON file. */
export class StaticPlanSource implements PlanSource {
  private cached: PlanItemInput[] | null = null;

  constructor(private readonly filePath: string = DEFAULT_PLAN_PATH) {}

  async fetchPlan(): Promise<PlanItemInput[]> {
    if (!this.cached) {
      const raw = await fs.promises.readFile(this.filePath, 'utf8');
      const parsed: unknown = JSON.parse(raw);
      this.cached = parsePlanPayload(parsed);
    }
    return this.cached.map((item) => ({ ...item }));
  }
}

export function createPlanSource(): PlanSource {
  return config.planService.url ? new HttpPlanSource(config.planService.url) : new StaticPlanSource();
}

/**
 * Session types
 *
 * An intake session is the conversation, the accumulated facts and every
 * derived value the next turn builds on. On disk it is split into listing
 * metadata, the conversation log and the derived state.
 */

import { z } from "zod";
import {
  BUSINESS_CATEGORIES,
  BUSINESS_MODELS,
  PROBLEM_PATTERNS,
  SIZE_INDICATORS,
  TARGET_MARKETS,
  type BusinessProfile,
} from "../classifier/types.js";
import { PHASES, type Phase } from "../phases/machine.js";
import {
  BackgroundPlanStatusSchema,
  PLAN_STATUSES,
  type BackgroundPlanStatus,
} from "../planning/status.js";
import { PlanSchema, type Plan } from "../planning/types.js";
import { FactMapSchema, type FactMap } from "../scoring/facts.js";

export const SessionIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, "Session ids use letters, digits, '-' and '_' (max 64)");

export const ConversationMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string().datetime(),
});

export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;

const ScoreSchema = z.number().min(0).max(1);

export const BusinessProfileSchema: z.ZodType<BusinessProfile, z.ZodTypeDef, unknown> = z.object({
  category: z.enum(BUSINESS_CATEGORIES),
  subcategory: z.string(),
  industry: z.string(),
  businessModel: z.union([z.enum(BUSINESS_MODELS), z.literal("unknown")]),
  targetMarket: z.union([z.enum(TARGET_MARKETS), z.literal("unknown")]),
  sizeIndicator: z.union([z.enum(SIZE_INDICATORS), z.literal("unknown")]),
  confidence: ScoreSchema,
  keywordsMatched: z.array(z.string()),
  problemPatterns: z.array(z.enum(PROBLEM_PATTERNS)),
  toolsMentioned: z.array(z.string()),
  suggestedQuestions: z.array(z.string()).max(4),
  categoryScores: z.object({
    saas: ScoreSchema,
    ecommerce: ScoreSchema,
    agency: ScoreSchema,
    marketplace: ScoreSchema,
    professional_services: ScoreSchema,
    healthcare: ScoreSchema,
    fintech: ScoreSchema,
    edtech: ScoreSchema,
    logistics: ScoreSchema,
    hospitality: ScoreSchema,
    retail: ScoreSchema,
    manufacturing: ScoreSchema,
    nonprofit: ScoreSchema,
    media: ScoreSchema,
    real_estate: ScoreSchema,
  }),
});

/**
 * metadata.json: what a listing needs without reading the rest
 */
export const SessionMetadataSchema = z.object({
  id: SessionIdSchema,
  title: z.string(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  messageCount: z.number().int().nonnegative(),
  progress: z.number().int().min(0).max(100),
  phase: z.enum(PHASES),
  category: z.enum(BUSINESS_CATEGORIES).nullable(),
  planStatus: z.enum(PLAN_STATUSES),
});

export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;

/**
 * state.json: everything derived from the conversation
 */
export const SessionStateSchema = z.object({
  facts: FactMapSchema,
  profile: BusinessProfileSchema.nullable(),
  progress: z.number().int().min(0).max(100),
  phase: z.enum(PHASES),
  readyForGeneration: z.boolean(),
  planStatus: BackgroundPlanStatusSchema,
  plan: PlanSchema.optional(),
});

export type SessionState = z.infer<typeof SessionStateSchema>;

export interface IntakeSession {
  id: string;
  createdAt: string;
  updatedAt: string;
  messages: ConversationMessage[];
  facts: FactMap;
  /** Set by the first classification confident enough to accept */
  profile: BusinessProfile | null;
  progress: number;
  phase: Phase;
  readyForGeneration: boolean;
  planStatus: BackgroundPlanStatus;
  plan?: Plan;
}

/**
 * Single-file form used by export and import
 */
export const SessionExportSchema = z.object({
  version: z.literal(1),
  metadata: SessionMetadataSchema,
  messages: z.array(ConversationMessageSchema),
  state: SessionStateSchema,
});

export type SessionExport = z.infer<typeof SessionExportSchema>;

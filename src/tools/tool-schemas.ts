import { z } from 'zod';
import type { FunctionToolDef } from '../lib/reasoning-engine.js';

export const TOOL_NAMES = [
  'get_profile',
  'get_aggregated_stats',
  'get_flagged_examples',
  'set_risk_status',
  'open_review_case',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((known) => known === name);
}

/** Read-only tools; safe to dispatch concurrently within one batch */
export const READ_ONLY_TOOLS: readonly ToolName[] = [
  'get_profile',
  'get_aggregated_stats',
  'get_flagged_examples',
];

const isoDateTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/, 'expected ISO date-time (YYYY-MM-DDTHH:MM:SS)');

export const toolSchemas: Record<ToolName, z.ZodType<Record<string, unknown>>> = {
  get_profile: z.object({
    subject_id: z.string().min(1),
  }).strict(),

  get_aggregated_stats: z.object({
    subject_id: z.string().min(1),
    start: isoDateTime,
    end: isoDateTime,
  }).strict(),

  get_flagged_examples: z.object({
    subject_id: z.string().min(1),
    start: isoDateTime,
    end: isoDateTime,
    threshold: z.number().nonnegative().optional(),
  }).strict(),

  set_risk_status: z.object({
    subject_id: z.string().min(1),
    new_status: z.string().min(1),
    reason_code: z.string().min(1),
  }).strict(),

  open_review_case: z.object({
    subject_id: z.string().min(1),
    category: z.string().min(1),
    summary: z.string().min(1),
    indicators: z.array(z.string()),
  }).strict(),
};

// ─── Function definitions for agent provisioning ─────────────────────

const subjectId = { type: 'string', description: 'The unique ID of the merchant.' };
const start = { type: 'string', description: 'Start of the window, ISO format (YYYY-MM-DDTHH:MM:SS).' };
const end = { type: 'string', description: 'End of the window, ISO format (YYYY-MM-DDTHH:MM:SS).' };

export const toolDefinitions: Record<ToolName, FunctionToolDef> = {
  get_profile: {
    name: 'get_profile',
    description: 'Gets profile information for a specific merchant ID.',
    parameters: {
      type: 'object',
      properties: { subject_id: subjectId },
      required: ['subject_id'],
    },
  },
  get_aggregated_stats: {
    name: 'get_aggregated_stats',
    description:
      'Aggregated transaction statistics for a merchant within a date range: counts, totals, averages, card type and country distributions, rounded-amount share.',
    parameters: {
      type: 'object',
      properties: { subject_id: subjectId, start, end },
      required: ['subject_id', 'start', 'end'],
    },
  },
  get_flagged_examples: {
    name: 'get_flagged_examples',
    description:
      'Up to 10 example transactions for a merchant within a date range whose amount is at or above the threshold.',
    parameters: {
      type: 'object',
      properties: {
        subject_id: subjectId,
        start,
        end,
        threshold: { type: 'number', description: 'Minimum amount to flag (default 1000.0).' },
      },
      required: ['subject_id', 'start', 'end'],
    },
  },
  set_risk_status: {
    name: 'set_risk_status',
    description: "Updates the merchant's risk status based on analysis.",
    parameters: {
      type: 'object',
      properties: {
        subject_id: subjectId,
        new_status: { type: 'string', description: "The new risk status (e.g. 'High', 'Medium', 'Low', 'Watchlist')." },
        reason_code: { type: 'string', description: 'A brief code or reason for the status change.' },
      },
      required: ['subject_id', 'new_status', 'reason_code'],
    },
  },
  open_review_case: {
    name: 'open_review_case',
    description: 'Creates a manual compliance review case when high risk is detected.',
    parameters: {
      type: 'object',
      properties: {
        subject_id: subjectId,
        category: { type: 'string', description: "The assessed risk category (e.g. 'High', 'Critical')." },
        summary: { type: 'string', description: 'A concise summary of the reasons for escalation.' },
        indicators: {
          type: 'array',
          items: { type: 'string' },
          description: 'Specific laundering indicators detected.',
        },
      },
      required: ['subject_id', 'category', 'summary', 'indicators'],
    },
  },
};

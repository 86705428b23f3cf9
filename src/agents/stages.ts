/**
 * Stage catalogue: the fixed pipeline ordering and its binding to
 * engine-side agent ids from configuration.
 */

import type { AppConfig } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import type { ReasoningEngine } from '../lib/reasoning-engine.js';
import logger from '../lib/logger.js';
import { toolDefinitions } from '../tools/tool-schemas.js';
import { dataAggregationStage } from './data-aggregation/agent.js';
import { patternDetectionStage } from './pattern-detection/agent.js';
import { riskAssessmentStage } from './risk-assessment/agent.js';
import { actionAlertingStage } from './action-alerting/agent.js';
import type { StageDefinition, StageName, StageTemplate } from './runtime/agent-protocol.js';

/** Pipeline order. Identical for every subject. */
export const STAGE_TEMPLATES: readonly StageTemplate[] = [
  dataAggregationStage,
  patternDetectionStage,
  riskAssessmentStage,
  actionAlertingStage,
];

export const AGENT_ID_ENV_KEYS = {
  data_aggregation: 'AGENT_ID_DATA_AGGREGATION',
  pattern_detection: 'AGENT_ID_PATTERN_DETECTION',
  risk_assessment: 'AGENT_ID_RISK_ASSESSMENT',
  action_alerting: 'AGENT_ID_ACTION_ALERTING',
} as const satisfies Record<StageName, keyof AppConfig>;

export type AgentIds = Record<StageName, string>;

/** Bind templates to agent ids, in pipeline order. */
export function buildStageDefinitions(
  agentIds: AgentIds,
  templates: readonly StageTemplate[] = STAGE_TEMPLATES,
): StageDefinition[] {
  return templates.map((template, position) => ({
    ...template,
    agentId: agentIds[template.identity.name],
    position,
  }));
}

/** Read the four agent ids from configuration; every one is required. */
export function resolveAgentIds(config: AppConfig): AgentIds {
  const missing: string[] = [];
  const read = (stage: StageName): string => {
    const key = AGENT_ID_ENV_KEYS[stage];
    const value = config[key];
    if (!value) missing.push(key);
    return value ?? '';
  };

  const ids: AgentIds = {
    data_aggregation: read('data_aggregation'),
    pattern_detection: read('pattern_detection'),
    risk_assessment: read('risk_assessment'),
    action_alerting: read('action_alerting'),
  };

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing agent ids: ${missing.join(', ')}. Run the 'provision' command once and set the printed values.`,
    );
  }
  return ids;
}

/**
 * Create one engine-side agent per stage with its instructions and tool
 * subset. Explicit operation; nothing calls it implicitly.
 */
export async function provisionStageAgents(
  engine: ReasoningEngine,
  model: string,
  templates: readonly StageTemplate[] = STAGE_TEMPLATES,
): Promise<AgentIds> {
  const ids: Partial<AgentIds> = {};
  for (const template of templates) {
    const id = await engine.createAgent({
      name: template.identity.title,
      instructions: template.instructions,
      model,
      tools: template.tools.map((name) => toolDefinitions[name]),
    });
    logger.info({ stage: template.identity.name, agentId: id }, 'Provisioned stage agent');
    ids[template.identity.name] = id;
  }

  const {
    data_aggregation,
    pattern_detection,
    risk_assessment,
    action_alerting,
  } = ids;
  if (!data_aggregation || !pattern_detection || !risk_assessment || !action_alerting) {
    throw new ConfigError('Provisioning requires a template for every stage');
  }
  return { data_aggregation, pattern_detection, risk_assessment, action_alerting };
}

import { vi, describe, it, expect } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const noopLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
  return { default: noopLogger, createSessionLogger: vi.fn(() => noopLogger) };
});

import {
  STAGE_TEMPLATES,
  buildStageDefinitions,
  provisionStageAgents,
  resolveAgentIds,
} from '../agents/stages.js';
import { loadConfig } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import { READ_ONLY_TOOLS } from '../tools/tool-schemas.js';
import { FakeEngine } from './helpers/fake-engine.js';

const FULL_ENV = {
  AGENT_ID_DATA_AGGREGATION: 'asst_1',
  AGENT_ID_PATTERN_DETECTION: 'asst_2',
  AGENT_ID_RISK_ASSESSMENT: 'asst_3',
  AGENT_ID_ACTION_ALERTING: 'asst_4',
};

describe('stage catalogue', () => {
  it('keeps the fixed pipeline order', () => {
    expect(STAGE_TEMPLATES.map((t) => t.identity.name)).toEqual([
      'data_aggregation',
      'pattern_detection',
      'risk_assessment',
      'action_alerting',
    ]);
  });

  it('gives mutating tools to the alerting stage only', () => {
    for (const template of STAGE_TEMPLATES.slice(0, 3)) {
      expect(template.tools.every((tool) => READ_ONLY_TOOLS.includes(tool))).toBe(true);
    }
    expect(STAGE_TEMPLATES[3].tools).toEqual(['set_risk_status', 'open_review_case']);
    expect(STAGE_TEMPLATES[3].parallel_safe_tools).toEqual([]);
  });

  it('marks only tools the stage may call as parallel-safe', () => {
    for (const template of STAGE_TEMPLATES) {
      expect(template.parallel_safe_tools.every((tool) => template.tools.includes(tool))).toBe(true);
    }
  });
});

describe('resolveAgentIds', () => {
  it('reads one agent id per stage', () => {
    expect(resolveAgentIds(loadConfig(FULL_ENV))).toEqual({
      data_aggregation: 'asst_1',
      pattern_detection: 'asst_2',
      risk_assessment: 'asst_3',
      action_alerting: 'asst_4',
    });
  });

  it('lists every missing id', () => {
    const config = loadConfig({ AGENT_ID_DATA_AGGREGATION: 'asst_1', AGENT_ID_PATTERN_DETECTION: 'asst_2' });

    expect(() => resolveAgentIds(config)).toThrow(ConfigError);
    expect(() => resolveAgentIds(config)).toThrow(
      "Missing agent ids: AGENT_ID_RISK_ASSESSMENT, AGENT_ID_ACTION_ALERTING. Run the 'provision' command once and set the printed values.",
    );
  });
});

describe('buildStageDefinitions', () => {
  it('binds agent ids and positions in pipeline order', () => {
    const stages = buildStageDefinitions(resolveAgentIds(loadConfig(FULL_ENV)));

    expect(stages.map((s) => [s.identity.name, s.agentId, s.position])).toEqual([
      ['data_aggregation', 'asst_1', 0],
      ['pattern_detection', 'asst_2', 1],
      ['risk_assessment', 'asst_3', 2],
      ['action_alerting', 'asst_4', 3],
    ]);
  });
});

describe('provisionStageAgents', () => {
  it('creates one agent per stage with its instructions and tool subset', async () => {
    const engine = new FakeEngine();

    const ids = await provisionStageAgents(engine, 'test-model');

    expect(ids).toEqual({
      data_aggregation: 'asst_1',
      pattern_detection: 'asst_2',
      risk_assessment: 'asst_3',
      action_alerting: 'asst_4',
    });
    expect(engine.createdAgents.map((a) => a.name)).toEqual([
      'Data Aggregation',
      'Pattern Detection',
      'Risk Assessment',
      'Action Alerting',
    ]);
    expect(engine.createdAgents.every((a) => a.model === 'test-model')).toBe(true);
    expect(engine.createdAgents[2].tools).toEqual([]);
    expect(engine.createdAgents[3].tools.map((t) => t.name)).toEqual(['set_risk_status', 'open_review_case']);
    expect(engine.createdAgents[0].instructions).toBe(STAGE_TEMPLATES[0].instructions);
  });

  it('refuses a template list that does not cover every stage', async () => {
    await expect(provisionStageAgents(new FakeEngine(), 'test-model', STAGE_TEMPLATES.slice(0, 2)))
      .rejects.toThrow('Provisioning requires a template for every stage');
  });
});

import type { StageTemplate } from '../runtime/agent-protocol.js';
import { RISK_ASSESSMENT_INSTRUCTIONS } from './prompts.js';

/** Pure judgement stage: no tools, so any tool request is refused. */
export const riskAssessmentStage: StageTemplate = {
  identity: {
    name: 'risk_assessment',
    title: 'Risk Assessment',
    domain: 'merchant_risk',
  },
  instructions: RISK_ASSESSMENT_INSTRUCTIONS,
  tools: [],
  parallel_safe_tools: [],
};

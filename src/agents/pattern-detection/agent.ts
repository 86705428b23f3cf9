import { READ_ONLY_TOOLS } from '../../tools/tool-schemas.js';
import type { StageTemplate } from '../runtime/agent-protocol.js';
import { PATTERN_DETECTION_INSTRUCTIONS } from './prompts.js';

export const patternDetectionStage: StageTemplate = {
  identity: {
    name: 'pattern_detection',
    title: 'Pattern Detection',
    domain: 'merchant_risk',
  },
  instructions: PATTERN_DETECTION_INSTRUCTIONS,
  tools: READ_ONLY_TOOLS,
  parallel_safe_tools: READ_ONLY_TOOLS,
};

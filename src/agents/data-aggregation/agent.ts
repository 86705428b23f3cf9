/**
 * Data Aggregation: first stage. Reads the seeded request and collects the
 * merchant's profile, window statistics and flagged examples.
 */

import { READ_ONLY_TOOLS } from '../../tools/tool-schemas.js';
import type { StageTemplate } from '../runtime/agent-protocol.js';
import { DATA_AGGREGATION_INSTRUCTIONS } from './prompts.js';

export const dataAggregationStage: StageTemplate = {
  identity: {
    name: 'data_aggregation',
    title: 'Data Aggregation',
    domain: 'merchant_risk',
  },
  instructions: DATA_AGGREGATION_INSTRUCTIONS,
  tools: READ_ONLY_TOOLS,
  parallel_safe_tools: READ_ONLY_TOOLS,
};

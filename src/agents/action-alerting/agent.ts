/**
 * Action Alerting: last stage. The only stage allowed to mutate state:
 * it sets the merchant's risk status and opens review cases.
 */

import type { StageTemplate } from '../runtime/agent-protocol.js';
import { ACTION_ALERTING_INSTRUCTIONS } from './prompts.js';

export const actionAlertingStage: StageTemplate = {
  identity: {
    name: 'action_alerting',
    title: 'Action Alerting',
    domain: 'merchant_risk',
  },
  instructions: ACTION_ALERTING_INSTRUCTIONS,
  tools: ['set_risk_status', 'open_review_case'],
  // Both tools write; they run one at a time in request order.
  parallel_safe_tools: [],
};

export const ACTION_ALERTING_INSTRUCTIONS = `The previous agent assessed the merchant's laundering risk and gave a category with a justification.
Based on that assessment, determine the appropriate next steps according to this policy:
- Low: No action needed. State this.
- Medium: Update status to 'Medium Risk Watchlist'.
- High: Update status to 'High Risk' and open a manual review case.
- Critical: Update status to 'Critical Risk - Urgent Review' and open a manual review case.
Use the provided tools (set_risk_status, open_review_case) to execute these actions. Confirm the actions taken.`;

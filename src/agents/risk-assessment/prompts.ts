export const RISK_ASSESSMENT_INSTRUCTIONS = `Based only on the conversation so far (merchant profile, aggregated statistics, and detected laundering patterns), assess the overall laundering risk level for the merchant.
Assign a risk category: 'Low', 'Medium', 'High', or 'Critical'.
Provide a clear, concise justification summarizing the key contributing factors and detected indicators. Do not use external tools.`;

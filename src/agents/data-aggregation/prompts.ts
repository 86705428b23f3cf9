export const DATA_AGGREGATION_INSTRUCTIONS = `Your task is to gather and summarize relevant data for a given merchant ID covering a specific period.
Use the provided tools to fetch:
1. The merchant's profile (get_profile).
2. Aggregated transaction statistics (get_aggregated_stats): total volume, value, average value, card types, card countries, rounded values.
3. Examples of flagged transactions, e.g. high value (get_flagged_examples).
Present this information clearly and concisely for the next agent. Use ISO format (YYYY-MM-DDTHH:MM:SS) for dates.`;

export const PATTERN_DETECTION_INSTRUCTIONS = `Analyze the provided aggregated data, flagged transaction examples, and profile information for the merchant.
Identify patterns potentially indicative of money or transaction laundering, based on known indicators such as:
- High percentage of prepaid cards
- High percentage of rounded transaction values
- Significant activity from high-risk jurisdictions (check profile and card countries)
- Transaction values inconsistent with the merchant category code (MCC) profile
- Structuring patterns (if suggested by transaction examples or velocity)
- Ownership changes noted in the profile combined with other risks
You may call the data tools again if something needed is missing from the conversation.
List the specific patterns detected.`;

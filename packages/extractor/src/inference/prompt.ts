export const DEFAULT_MAX_TEXT_LENGTH = 15000;

/**
 * Prompt asking for a strict JSON list of offers found in the page text.
 * The text is cut to `maxTextLength` characters to fit the model context.
 */
export function buildOfferPrompt(
  operator: string,
  pageText: string,
  maxTextLength: number = DEFAULT_MAX_TEXT_LENGTH
): string {
  const snippet = pageText.substring(0, maxTextLength);

  return `Extract every mobile bundle offer from this ${operator} web page text.
Return ONLY a JSON array, no commentary, where each item looks like:
{"name": "Weekly Super Card", "price": "250", "validity": "Weekly", "details": "10GB Data, 500 Mins"}

Rules:
- "price": digits only, without currency
- "validity": one of "Daily", "Weekly", "Monthly", "3 Days" or "N/A"
- "details": data, minutes and SMS allowances joined with ", "
- If there are no offers, return []

Page text:
${snippet}`;
}

export const JSON_FORMAT_INSTRUCTIONS = `CRITICAL FORMATTING INSTRUCTIONS:
- Return ONLY valid JSON
- Do NOT include any markdown formatting (no \`\`\`json or \`\`\`)
- Do NOT include any explanatory text before or after the JSON
- Start your response with { and end with }
- Ensure all JSON is properly formatted and parseable`;

export function withJsonInstructions(prompt: string): string {
  return `${prompt}\n\n${JSON_FORMAT_INSTRUCTIONS}`;
}

/**
 * Strip code fences and surrounding prose from a model answer, keeping the
 * span from the first `{` to the last `}`.
 */
export function extractJson(raw: string): string {
  let text = raw.replace(/```json\s*/g, "").replace(/```\s*/g, "");

  const start = text.indexOf("{");
  if (start !== -1) text = text.slice(start);

  const end = text.lastIndexOf("}");
  if (end !== -1) text = text.slice(0, end + 1);

  return text.trim();
}

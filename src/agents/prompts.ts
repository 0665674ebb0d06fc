import type { Heading } from '../types/analysis.js';

export const RESPONSE_FORMAT = `Return ONLY this JSON (no markdown, no explanation):
{
  "score": <integer 0-100>,
  "findings": [
    { "severity": "info" | "warning" | "critical", "message": "<finding>", "evidence": "<value from the data>" }
  ],
  "summary": "<one-sentence overall assessment>"
}`;

export function groundingRules(subject: string): string {
  return `IMPORTANT RULES:
- Base your evaluation ONLY on the ${subject} provided above.
- Every finding MUST reference a specific value from the data and cite it as evidence.
- Do NOT assume or infer anything that is not present in the data.`;
}

export function formatHeadings(headings: Heading[], limit = 30): string {
  if (headings.length === 0) return '(none)';
  return headings
    .slice(0, limit)
    .map((h) => `h${h.level}: ${h.text}`)
    .join('\n');
}

export function excerpt(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

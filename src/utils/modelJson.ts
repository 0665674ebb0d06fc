import { z } from 'zod';
import type { Finding, Severity } from '../types/analysis.js';
import { MalformedOutputError } from './errors.js';

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls a JSON object out of a model reply. Accepts raw JSON, a ```json
 * fenced block, or the outermost {...} span of surrounding prose.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const direct = tryParse(trimmed);
  if (isPlainObject(direct)) return direct;

  const fenced = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (fenced) {
    const parsed = tryParse(fenced[1]);
    if (isPlainObject(parsed)) return parsed;
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const parsed = tryParse(trimmed.slice(start, end + 1));
    if (isPlainObject(parsed)) return parsed;
  }

  return null;
}

const severitySchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(['INFO', 'WARNING', 'CRITICAL']));

const findingSchema = z.union([
  z.string().min(1).transform((message): Finding => ({ severity: 'INFO', message })),
  z
    .object({
      severity: severitySchema.optional(),
      message: z.string().min(1),
      evidence: z.string().optional(),
    })
    .transform((finding): Finding => {
      const severity: Severity = finding.severity ?? 'INFO';
      return finding.evidence
        ? { severity, message: finding.message, evidence: finding.evidence }
        : { severity, message: finding.message };
    }),
]);

const scoreSchema = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^\s*-?\d+(\.\d+)?\s*$/)
    .transform(Number),
]);

export const verdictSchema = z.object({
  score: scoreSchema,
  findings: z.array(findingSchema).optional().default([]),
  summary: z.string().optional().default(''),
});

export type ModelVerdict = z.infer<typeof verdictSchema>;

export function parseVerdict(raw: string): ModelVerdict {
  const candidate = extractJsonObject(raw);
  if (!candidate) {
    throw new MalformedOutputError('Model reply contained no JSON object', raw);
  }
  const parsed = verdictSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'unknown issue';
    throw new MalformedOutputError(`Model reply failed validation (${where})`, raw);
  }
  return parsed.data;
}

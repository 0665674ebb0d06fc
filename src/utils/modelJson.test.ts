import { describe, expect, it } from 'vitest';
import { MalformedOutputError } from './errors.js';
import { extractJsonObject, parseVerdict } from './modelJson.js';

describe('extractJsonObject', () => {
  it('reads a bare JSON object', () => {
    expect(extractJsonObject('{"score": 70}')).toEqual({ score: 70 });
  });

  it('reads a fenced block', () => {
    expect(extractJsonObject('Here you go:\n```json\n{"score": 70}\n```\nDone.')).toEqual({ score: 70 });
  });

  it('reads the outermost braces inside prose', () => {
    expect(extractJsonObject('Sure! {"score": 85, "summary": "ok"} Thanks')).toEqual({ score: 85, summary: 'ok' });
  });

  it('returns null for arrays and plain text', () => {
    expect(extractJsonObject('[1, 2]')).toBeNull();
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('   ')).toBeNull();
  });
});

describe('parseVerdict', () => {
  it('fills defaults and normalizes findings', () => {
    const parsed = parseVerdict(
      JSON.stringify({
        score: '85',
        findings: ['Clear headline', { severity: 'critical', message: 'No contact page', evidence: 'links' }],
      })
    );

    expect(parsed).toEqual({
      score: 85,
      findings: [
        { severity: 'INFO', message: 'Clear headline' },
        { severity: 'CRITICAL', message: 'No contact page', evidence: 'links' },
      ],
      summary: '',
    });
  });

  it('keeps out-of-range scores for the agent to clamp', () => {
    expect(parseVerdict('{"score": 140}').score).toBe(140);
  });

  it('rejects replies without JSON', () => {
    expect(() => parseVerdict('I cannot rate this page.')).toThrow(MalformedOutputError);
    expect(() => parseVerdict('I cannot rate this page.')).toThrow('Model reply contained no JSON object');
  });

  it('rejects a missing or non-numeric score', () => {
    expect(() => parseVerdict('{"summary": "fine"}')).toThrow(/score/);
    expect(() => parseVerdict('{"score": null}')).toThrow(MalformedOutputError);
    expect(() => parseVerdict('{"score": "high"}')).toThrow(MalformedOutputError);
  });

  it('rejects an unknown severity', () => {
    expect(() => parseVerdict('{"score": 50, "findings": [{"severity": "fatal", "message": "x"}]}')).toThrow(
      MalformedOutputError
    );
  });

  it('keeps the raw reply on the error', () => {
    try {
      parseVerdict('nope');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedOutputError);
      expect(error instanceof MalformedOutputError && error.raw).toBe('nope');
    }
  });
});

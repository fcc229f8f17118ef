import { describe, it, expect } from 'vitest';
import { GenerationError } from '@/errors';
import {
  formatEvidence,
  reduceContext,
  ResponseGenerator,
  SYSTEM_PROMPT,
  type GenerationContext,
} from '@/services/responseGeneration.service';
import type { HistoryTurn } from '@/services/queryProcessing.service';
import { answer, result, ScriptedGenerationRepository } from '../../helpers/repositories';

function historyOf(count: number): HistoryTurn[] {
  return Array.from({ length: count }, (_, i): HistoryTurn => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `turn ${i + 1}`,
  }));
}

describe('ResponseGenerator', () => {
  describe('buildTurns', () => {
    const generator = new ResponseGenerator(new ScriptedGenerationRepository([]), { temperature: 0.3 });

    it('frames system, history and the question with numbered evidence', () => {
      const turns = generator.buildTurns({
        message: 'How much leave?',
        history: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
        ],
        evidence: [result('25 days per year.', 0.9, 'leave.md'), result('Five carry over.', 0.4, 'carry.md')],
      });

      expect(turns).toEqual([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        {
          role: 'user',
          content: 'How much leave?\n\nSources:\n[1] leave.md: 25 days per year.\n[2] carry.md: Five carry over.',
        },
      ]);
    });

    it('keeps only the last ten history turns', () => {
      const turns = generator.buildTurns({ message: 'q', history: historyOf(14), evidence: [] });

      expect(turns).toHaveLength(12);
      expect(turns[1]?.content).toBe('turn 5');
      expect(turns[10]?.content).toBe('turn 14');
      expect(turns[11]).toEqual({ role: 'user', content: 'q' });
    });
  });

  describe('generate', () => {
    it('returns the answer, usage and the evidence offered', async () => {
      const evidence = [result('25 days per year.', 0.9, 'leave.md')];
      const repo = new ScriptedGenerationRepository([answer('You get 25 days [1].')]);
      const generator = new ResponseGenerator(repo, { temperature: 0.3 });

      const response = await generator.generate({ message: 'How much leave?', history: [], evidence });

      expect(response).toEqual({
        answer: 'You get 25 days [1].',
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15, model: 'test-model' },
        provenance: evidence,
      });
      expect(repo.calls[0]?.evidence).toEqual(evidence);
    });

    it('treats an empty answer as a generation failure', async () => {
      const generator = new ResponseGenerator(new ScriptedGenerationRepository([answer('   ')]), {
        temperature: 0.3,
      });

      await expect(generator.generate({ message: 'q', history: [], evidence: [] })).rejects.toThrow(
        'Generation returned an empty answer',
      );
    });

    it('wraps unexpected repository errors in GenerationError', async () => {
      const generator = new ResponseGenerator(new ScriptedGenerationRepository([new Error('socket hang up')]), {
        temperature: 0.3,
      });

      const call = generator.generate({ message: 'q', history: [], evidence: [] });
      await expect(call).rejects.toBeInstanceOf(GenerationError);
      await expect(call).rejects.toThrow('Generation failed: socket hang up');
    });
  });

  describe('generateWithRetry', () => {
    const context: GenerationContext = {
      message: 'q',
      history: historyOf(4),
      evidence: [result('a', 0.9), result('b', 0.8)],
    };

    it('makes a single attempt when the first one succeeds', async () => {
      const repo = new ScriptedGenerationRepository([answer('done')]);
      const attempts: Array<[number, boolean]> = [];

      const response = await new ResponseGenerator(repo, { temperature: 0.3 }).generateWithRetry(context, {
        onAttempt: (attempt, reduced) => attempts.push([attempt, reduced]),
      });

      expect(response.answer).toBe('done');
      expect(attempts).toEqual([[1, false]]);
      expect(repo.calls).toHaveLength(1);
    });

    it('retries once on the reduced context and reports the first failure', async () => {
      const repo = new ScriptedGenerationRepository([new GenerationError('busy'), answer('second try')]);
      const retried: string[] = [];

      const response = await new ResponseGenerator(repo, { temperature: 0.3 }).generateWithRetry(context, {
        onRetry: (error) => retried.push(error.message),
      });

      expect(response.answer).toBe('second try');
      expect(response.provenance).toEqual([result('a', 0.9)]);
      expect(retried).toEqual(['busy']);
      // system, last two history turns, question
      expect(repo.calls[1]?.turns).toHaveLength(4);
    });

    it('rethrows the retry failure', async () => {
      const repo = new ScriptedGenerationRepository([new GenerationError('busy'), new GenerationError('still busy')]);

      await expect(
        new ResponseGenerator(repo, { temperature: 0.3 }).generateWithRetry(context),
      ).rejects.toThrow('still busy');
    });
  });
});

describe('reduceContext', () => {
  it('halves the evidence, rounding down, and keeps the last two turns', () => {
    const context: GenerationContext = {
      message: 'q',
      history: historyOf(6),
      evidence: [result('a', 0.9), result('b', 0.8), result('c', 0.7)],
    };

    expect(reduceContext(context)).toEqual({
      message: 'q',
      history: [
        { role: 'user', content: 'turn 5' },
        { role: 'assistant', content: 'turn 6' },
      ],
      evidence: [result('a', 0.9)],
    });
  });
});

describe('formatEvidence', () => {
  it('cuts each passage at 500 characters', () => {
    const formatted = formatEvidence([result('x'.repeat(600), 0.9, 'long.md')]);
    expect(formatted).toBe(`[1] long.md: ${'x'.repeat(500)}`);
  });
});

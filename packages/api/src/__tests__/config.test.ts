import { describe, expect, it } from 'vitest';
import { config } from '../config';
import { defaultPipelineConfig, resolvePipelineConfig } from '../pipeline/config';
import { InvalidPipelineConfigError } from '../utils/errors';

describe('defaultPipelineConfig', () => {
  it('reads pipeline settings from the application config', () => {
    const cfg = defaultPipelineConfig({
      rag: { ...config.rag, topK: 7, citationPolicy: 'all-context' },
      openai: { ...config.openai, model: 'test-model' },
    });

    expect(cfg.retrieval.topK).toBe(7);
    expect(cfg.generation.citationPolicy).toBe('all-context');
    expect(cfg.generation.model).toBe('test-model');
  });
});

describe('resolvePipelineConfig', () => {
  it('merges overrides section by section onto the base', () => {
    const base = defaultPipelineConfig();

    const cfg = resolvePipelineConfig({ retrieval: { mode: 'vector', topK: 3 } }, base);

    expect(cfg.retrieval.mode).toBe('vector');
    expect(cfg.retrieval.topK).toBe(3);
    expect(cfg.retrieval.rrfK).toBe(base.retrieval.rrfK);
    expect(cfg.rerank).toEqual(base.rerank);
  });

  it('keeps the base filters unless a request narrows them', () => {
    const base = resolvePipelineConfig({ retrieval: { filters: { documentId: 'doc-a' } } });

    expect(resolvePipelineConfig({}, base).retrieval.filters).toEqual({ documentId: 'doc-a' });
    expect(
      resolvePipelineConfig({ retrieval: { filters: { documentId: 'doc-b' } } }, base).retrieval.filters
    ).toEqual({ documentId: 'doc-b' });
  });

  it('returns a deeply frozen value', () => {
    const cfg = resolvePipelineConfig();

    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.retrieval)).toBe(true);
    expect(Object.isFrozen(cfg.retrieval.keywordProperties)).toBe(true);
  });

  it('rejects out-of-range values with the offending path', () => {
    const error = (() => {
      try {
        resolvePipelineConfig({ retrieval: { topK: 0 } });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(InvalidPipelineConfigError);
    expect(error instanceof InvalidPipelineConfigError && error.issues[0]).toMatch(/^retrieval\.topK: /);
  });

  it('rejects an alpha outside 0..1', () => {
    expect(() => resolvePipelineConfig({ retrieval: { hybridAlpha: 1.5 } })).toThrow(InvalidPipelineConfigError);
  });
});

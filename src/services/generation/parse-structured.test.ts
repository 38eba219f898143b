import { describe, it, expect } from 'vitest';
import { parseStructured } from './parse-structured';

describe('parseStructured', () => {
  it('parses plain JSON', () => {
    expect(parseStructured('[{"name": "Transit"}]')).toEqual([{ name: 'Transit' }]);
  });

  it('prefers the contents of a fenced block', () => {
    const text = 'Here you go:\n```json\n{"topics": ["a"]}\n```\nAnything else?';
    expect(parseStructured(text)).toEqual({ topics: ['a'] });
  });

  it('accepts fences without a language tag', () => {
    expect(parseStructured('```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it('finds an array inside surrounding prose', () => {
    expect(parseStructured('The events are [{"description": "vote"}] as requested.')).toEqual([
      { description: 'vote' },
    ]);
  });

  it('falls back to an object when no array parses', () => {
    expect(parseStructured('Result: {"stance": "pro"} done')).toEqual({ stance: 'pro' });
  });

  it('returns undefined for prose with no structured data', () => {
    expect(parseStructured("Sure! Here's the data: not json")).toBeUndefined();
  });

  it('returns undefined for empty or missing text', () => {
    expect(parseStructured('')).toBeUndefined();
    expect(parseStructured(null)).toBeUndefined();
    expect(parseStructured(undefined)).toBeUndefined();
  });

  it('returns undefined when the bracketed span is not valid JSON', () => {
    expect(parseStructured('see [this, that] and {that}')).toBeUndefined();
  });
});

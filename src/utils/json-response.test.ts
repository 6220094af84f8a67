import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { extractFirstJsonValue, parseAndValidate, stripCodeFences } from './json-response';

const HookSchema = z.object({ hook: z.string().min(1) });

describe('stripCodeFences', () => {
  it('removes a json-tagged fence', () => {
    expect(stripCodeFences('```json\n{"hook":"Wait"}\n```')).toBe('{"hook":"Wait"}');
  });

  it('leaves unfenced content alone', () => {
    expect(stripCodeFences('  {"a":1} ')).toBe('{"a":1}');
  });
});

describe('extractFirstJsonValue', () => {
  it('ignores prose around the object', () => {
    expect(extractFirstJsonValue('Sure! {"hook":"a {brace} inside"} Hope it helps.')).toBe(
      '{"hook":"a {brace} inside"}'
    );
  });

  it('extracts a top-level array', () => {
    expect(extractFirstJsonValue('Segments: ["one", "two"] done')).toBe('["one", "two"]');
  });

  it('skips escaped quotes inside strings', () => {
    expect(extractFirstJsonValue('{"line":"she said \\"go}\\""} tail')).toBe('{"line":"she said \\"go}\\""}');
  });
});

describe('parseAndValidate', () => {
  it('returns the validated value', () => {
    expect(parseAndValidate('```json\n{"hook":"Octopuses taste with their arms"}\n```', HookSchema)).toEqual({
      hook: 'Octopuses taste with their arms',
    });
  });

  it('reports invalid JSON', () => {
    expect(() => parseAndValidate('{"hook":', HookSchema, 'Hook')).toThrow(/^Invalid JSON from LLM for Hook/);
  });

  it('lists schema issues by path', () => {
    expect(() => parseAndValidate('{"hook":""}', HookSchema, 'Hook')).toThrow(
      'LLM response validation failed for Hook: hook: String must contain at least 1 character(s)'
    );
  });
});

import { describe, it, expect } from 'vitest';
import { parseJsonLenient, repairJson, stripToJson } from './jsonRepair.js';
import { ResponseParseError } from '../../utils/errors.js';

describe('repairJson', () => {
  it('strips trailing commas', () => {
    expect(repairJson('{"entities": [{"text": "A", "confidence": 0.9,},],}')).toBe(
      '{"entities": [{"text": "A", "confidence": 0.9}]}'
    );
  });

  it('converts single-quoted strings', () => {
    expect(repairJson("{'entities': [{'text': 'O\\'Brien', 'type': 'PERSON'}]}")).toBe(
      '{"entities": [{"text": "O\'Brien", "type": "PERSON"}]}'
    );
    expect(repairJson(`{'text': 'say "hi"'}`)).toBe('{"text": "say \\"hi\\""}');
  });

  it('keeps apostrophes inside double-quoted strings', () => {
    expect(repairJson('{"text": "the court\'s order"}')).toBe('{"text": "the court\'s order"}');
  });

  it('closes a response truncated inside a key', () => {
    const truncated =
      '{"entities": [{"type": "PERSON", "text": "Jane Roe", "confidence": 0.95}, {"type": "JUDGE", "te';

    expect(repairJson(truncated)).toBe(
      '{"entities": [{"type": "PERSON", "text": "Jane Roe", "confidence": 0.95}, {"type": "JUDGE"}]}'
    );
  });

  it('closes a response truncated inside a value string', () => {
    expect(repairJson('{"entities": [{"type": "COURT", "text": "Supreme Co')).toBe(
      '{"entities": [{"type": "COURT", "text": "Supreme Co"}]}'
    );
  });

  it('drops a key left without a value', () => {
    expect(repairJson('{"entities": [], "meta":')).toBe('{"entities": []}');
  });

  it('drops half-written numbers and literals', () => {
    expect(repairJson('{"entities": [{"text": "A", "confidence": 0.')).toBe('{"entities": [{"text": "A"}]}');
    expect(repairJson('{"a": 1, "b": tru')).toBe('{"a": 1}');
  });

  it('removes fences and surrounding prose', () => {
    expect(repairJson('Here are the entities:\n```json\n{"entities": []}\n```\nDone.')).toBe('{"entities": []}');
    expect(repairJson('Sure! {"entities": []} Hope this helps {x}')).toBe('{"entities": []}');
  });

  it('skips closers that do not match', () => {
    expect(repairJson('{"a": [1, 2]]}')).toBe('{"a": [1, 2]}');
  });

  it('escapes raw control characters inside strings', () => {
    const repaired = repairJson('{"text": "line one\nline two"}');
    expect(JSON.parse(repaired)).toEqual({ text: 'line one\nline two' });
  });

  it('leaves valid JSON unchanged', () => {
    const valid = '{"entities": [{"type": "PERSON", "text": "A", "confidence": 1}]}';
    expect(repairJson(valid)).toBe(valid);
  });
});

describe('stripToJson', () => {
  it('returns trimmed text when there is no JSON', () => {
    expect(stripToJson('  no json here ')).toBe('no json here');
  });
});

describe('parseJsonLenient', () => {
  it('reports whether repair was needed', () => {
    expect(parseJsonLenient('{"entities": []}')).toEqual({ value: { entities: [] }, repaired: false });
    expect(parseJsonLenient("{'entities': [],}")).toEqual({ value: { entities: [] }, repaired: true });
  });

  it('throws a parse error when nothing can be recovered', () => {
    expect(() => parseJsonLenient('I could not find any entities.')).toThrow(ResponseParseError);
  });
});

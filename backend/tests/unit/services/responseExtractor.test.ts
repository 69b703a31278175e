import { describe, it, expect } from 'vitest';
import { BadRequestError } from '../../../src/errors.js';
import {
  UNINTERPRETABLE_RESPONSE_MESSAGE,
  extractJsonObject,
} from '../../../src/services/responseExtractor.js';

describe('extractJsonObject', () => {
  it('parses a bare JSON object', () => {
    expect(extractJsonObject('{"ingredients": [{"name": "rice"}]}')).toEqual({
      ingredients: [{ name: 'rice' }],
    });
  });

  it('reads the inside of a json code fence', () => {
    const reply = 'Here is your list:\n```json\n{"ingredients": []}\n```\nEnjoy!';
    expect(extractJsonObject(reply)).toEqual({ ingredients: [] });
  });

  it('reads an untagged code fence', () => {
    expect(extractJsonObject('```\n{"day": 1}\n```')).toEqual({ day: 1 });
  });

  it('falls back to the outermost braces in surrounding prose', () => {
    const reply = 'Sure! {"meal_plan": [{"day": 1}]} Let me know if you need changes.';
    expect(extractJsonObject(reply)).toEqual({ meal_plan: [{ day: 1 }] });
  });

  it('rejects a reply with no object in it', () => {
    expect(() => extractJsonObject('I cannot help with that request.')).toThrow(BadRequestError);
    expect(() => extractJsonObject('I cannot help with that request.')).toThrow(UNINTERPRETABLE_RESPONSE_MESSAGE);
  });

  it('rejects a top-level array', () => {
    expect(() => extractJsonObject('[1, 2, 3]')).toThrow(UNINTERPRETABLE_RESPONSE_MESSAGE);
  });

  it('rejects braces that do not hold valid JSON', () => {
    expect(() => extractJsonObject('{ name: rice }')).toThrow(BadRequestError);
  });
});

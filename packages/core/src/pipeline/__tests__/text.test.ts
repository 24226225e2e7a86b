import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  MAX_QUESTION_LENGTH,
  countWords,
  isListingRequest,
  sanitizeQuestion,
  truncateToWords,
} from '../text.js';
import { MESSAGES, tooManyItemsMessage } from '../messages.js';

describe('sanitizeQuestion', () => {
  it('strips control characters and trims', () => {
    assert.deepEqual(sanitizeQuestion('  how many\u0000 orders?\u0007\r\n'), { ok: true, question: 'how many orders?' });
  });

  it('keeps tabs and inner newlines', () => {
    assert.deepEqual(sanitizeQuestion('orders\tby\nmonth'), { ok: true, question: 'orders\tby\nmonth' });
  });

  it('refuses blank input', () => {
    assert.deepEqual(sanitizeQuestion(' \u0001\u001f '), { ok: false, reason: 'empty', question: '' });
  });

  it('refuses overlong input', () => {
    const result = sanitizeQuestion('a'.repeat(MAX_QUESTION_LENGTH + 1));
    assert.equal(result.ok, false);
    assert.equal(!result.ok && result.reason, 'too_long');
    assert.equal(result.question.length, MAX_QUESTION_LENGTH);
  });

  it('accepts a question of exactly the maximum length', () => {
    assert.equal(sanitizeQuestion('a'.repeat(MAX_QUESTION_LENGTH)).ok, true);
  });
});

describe('countWords', () => {
  it('counts letter and digit runs in any script', () => {
    assert.equal(countWords('We sold 1,204 units.'), 5);
    assert.equal(countWords('Se vendieron 12 pedidos en León'), 6);
    assert.equal(countWords(' -- '), 0);
  });
});

describe('truncateToWords', () => {
  it('returns short text untouched', () => {
    assert.equal(truncateToWords('Three short words.', 3), 'Three short words.');
  });

  it('cuts after the last kept word and marks the cut', () => {
    assert.equal(truncateToWords('Revenue was $1,200 in May, up from April.', 4), 'Revenue was $1,200...');
  });

  it('returns nothing for a zero budget', () => {
    assert.equal(truncateToWords('anything', 0), '');
  });
});

describe('isListingRequest', () => {
  for (const question of [
    'List all customers',
    'show 10 products',
    'Give me every order from May',
    'what are all the categories?',
    'Display the suppliers',
  ]) {
    it(`treats "${question}" as a listing`, () => {
      assert.equal(isListingRequest(question), true);
    });
  }

  for (const question of [
    'How many customers are there?',
    'Show the total revenue',
    'average order value',
    'count all products',
    'Which customer spent the most?',
  ]) {
    it(`treats "${question}" as not a listing`, () => {
      assert.equal(isListingRequest(question), false);
    });
  }
});

describe('messages', () => {
  it('names the row cap in the too-many-items message', () => {
    assert.equal(
      tooManyItemsMessage(100),
      'I can only list up to 100 items at a time. Please ask for a smaller number of records.',
    );
  });

  it('keeps user-facing text free of SQL words', () => {
    for (const text of Object.values(MESSAGES)) {
      assert.doesNotMatch(text, /\b(SELECT|SQL|table|column)\b/i);
    }
  });
});

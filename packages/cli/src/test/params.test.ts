import { describe, it, expect } from 'vitest';
import { parseParam } from '../lib/params.js';

describe('parseParam', () => {
  it.each([
    ['42', { type: 'integer', value: 42n }],
    ['-7', { type: 'integer', value: -7n }],
    ['9223372036854775807', { type: 'integer', value: 9223372036854775807n }],
    ['9223372036854775808', { type: 'float', value: 9223372036854775808 }],
    ['2.5', { type: 'float', value: 2.5 }],
    ['1e3', { type: 'float', value: 1000 }],
    ['.5', { type: 'float', value: 0.5 }],
    ['null', { type: 'null' }],
    ['NULL', { type: 'text', value: 'NULL' }],
    ['12abc', { type: 'text', value: '12abc' }],
    ['', { type: 'text', value: '' }],
  ])('parses %j', (raw, expected) => {
    expect(parseParam(raw)).toEqual(expected);
  });
});

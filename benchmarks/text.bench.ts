/**
 * Benchmark: split / join / trim against native String methods
 */

import { bench, describe } from 'vitest';
import { split, join, trim } from '../packages/core/src/index';

// ===== Setup =====
const WORDS = 10000;

function createText(size: number, sep: string): string {
  return Array.from({ length: size }, (_, i) => `w${i}`).join(sep);
}

// ===== Split benchmarks =====
describe('Split 10000 words - literal delimiter', () => {
  const text = createText(WORDS, ', ');

  bench('Native', () => {
    text.split(', ');
  });

  bench('Tidbits', () => {
    split(text, ', ');
  });
});

describe('Split 10000 words - character set', () => {
  const text = createText(WORDS, ';,');

  bench('Native', () => {
    text.split(/[;,]/).filter(token => token.length > 0);
  });

  bench('Tidbits', () => {
    split(text, ';,', true);
  });
});

// ===== Join benchmarks =====
describe('Join 10000 words', () => {
  const words = split(createText(WORDS, ' '));

  bench('Native', () => {
    words.join('-');
  });

  bench('Tidbits', () => {
    join(words, '-');
  });
});

// ===== Trim benchmarks =====
describe('Trim 1000 padding characters', () => {
  const padding = ' \t\n\r'.repeat(250);
  const text = `${padding}${createText(100, ' ')}${padding}`;

  bench('Native', () => {
    text.trim();
  });

  bench('Tidbits', () => {
    trim(text);
  });
});

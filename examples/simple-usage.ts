/**
 * Simple usage - arrays.* + strings.*
 */

import { arrays, strings, split, join, trim, toUpper, type FixedArray } from '../packages/core/src/index';

console.log('=== Tidbits: Arrays ===\n');

// ===== Fixed-size arrays =====
console.log('1️⃣ Measure and reverse in place');
const digits: FixedArray<number, 4> = [1, 2, 3, 4];
console.log('length:', arrays.length(digits));
arrays.reverse(digits);
console.log('reversed:', digits);

console.log('\n2️⃣ Transform in place, then copy out');
arrays.transform(digits, n => n * n);
const copy = arrays.toVector(digits);
copy.push(0);
console.log('digits:', digits);
console.log('copy:', copy);
console.log('✅ Copy is independent');

console.log('\n=== Tidbits: Strings ===\n');

// ===== Tokenization =====
console.log('3️⃣ Split on a literal delimiter');
console.log(split('a,,b,c,', ','));
console.log('✅ Empty tokens dropped');

console.log('\n4️⃣ Split on any of a set of characters');
console.log(split('key=value;other=thing', '=;', true));

// ===== Join & trim =====
console.log('\n5️⃣ Join and trim');
const date: FixedArray<string, 3> = ['2024', '03', '15'];
console.log(join(date, '-'));
console.log(JSON.stringify(trim('\t  padded text \r\n')));
console.log(JSON.stringify(trim('   ')));

// ===== Case & reversal =====
console.log('\n6️⃣ Case conversion and reversal');
console.log(toUpper('hello, world'));
console.log(strings.reverse('stressed'));

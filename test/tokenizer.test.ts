import { describe, it, expect } from 'vitest';
import { queryTerms, termFrequencies, tokenize } from '../src/rag/tokenizer.js';

describe('tokenize', () => {
	it('should lower-case and drop one-letter words but keep numbers', () => {
		expect(tokenize('Hello, World! a 7 x2')).toEqual(['hello', 'world', '7', 'x2']);
	});

	it('should split CJK runs into overlapping bigrams', () => {
		expect(tokenize('密码重置')).toEqual(['密码', '码重', '重置']);
		expect(tokenize('カタカナ')).toEqual(['カタ', 'タカ', 'カナ']);
	});

	it('should keep a lone CJK character as a unigram', () => {
		expect(tokenize('是 ok')).toEqual(['是', 'ok']);
	});

	it('should split mixed Latin and CJK runs', () => {
		expect(tokenize('API接口 v2版本')).toEqual(['api', '接口', 'v2', '版本']);
	});

	it('should return nothing for punctuation only', () => {
		expect(tokenize(' -- !? ')).toEqual([]);
	});
});

describe('queryTerms', () => {
	it('should return distinct terms in first-seen order', () => {
		expect(queryTerms('apple Apple banana apple')).toEqual(['apple', 'banana']);
	});
});

describe('termFrequencies', () => {
	it('should count each token', () => {
		expect(termFrequencies(['a', 'b', 'a'])).toEqual(new Map([['a', 2], ['b', 1]]));
	});
});

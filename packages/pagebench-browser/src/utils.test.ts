import { describe, expect, it } from 'vitest';
import { redact, redactMessage } from './utils.js';

describe('redact', () => {
	it('should redact sensitive keys', () => {
		const input = {
			authorization: 'Basic dGVzdDp0ZXN0',
			cookie: 'a=b',
			secret: 'test-secret',
			sessionId: 'abc',
			'user-agent': 'Mozilla/5.0 Firefox/102.0',
		};
		expect(redact(input)).toEqual({
			authorization: '[REDACTED]',
			cookie: '[REDACTED]',
			secret: '[REDACTED]',
			sessionId: '[REDACTED]',
			'user-agent': 'Mozilla/5.0 Firefox/102.0',
		});
	});

	it('should recurse into nested objects and arrays', () => {
		const input = {
			headers: { authorization: 'x', accept: '*/*' },
			items: [{ token: 't' }, { id: 2 }],
		};
		expect(redact(input)).toEqual({
			headers: { authorization: '[REDACTED]', accept: '*/*' },
			items: [{ token: '[REDACTED]' }, { id: 2 }],
		});
	});

	it('should walk arrays stored under a sensitive key instead of replacing them', () => {
		expect(redact({ cookies: [{ name: 'n', password: 'p' }] })).toEqual({
			cookies: [{ name: 'n', password: '[REDACTED]' }],
		});
	});

	it('should return the same reference when nothing is sensitive', () => {
		const input = { page: 'a', time_ms: 120, nested: [{ ok: true }] };
		expect(redact(input)).toBe(input);
	});

	it('should pass primitives and null through', () => {
		expect(redact(null)).toBe(null);
		expect(redact(7)).toBe(7);
		expect(redact('text')).toBe('text');
	});
});

describe('redactMessage', () => {
	it('should redact JSON messages', () => {
		const raw = JSON.stringify({ id: 1, result: { sessionId: 's-1' } });
		expect(redactMessage(raw)).toBe('{"id":1,"result":{"sessionId":"[REDACTED]"}}');
	});

	it('should return non-JSON text unchanged', () => {
		expect(redactMessage('not json')).toBe('not json');
	});

	it('should truncate long output', () => {
		expect(redactMessage('x'.repeat(20), 5)).toBe('xxxxx...');
	});
});

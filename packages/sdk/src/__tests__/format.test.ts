import { describe, expect, it } from 'vitest';
import { formatAttributes, formatLine } from '../format.js';
import { createTestRecord } from '../testing.js';

describe('formatLine', () => {
	it('renders timestamp, level, logger and message', () => {
		const record = createTestRecord({ level: 'WARNING', loggerName: 'app.db', message: 'slow query' });
		expect(formatLine(record)).toBe('2025-01-15T10:30:00.000Z - WARNING - app.db - slow query');
	});

	it('appends sorted attributes', () => {
		const record = createTestRecord({ message: 'done', attributes: { took: '12ms', id: '7' } });
		expect(formatLine(record)).toBe('2025-01-15T10:30:00.000Z - INFO - test.logger - done id=7 took=12ms');
	});
});

describe('formatAttributes', () => {
	it('quotes values that need it', () => {
		expect(formatAttributes({ path: '/a b', empty: '', eq: 'x=y', plain: 'ok' })).toBe(
			' empty="" eq="x=y" path="/a b" plain=ok',
		);
	});

	it('is empty without attributes', () => {
		expect(formatAttributes(undefined)).toBe('');
		expect(formatAttributes({})).toBe('');
	});
});

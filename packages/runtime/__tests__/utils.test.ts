import { describe, it, expect } from '@jest/globals';
import os from 'os';
import path from 'path';
import { expandHome } from '../src/utils.js';

describe('expandHome', () => {
	it('expands a leading tilde', () => {
		expect(expandHome('~')).toBe(os.homedir());
		expect(expandHome('~/.cache/epss')).toBe(path.join(os.homedir(), '.cache/epss'));
	});

	it('leaves other paths alone', () => {
		expect(expandHome('/var/cache/epss')).toBe('/var/cache/epss');
		expect(expandHome('cache/~/epss')).toBe('cache/~/epss');
		expect(expandHome('~other/epss')).toBe('~other/epss');
	});
});

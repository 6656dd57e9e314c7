import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { VERSION } from './version.js';

describe('VERSION', () => {
  it('should be a semantic version string', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('should match the package version', () => {
    const pkg: { version: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

    expect(VERSION).toBe(pkg.version);
  });
});

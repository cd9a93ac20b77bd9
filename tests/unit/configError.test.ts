import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/index.js';
import { tempDir } from '../utils/fakes.js';

describe('config error handling', () => {
  it('throws on invalid JSON', () => {
    const file = path.join(tempDir('audit-config-'), 'bad-config.json');
    fs.writeFileSync(file, '{ invalid');
    expect(() => loadConfig(file)).toThrow(/Failed to parse config file/);
  });

  it('throws when the file is not an object', () => {
    const file = path.join(tempDir('audit-config-'), 'array.json');
    fs.writeFileSync(file, '[]');
    expect(() => loadConfig(file)).toThrow(/must contain a JSON object/);
  });

  it('rejects values outside the schema', () => {
    const file = path.join(tempDir('audit-config-'), 'range.json');
    fs.writeFileSync(file, JSON.stringify({ delivery: { maxAttempts: 0 } }));
    expect(() => loadConfig(file)).toThrow();
  });
});

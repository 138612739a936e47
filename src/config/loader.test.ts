/**
 * Tests for the configuration loader (src/config/loader.ts)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { findConfigFile, loadConfigFile, parseConfigText } from './loader.js';
import { ConfigurationError } from '../utils/errors.js';

function configurationErrorOf(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('parseConfigText', () => {
  it('should parse a full configuration', () => {
    const config = parseConfigText(`
agents:
  research:
    url: http://research.internal:9000
    timeoutMs: 60000
relay:
  timeoutMs: 120000
pipeline:
  stages: [research, content]
server:
  host: 127.0.0.1
llm:
  model: claude-test
logging:
  level: debug
  pretty: false
`);

    expect(config).toEqual({
      agents: { research: { url: 'http://research.internal:9000', timeoutMs: 60000 } },
      relay: { timeoutMs: 120000 },
      pipeline: { stages: ['research', 'content'] },
      server: { host: '127.0.0.1' },
      llm: { model: 'claude-test' },
      logging: { level: 'debug', pretty: false },
    });
  });

  it('should treat an empty document as an empty configuration', () => {
    expect(parseConfigText('')).toEqual({});
    expect(parseConfigText('# nothing here\n')).toEqual({});
  });

  it('should reject invalid YAML', () => {
    const error = configurationErrorOf(() => parseConfigText('agents: [unclosed', 'broken.yaml'));

    expect(error.message).toBe('Configuration file is not valid YAML');
    expect(error.source).toBe('broken.yaml');
  });

  it('should list every failing field', () => {
    const error = configurationErrorOf(() =>
      parseConfigText('relay:\n  timeoutMs: soon\nagents:\n  research:\n    url: not-a-url\n', 'relay.yaml')
    );

    expect(error.issues).toEqual([
      'agents.research.url: Invalid url',
      'relay.timeoutMs: Expected number, received string',
    ]);
    expect(error.message).toBe(
      'Invalid configuration in relay.yaml:\n  - agents.research.url: Invalid url\n  - relay.timeoutMs: Expected number, received string'
    );
  });

  it('should reject unknown sections', () => {
    const error = configurationErrorOf(() => parseConfigText('feeds: []\n'));

    expect(error.issues).toEqual(["(root): Unrecognized key(s) in object: 'feeds'"]);
    expect(error.message.startsWith('Invalid configuration:')).toBe(true);
  });

  it('should reject an unknown log level', () => {
    const error = configurationErrorOf(() => parseConfigText('logging:\n  level: loud\n'));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.startsWith('logging.level: ')).toBe(true);
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-relay-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('findConfigFile', () => {
    it('should find the yaml file', () => {
      fs.writeFileSync(path.join(dir, 'agent-relay.config.yaml'), 'relay: {}\n');

      expect(findConfigFile([dir])).toEqual({ path: path.join(dir, 'agent-relay.config.yaml'), exists: true });
    });

    it('should accept the .yml extension', () => {
      fs.writeFileSync(path.join(dir, 'agent-relay.config.yml'), 'relay: {}\n');

      expect(findConfigFile([dir]).path).toBe(path.join(dir, 'agent-relay.config.yml'));
    });

    it('should search paths in order', () => {
      const second = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-relay-config-'));
      try {
        fs.writeFileSync(path.join(second, 'agent-relay.config.yaml'), 'relay: {}\n');

        expect(findConfigFile([dir, second]).path).toBe(path.join(second, 'agent-relay.config.yaml'));
      } finally {
        fs.rmSync(second, { recursive: true, force: true });
      }
    });

    it('should report a missing file', () => {
      expect(findConfigFile([dir])).toEqual({ path: '', exists: false });
    });
  });

  describe('loadConfigFile', () => {
    it('should load an explicit path', () => {
      const filePath = path.join(dir, 'custom.yaml');
      fs.writeFileSync(filePath, 'server:\n  host: 127.0.0.1\n');

      expect(loadConfigFile(filePath)).toEqual({ config: { server: { host: '127.0.0.1' } }, source: filePath });
    });

    it('should fail for a missing explicit path', () => {
      const filePath = path.join(dir, 'missing.yaml');

      const error = configurationErrorOf(() => loadConfigFile(filePath));

      expect(error.message).toBe(`Configuration file not found: ${filePath}`);
    });

    it('should return an empty configuration when nothing is found', () => {
      expect(loadConfigFile(undefined, [dir])).toEqual({ config: {} });
    });

    it('should name the file in validation errors', () => {
      const filePath = path.join(dir, 'agent-relay.config.yaml');
      fs.writeFileSync(filePath, 'relay:\n  timeoutMs: -5\n');

      const error = configurationErrorOf(() => loadConfigFile(undefined, [dir]));

      expect(error.source).toBe(filePath);
      expect(error.message.startsWith(`Invalid configuration in ${filePath}:`)).toBe(true);
    });
  });
});

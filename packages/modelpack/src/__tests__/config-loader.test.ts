import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  findConfiguredSource,
  loadSourceConfig,
  parseSourceConfig,
} from '../sources/config-loader.js';
import { ParseError } from '../errors.js';

describe('parseSourceConfig', () => {
  it('should parse JSON content', () => {
    const config = parseSourceConfig(
      JSON.stringify({
        sources: [{ name: 'corp', type: 'mirror', endpoint: 'https://models.corp.example/' }],
        defaultSource: 'corp',
      }),
      'model-sources.json',
      'user',
    );

    expect(config.level).toBe('user');
    expect(config.defaultSource).toBe('corp');
    expect(config.sources).toHaveLength(1);
    expect(config.sources[0].type).toBe('mirror');
    expect(config.sources[0].endpoint).toBe('https://models.corp.example/');
  });

  it('should parse YAML content', () => {
    const yaml = [
      'defaultSource: hf-pinned',
      'sources:',
      '  - name: hf-pinned',
      '    type: huggingface',
      '    revision: abc123',
    ].join('\n');

    const config = parseSourceConfig(yaml, 'model-sources.yaml', 'project');

    expect(config.defaultSource).toBe('hf-pinned');
    expect(config.sources[0]).toEqual({
      name: 'hf-pinned',
      type: 'huggingface',
      endpoint: undefined,
      url: undefined,
      repo: undefined,
      revision: 'abc123',
    });
  });

  it('should treat an empty file as empty config', () => {
    const config = parseSourceConfig('', 'model-sources.yml', 'user');
    expect(config.sources).toEqual([]);
    expect(config.defaultSource).toBeNull();
  });

  it('should reject syntax errors', () => {
    expect(() => parseSourceConfig('{"sources": [', 'model-sources.json', 'user')).toThrow(
      /^Failed to parse model-sources\.json/,
    );
  });

  it('should collect entry problems', () => {
    const content = JSON.stringify({ sources: [{ type: 'mirror' }, 'oops', { name: 'x', type: 'ftp' }] });

    try {
      parseSourceConfig(content, 'cfg', 'user');
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.problems).toEqual([
          "Required field 'sources[0].name' is missing",
          "'sources[1]' must be an object",
          "Invalid source type 'ftp' at 'sources[2].type'. Must be one of: huggingface, direct, mirror",
        ]);
      }
    }
  });

  it('should reject a non-array sources field', () => {
    expect(() => parseSourceConfig('{"sources": {}}', 'cfg', 'user')).toThrow(
      "Invalid cfg: Field 'sources' must be an array",
    );
  });
});

describe('loadSourceConfig', () => {
  let tmpDir: string;
  let userDir: string;
  let projectDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'modelpack-config-test-'));
    userDir = path.join(tmpDir, 'user');
    projectDir = path.join(tmpDir, 'project');
    fs.mkdirSync(userDir);
    fs.mkdirSync(projectDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return empty config when no files exist', async () => {
    const config = await loadSourceConfig({ userDir, projectDir });
    expect(config.sources.size).toBe(0);
    expect(config.defaultSource).toBeNull();
    expect(config.loadedFiles).toEqual([]);
  });

  it('should tolerate a missing directory', async () => {
    const config = await loadSourceConfig({ userDir: path.join(tmpDir, 'absent'), projectDir });
    expect(config.loadedFiles).toEqual([]);
  });

  it('should merge user then project with project winning', async () => {
    fs.writeFileSync(
      path.join(userDir, 'model-sources.json'),
      JSON.stringify({
        sources: [
          { name: 'Corp', type: 'mirror', endpoint: 'https://user.example' },
          { name: 'personal', type: 'direct', url: 'https://files.example/model.onnx' },
        ],
        defaultSource: 'personal',
      }),
    );
    fs.writeFileSync(
      path.join(projectDir, 'model-sources.yaml'),
      'sources:\n  - name: corp\n    type: mirror\n    endpoint: https://project.example\n',
    );

    const config = await loadSourceConfig({ userDir, projectDir });

    expect(config.loadedFiles).toEqual([
      path.join(userDir, 'model-sources.json'),
      path.join(projectDir, 'model-sources.yaml'),
    ]);
    expect(findConfiguredSource(config, 'CORP')?.endpoint).toBe('https://project.example');
    expect(findConfiguredSource(config, 'personal')?.type).toBe('direct');
    expect(config.userDefault).toBe('personal');
    expect(config.projectDefault).toBeNull();
    expect(config.defaultSource).toBe('personal');
  });

  it('should prefer the project default', async () => {
    fs.writeFileSync(path.join(userDir, 'model-sources.yml'), 'defaultSource: from-user\n');
    fs.writeFileSync(path.join(projectDir, 'model-sources.json'), '{"defaultSource": "from-project"}');

    const config = await loadSourceConfig({ userDir, projectDir });

    expect(config.defaultSource).toBe('from-project');
    expect(config.projectDefault).toBe('from-project');
    expect(config.userDefault).toBe('from-user');
  });

  it('should prefer .json over .yaml in one directory', async () => {
    fs.writeFileSync(path.join(projectDir, 'model-sources.json'), '{"defaultSource": "json"}');
    fs.writeFileSync(path.join(projectDir, 'model-sources.yaml'), 'defaultSource: yaml\n');

    const config = await loadSourceConfig({ userDir, projectDir });

    expect(config.projectDefault).toBe('json');
    expect(config.loadedFiles).toEqual([path.join(projectDir, 'model-sources.json')]);
  });

  it('should load a shared directory once', async () => {
    fs.writeFileSync(path.join(userDir, 'model-sources.json'), '{"defaultSource": "shared"}');

    const config = await loadSourceConfig({ userDir, projectDir: userDir });

    expect(config.loadedFiles).toHaveLength(1);
    expect(config.userDefault).toBe('shared');
  });

  it('should surface malformed files', async () => {
    fs.writeFileSync(path.join(projectDir, 'model-sources.json'), '42');
    await expect(loadSourceConfig({ userDir, projectDir })).rejects.toThrow(
      'Config file must contain an object',
    );
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { pino } from 'pino';
import type { FetchLike } from 'modelpack';
import { runPrefetch } from '../commands/prefetch.js';
import { runVerify } from '../commands/verify.js';
import { runInfo } from '../commands/info.js';
import { runClearCache } from '../commands/clear-cache.js';
import type { CliContext } from '../utils/context.js';
import type { Output } from '../utils/output.js';

const HF_BASE = 'https://huggingface.co/test-org/tiny-model/resolve/main';
const MODEL = 'onnx-model-bytes';
const TOKENIZER = '{"vocab":{}}';

function sha256(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

function manifestDocument(modelContent = MODEL): string {
  return JSON.stringify({
    model: {
      id: 'test-org/tiny-model',
      revision: 'main',
      files: [
        { path: 'onnx/model.onnx', sha256: sha256(modelContent), size: Buffer.byteLength(modelContent) },
        { path: 'tokenizer.json', sha256: sha256(TOKENIZER), size: Buffer.byteLength(TOKENIZER) },
      ],
    },
    sources: { hf: { type: 'huggingface' } },
    defaultSource: 'hf',
  });
}

interface CapturedOutput extends Output {
  results: string[];
  messages: string[];
}

function captureOutput(): CapturedOutput {
  const results: string[] = [];
  const messages: string[] = [];
  return {
    results,
    messages,
    result: (line) => results.push(line),
    message: (line) => messages.push(line),
  };
}

describe('CLI commands', () => {
  const savedEnv = { ...process.env };
  let tmpDir: string;
  let cacheDir: string;
  let manifestPath: string;
  let output: CapturedOutput;
  let calls: string[];
  let ctx: CliContext;

  function cached(fileName: string): string {
    return path.join(cacheDir, 'test-org', 'tiny-model', 'main', fileName);
  }

  function contextWith(fetch: FetchLike, signal?: AbortSignal): CliContext {
    return {
      output,
      logger: pino({ level: 'silent' }),
      fetch,
      signal,
      config: {
        userConfigDir: path.join(tmpDir, 'user'),
        projectConfigDir: path.join(tmpDir, 'project'),
        retryBaseDelayMs: 1,
      },
    };
  }

  beforeEach(() => {
    for (const key of ['MODELPACK_SOURCE', 'MODELPACK_CACHE_DIR', 'HF_TOKEN']) {
      delete process.env[key];
    }
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'modelpack-cli-test-'));
    cacheDir = path.join(tmpDir, 'cache');
    manifestPath = path.join(tmpDir, 'model.manifest.json');
    fs.writeFileSync(manifestPath, manifestDocument());
    output = captureOutput();
    calls = [];

    const bodies = new Map([
      [`${HF_BASE}/onnx/model.onnx`, MODEL],
      [`${HF_BASE}/tokenizer.json`, TOKENIZER],
    ]);
    ctx = contextWith(async (url) => {
      calls.push(url);
      const body = bodies.get(url);
      return body === undefined ? new Response('missing', { status: 404 }) : new Response(body);
    });
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('prefetch', () => {
    it('should print every local path, primary first', async () => {
      const code = await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);

      expect(code).toBe(0);
      expect(output.results).toEqual([cached('model.onnx'), cached('tokenizer.json')]);
      expect(calls).toHaveLength(2);
      expect(fs.readFileSync(cached('model.onnx'), 'utf-8')).toBe(MODEL);
    });

    it('should reuse the cache on a second run', async () => {
      await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);
      const code = await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);

      expect(code).toBe(0);
      expect(calls).toHaveLength(2);
    });

    it('should download again with --force', async () => {
      await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);
      await runPrefetch({ manifest: manifestPath, cacheDir, force: true, concurrency: 2 }, ctx);

      expect(calls).toHaveLength(4);
    });

    it('should exit 1 when the manifest file is missing', async () => {
      const missing = path.join(tmpDir, 'absent.json');

      const code = await runPrefetch({ manifest: missing, cacheDir }, ctx);

      expect(code).toBe(1);
      expect(output.messages.some((m) => m.includes(`Manifest file not found: ${missing}`))).toBe(true);
      expect(output.results).toEqual([]);
    });

    it('should exit 6 for a malformed manifest', async () => {
      fs.writeFileSync(manifestPath, '{"model": {}}');
      expect(await runPrefetch({ manifest: manifestPath, cacheDir }, ctx)).toBe(6);
    });

    it('should exit 6 for an unknown source', async () => {
      expect(await runPrefetch({ manifest: manifestPath, cacheDir, source: 'nowhere' }, ctx)).toBe(6);
      expect(calls).toHaveLength(0);
    });

    it('should exit 2 when the remote file is missing', async () => {
      const code = await runPrefetch(
        { manifest: manifestPath, cacheDir, source: 'https://example.com/gone.onnx' },
        ctx,
      );
      expect(code).toBe(2);
    });

    it('should exit 3 when the download fails verification', async () => {
      fs.writeFileSync(manifestPath, manifestDocument('onnx-model-BYTES'));

      const code = await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);

      expect(code).toBe(3);
      expect(fs.existsSync(cached('model.onnx'))).toBe(false);
    });

    it('should exit 130 when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const cancelled = contextWith(async () => new Response(MODEL), controller.signal);

      expect(await runPrefetch({ manifest: manifestPath, cacheDir }, cancelled)).toBe(130);
    });
  });

  describe('verify', () => {
    it('should print verified paths', async () => {
      await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);
      const verifyOutput = captureOutput();

      const code = await runVerify({ manifest: manifestPath, cacheDir }, { ...ctx, output: verifyOutput });

      expect(code).toBe(0);
      expect(verifyOutput.results).toEqual([cached('model.onnx'), cached('tokenizer.json')]);
    });

    it('should exit 3 when nothing is cached', async () => {
      expect(await runVerify({ manifest: manifestPath, cacheDir }, ctx)).toBe(3);
      expect(calls).toHaveLength(0);
    });

    it('should exit 3 and delete a corrupted file', async () => {
      await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);
      fs.writeFileSync(cached('tokenizer.json'), '{"vocab":[]}');

      expect(await runVerify({ manifest: manifestPath, cacheDir }, ctx)).toBe(3);
      expect(fs.existsSync(cached('tokenizer.json'))).toBe(false);
    });
  });

  describe('info', () => {
    it('should describe each file without downloading', async () => {
      const code = await runInfo({ manifest: manifestPath, cacheDir }, ctx);

      expect(code).toBe(0);
      expect(output.results.slice(0, 4)).toEqual([
        'test-org/tiny-model@main onnx/model.onnx',
        '  source:   hf (manifest)',
        `  url:      ${HF_BASE}/onnx/model.onnx`,
        `  path:     ${cached('model.onnx')}`,
      ]);
      expect(output.results).toHaveLength(12);
      expect(calls).toHaveLength(0);
      expect(fs.existsSync(cacheDir)).toBe(false);
    });

    it('should print JSON with --json', async () => {
      await runInfo({ manifest: manifestPath, cacheDir, source: 'hf', json: true }, ctx);

      const parsed: unknown = JSON.parse(output.results.join('\n'));
      expect(parsed).toMatchObject([
        { filePath: 'onnx/model.onnx', resolutionLevel: 'options-name', expectedBytes: 16 },
        { filePath: 'tokenizer.json', localPath: cached('tokenizer.json') },
      ]);
    });
  });

  describe('clear-cache', () => {
    it('should print removed paths', async () => {
      await runPrefetch({ manifest: manifestPath, cacheDir }, ctx);
      const clearOutput = captureOutput();

      expect(await runClearCache({ manifest: manifestPath, cacheDir }, { ...ctx, output: clearOutput })).toBe(0);
      expect(clearOutput.results).toEqual([cached('model.onnx'), cached('tokenizer.json')]);

      const again = captureOutput();
      expect(await runClearCache({ manifest: manifestPath, cacheDir }, { ...ctx, output: again })).toBe(0);
      expect(again.results).toEqual([]);
    });
  });
});

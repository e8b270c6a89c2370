import * as crypto from 'node:crypto';
import { pino } from 'pino';
import type { Logger } from 'pino';
import { isRecord } from '../validate.js';

export interface CapturingLogger {
  logger: Logger;
  lines: string[];
  entries(): Array<Record<string, unknown>>;
  messages(): string[];
}

/** A real pino logger whose output is kept in memory */
export function createCapturingLogger(level = 'debug'): CapturingLogger {
  const lines: string[] = [];
  const logger = pino(
    { level },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  const entries = (): Array<Record<string, unknown>> =>
    lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      return isRecord(parsed) ? parsed : {};
    });
  return {
    logger,
    lines,
    entries,
    messages: () => entries().map((e) => String(e['msg'])),
  };
}

export const silentLogger: Logger = pino({ level: 'silent' });

export function sha256(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export interface TestFile {
  path: string;
  content: string;
}

/** Manifest document for test files served from a Hugging Face style source */
export function makeManifestDocument(
  files: TestFile[],
  extra: { sources?: Record<string, unknown>; defaultSource?: string; id?: string } = {},
): Record<string, unknown> {
  return {
    model: {
      id: extra.id ?? 'test-org/tiny-model',
      revision: 'main',
      files: files.map((f) => ({
        path: f.path,
        sha256: sha256(f.content),
        size: Buffer.byteLength(f.content),
      })),
    },
    sources: extra.sources ?? {
      hf: { type: 'huggingface' },
      backup: { type: 'mirror', endpoint: 'https://backup.example.com/models' },
    },
    defaultSource: extra.defaultSource ?? 'hf',
  };
}

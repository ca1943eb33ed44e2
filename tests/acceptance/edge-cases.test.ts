import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DatasetPipeline } from '../../src/DatasetPipeline.js';
import type { DatasetPipelineConfig } from '../../src/DatasetPipeline.js';
import { StructuralValidator } from '../../src/domain/services/StructuralValidator.js';
import { SchemaValidator } from '../../src/infrastructure/validators/SchemaValidator.js';
import {
  ConfigError,
  EmptyResultError,
  MissingInputError,
  OutputCollisionError,
  ParseError,
  PipelineCancelledError,
  SchemaLoadError,
  UnsupportedFormatError,
} from '../../src/domain/errors/DatasetErrors.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';

// --- Helpers ---

const VALID = '{"messages":[{"role":"user","content":"q"},{"role":"assistant","content":"a"}]}';
const NO_MESSAGES = '{"prompt":"q"}';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'chatset-gate-edge-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeInput(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

function structuralPipeline(
  trainContent: string,
  evalContent: string,
  overrides?: Partial<DatasetPipelineConfig>,
): DatasetPipeline {
  return new DatasetPipeline({
    train: { path: writeInput('train.jsonl', trainContent) },
    eval: { path: writeInput('eval.jsonl', evalContent) },
    validator: new StructuralValidator(),
    ...overrides,
  });
}

// ============================================================
// Malformed JSON
// ============================================================
describe('Edge case: malformed line', () => {
  it('should fail with the file name and physical line number', async () => {
    const pipeline = structuralPipeline(`${VALID}\n\n{"messages": [\n${VALID}\n`, `${VALID}\n`);

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ fileName: 'train.jsonl', lineNumber: 3, code: 'PARSE_ERROR' });
    expect(pipeline.getStatus()).toBe('FAILED');
  });

  it('should not write any output for the failed split or the ones after it', async () => {
    const pipeline = structuralPipeline(`${VALID}\nnot json\n`, `${VALID}\n`);

    await expect(pipeline.run()).rejects.toBeInstanceOf(ParseError);

    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
    expect(existsSync(join(dir, 'train.valid.jsonl.partial'))).toBe(false);
    expect(existsSync(join(dir, 'eval.valid.jsonl'))).toBe(false);
  });

  it('should report the failure through events', async () => {
    const events: DomainEvent[] = [];
    const pipeline = structuralPipeline(`${VALID}\n`, `{\n`).onAny((e) => events.push(e));

    await expect(pipeline.run()).rejects.toBeInstanceOf(ParseError);

    expect(events.slice(-2)).toMatchObject([
      { type: 'split:failed', split: 'eval', code: 'PARSE_ERROR' },
      { type: 'pipeline:failed', code: 'PARSE_ERROR' },
    ]);
  });
});

// ============================================================
// Empty results
// ============================================================
describe('Edge case: no acceptable records', () => {
  it('should be fatal under structural validation', async () => {
    const pipeline = structuralPipeline(`${NO_MESSAGES}\n${NO_MESSAGES}\n`, `${VALID}\n`);

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmptyResultError);
    expect(error).toMatchObject({ split: 'train', fileName: 'train.jsonl', rejectedCount: 2 });
    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
  });

  it('should be fatal for an empty file under structural validation', async () => {
    const pipeline = structuralPipeline(`${VALID}\n`, '\n\n');

    await expect(pipeline.run()).rejects.toBeInstanceOf(EmptyResultError);
  });

  it('should warn and write an empty output under schema validation', async () => {
    const events: DomainEvent[] = [];
    const pipeline = new DatasetPipeline({
      train: { path: writeInput('train.jsonl', '') },
      eval: { path: writeInput('eval.jsonl', '{"a":1}\n') },
      validator: new SchemaValidator({ type: 'object', required: ['a'] }),
    }).on('split:empty', (e) => events.push(e));

    const result = await pipeline.run();

    expect(events).toMatchObject([{ type: 'split:empty', split: 'train', rejectedCount: 0 }]);
    expect(readFileSync(result.outputs.train, 'utf-8')).toBe('');
    expect(readFileSync(result.outputs.eval, 'utf-8')).toBe('{"a":1}\n');
  });

  it('should follow an explicit empty-result override', async () => {
    const pipeline = structuralPipeline(`${NO_MESSAGES}\n`, `${VALID}\n`, { emptyResult: 'warn' });

    const result = await pipeline.run();

    expect(result.splits.train.acceptedCount).toBe(0);
    expect(readFileSync(result.outputs.train, 'utf-8')).toBe('');
  });
});

// ============================================================
// Inputs
// ============================================================
describe('Edge case: inputs', () => {
  it('should fail before reading anything when an input is missing', async () => {
    const pipeline = new DatasetPipeline({
      train: { path: writeInput('train.jsonl', `${VALID}\n`) },
      eval: { path: join(dir, 'absent.jsonl') },
      validator: new StructuralValidator(),
    });

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({ filePath: join(dir, 'absent.jsonl'), code: 'MISSING_INPUT' });
    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
  });

  it('should reject a directory as input', async () => {
    const pipeline = new DatasetPipeline({
      train: { path: dir },
      eval: { path: writeInput('eval.jsonl', `${VALID}\n`) },
      validator: new StructuralValidator(),
    });

    await expect(pipeline.run()).rejects.toThrow(`Input ${dir}: not a regular file`);
  });

  it('should warn about an unrecognized extension and still process it', async () => {
    const events: DomainEvent[] = [];
    const pipeline = new DatasetPipeline({
      train: { path: writeInput('train.txt', `${VALID}\n`) },
      eval: { path: writeInput('eval.ndjson', `${VALID}\n`) },
      validator: new StructuralValidator(),
    }).on('input:unrecognized-format', (e) => events.push(e));

    const result = await pipeline.run();

    expect(events).toMatchObject([{ split: 'train', mimeType: 'text/plain' }]);
    expect(result.outputs).toEqual({
      train: join(dir, 'train.valid.txt'),
      eval: join(dir, 'eval.valid.ndjson'),
    });
  });

  it('should refuse an unrecognized extension in strict format mode', async () => {
    const pipeline = new DatasetPipeline({
      train: { path: writeInput('train.jsonl', `${VALID}\n`) },
      eval: { path: writeInput('eval.csv', `${VALID}\n`) },
      validator: new StructuralValidator(),
      strictFormat: true,
    });

    await expect(pipeline.run()).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
  });

  it('should fail on bytes that are not valid UTF-8 and write nothing', async () => {
    const trainPath = join(dir, 'train.jsonl');
    writeFileSync(
      trainPath,
      Buffer.concat([
        Buffer.from(`${VALID}\n{"messages":[{"role":"user","content":"`, 'utf-8'),
        Buffer.from([0xff, 0xfe]),
        Buffer.from('"},{"role":"assistant","content":"a"}]}\n', 'utf-8'),
      ]),
    );
    const pipeline = new DatasetPipeline({
      train: { path: trainPath },
      eval: { path: writeInput('eval.jsonl', `${VALID}\n`) },
      validator: new StructuralValidator(),
    });

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ fileName: 'train.jsonl', lineNumber: 2, detail: 'invalid UTF-8' });
    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
    expect(existsSync(join(dir, 'eval.valid.jsonl'))).toBe(false);
  });

  it('should report an input removed after the preflight check as missing', async () => {
    const pipeline = structuralPipeline(`${VALID}\n`, `${VALID}\n`).on('split:started', (e) => {
      rmSync(e.inputPath);
    });

    const error = await pipeline.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingInputError);
    expect(error).toMatchObject({ filePath: join(dir, 'train.jsonl'), code: 'MISSING_INPUT' });
    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
  });

  it('should accept CRLF line endings and a byte order mark', async () => {
    const pipeline = structuralPipeline(`\uFEFF${VALID}\r\n${NO_MESSAGES}\r\n${VALID}`, `${VALID}\r\n`);

    const result = await pipeline.run();

    expect(result.splits.train.acceptedCount).toBe(2);
    expect(result.splits.train.diagnostics).toEqual([{ lineNumber: 2, reason: "missing required field 'messages'" }]);
  });
});

// ============================================================
// Outputs
// ============================================================
describe('Edge case: outputs', () => {
  it('should refuse two splits writing to the same file', async () => {
    const target = join(dir, 'all.jsonl');
    const pipeline = new DatasetPipeline({
      train: { path: writeInput('train.jsonl', `${VALID}\n`), output: target },
      eval: { path: writeInput('eval.jsonl', `${VALID}\n`), output: target },
      validator: new StructuralValidator(),
    });

    await expect(pipeline.run()).rejects.toBeInstanceOf(OutputCollisionError);
  });

  it('should refuse to overwrite an input', async () => {
    const evalPath = writeInput('eval.jsonl', `${VALID}\n`);
    const pipeline = new DatasetPipeline({
      train: { path: writeInput('train.jsonl', `${VALID}\n`), output: evalPath },
      eval: { path: evalPath },
      validator: new StructuralValidator(),
    });

    await expect(pipeline.run()).rejects.toBeInstanceOf(OutputCollisionError);
    expect(readFileSync(evalPath, 'utf-8')).toBe(`${VALID}\n`);
  });
});

// ============================================================
// Lifecycle
// ============================================================
describe('Edge case: lifecycle', () => {
  it('should stop with CANCELLED when aborted mid-split', async () => {
    const controller = new AbortController();
    const pipeline = structuralPipeline(`${NO_MESSAGES}\n${VALID}\n${VALID}\n`, `${VALID}\n`).on(
      'record:rejected',
      () => controller.abort(),
    );

    await expect(pipeline.run({ signal: controller.signal })).rejects.toBeInstanceOf(PipelineCancelledError);

    expect(pipeline.getStatus()).toBe('CANCELLED');
    expect(existsSync(join(dir, 'train.valid.jsonl'))).toBe(false);
  });

  it('should not run twice', async () => {
    const pipeline = structuralPipeline(`${VALID}\n`, `${VALID}\n`);
    await pipeline.run();

    await expect(pipeline.run()).rejects.toThrow('Invalid state transition: COMPLETED → RUNNING');
  });

  it('should keep running when an event handler throws', async () => {
    const pipeline = structuralPipeline(`${VALID}\n`, `${VALID}\n`).on('split:validated', () => {
      throw new Error('subscriber failure');
    });

    const result = await pipeline.run();

    expect(result.splits.eval.acceptedCount).toBe(1);
  });

  it('should reject a non-positive cap at construction', () => {
    expect(
      () =>
        new DatasetPipeline({
          train: { path: 'train.jsonl', maxRecords: 0 },
          eval: { path: 'eval.jsonl' },
          validator: new StructuralValidator(),
        }),
    ).toThrow(ConfigError);
  });

  it('should fail fromConfig when the schema file is missing', async () => {
    await expect(
      DatasetPipeline.fromConfig({
        train: { path: 'train.jsonl' },
        eval: { path: 'eval.jsonl' },
        validation: { strategy: 'schema', schemaPath: join(dir, 'missing.json') },
      }),
    ).rejects.toBeInstanceOf(SchemaLoadError);
  });
});

import { basename, dirname, extname, join } from 'node:path';

/** How filtered copies are named. Passed explicitly; never inferred from the working directory. */
export interface OutputNaming {
  /** Inserted before the extension: `train.jsonl` → `train.<suffix>.jsonl`. */
  readonly suffix: string;
  /** Directory for outputs. Default: the input's own directory. */
  readonly directory?: string;
}

export const DEFAULT_OUTPUT_NAMING: OutputNaming = { suffix: 'valid' };

/**
 * Derive the output path for a split input.
 *
 * `data/train.jsonl` → `data/train.valid.jsonl`. Inputs without an extension
 * get `.jsonl`, so `data/train` → `data/train.valid.jsonl`.
 */
export function deriveOutputPath(inputPath: string, naming: OutputNaming = DEFAULT_OUTPUT_NAMING): string {
  const ext = extname(inputPath);
  const stem = basename(inputPath, ext);
  const directory = naming.directory ?? dirname(inputPath);
  return join(directory, `${stem}.${naming.suffix}${ext === '' ? '.jsonl' : ext}`);
}

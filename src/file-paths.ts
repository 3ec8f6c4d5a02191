import { access } from 'fs/promises';
import * as path from 'path';
import { DataFileError } from './errors.js';

export interface ResolvedPaths {
  inputFile: string;
  outputFile: string;
}

/**
 * `<dir>/<stem>_processed<ext>` beside the input file.
 */
export function defaultOutputPath(inputFile: string): string {
  const { dir, name, ext } = path.parse(inputFile);
  return path.join(dir, `${name}_processed${ext}`);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Fills in the paths the configuration leaves empty. The input path is
 * asked for with `askInputPath`; the output path is derived from it.
 */
export async function resolveFilePaths(
  configured: { input_file: string; output_file: string },
  askInputPath: () => Promise<string>,
): Promise<ResolvedPaths> {
  let inputFile = configured.input_file.trim();
  const outputFile = configured.output_file.trim();

  if (!inputFile) {
    inputFile = (await askInputPath()).trim();
    if (!(await exists(inputFile))) {
      throw new DataFileError(
        `Input file '${inputFile}' does not exist.`,
        inputFile,
      );
    }
  }

  return {
    inputFile,
    outputFile: outputFile || defaultOutputPath(inputFile),
  };
}

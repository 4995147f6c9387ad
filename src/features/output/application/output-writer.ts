import fs from "node:fs";
import path from "node:path";

import { OutputError } from "../../../shared/errors/app-errors";
import type { OutputStream } from "../../../shared/cli-io";
import type { GenerationResult } from "../../../shared/types";

export interface WriteLetterOptions {
  outputPath?: string;
  cwd: string;
  stdout: OutputStream;
}

export function writeLetterFile(outPathRaw: string, cwd: string, letter: GenerationResult): string {
  const outPath = path.resolve(cwd, outPathRaw);
  try {
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, letter, "utf8");
  } catch (err) {
    throw new OutputError(`Cannot write ${outPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return outPath;
}

function writeToStream(stream: OutputStream, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const fail = (error: Error): void => {
      reject(new OutputError(`Cannot write to stdout: ${error.message}`));
    };
    stream.once?.("error", fail);
    stream.write(chunk, (error) => {
      stream.off?.("error", fail);
      if (error) {
        fail(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * Prints the letter, or writes it to `outputPath` and returns the absolute
 * path written. Stream errors such as EPIPE arrive through the write
 * callback and become OutputError.
 */
export async function writeLetter(letter: GenerationResult, options: WriteLetterOptions): Promise<string | undefined> {
  if (options.outputPath) {
    return writeLetterFile(options.outputPath, options.cwd, letter);
  }
  const trailer = options.stdout.isTTY && !letter.endsWith("\n") ? "\n" : "";
  await writeToStream(options.stdout, `${letter}${trailer}`);
  return undefined;
}

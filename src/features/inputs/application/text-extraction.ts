import fs from "node:fs";
import path from "node:path";

import "pdfjs-dist/legacy/build/pdf.worker.mjs";
import { getDocument, VerbosityLevel } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PDFDocumentProxy, TextItem, TextMarkedContent } from "pdfjs-dist/types/src/display/api";

import { InputError } from "../../../shared/errors/app-errors";
import { normalizeWhitespace } from "../../../shared/system";
import type { TextSourceKind } from "../../../shared/types";

const Y_BUCKET_SIZE = 2;

/** File access used while resolving inputs. */
export interface SourceReader {
  isFile(filePath: string): boolean;
  readText(filePath: string): Promise<string>;
  readPdf(filePath: string): Promise<string>;
}

export function detectSourceType(filePath: string): TextSourceKind {
  return path.extname(filePath).toLowerCase() === ".pdf" ? "pdf" : "text";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readBytes(filePath: string): Buffer {
  try {
    return fs.readFileSync(filePath);
  } catch (err) {
    throw new InputError(`Cannot read ${filePath}: ${describe(err)}`);
  }
}

export function decodeUtf8(bytes: Uint8Array, filePath: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new InputError(`${filePath} is not valid UTF-8 text.`);
  }
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return "str" in item;
}

function buildTextFromItems(items: TextItem[]): string {
  const lines = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!item.str.trim()) {
      continue;
    }
    const y = Math.round((item.transform[5] ?? 0) / Y_BUCKET_SIZE);
    const x = item.transform[4] ?? 0;
    const fragments = lines.get(y) ?? [];
    fragments.push({ x, str: item.str });
    lines.set(y, fragments);
  }

  return Array.from(lines.entries())
    .sort((a, b) => b[0] - a[0])
    .map(([, fragments]) =>
      fragments
        .sort((a, b) => a.x - b.x)
        .map((fragment) => fragment.str)
        .join(" "),
    )
    .join("\n");
}

/**
 * Text of every page, in page order, one `\n` between pages.
 */
export async function extractTextFromPdfBytes(bytes: Uint8Array, label: string): Promise<string> {
  let pdf: PDFDocumentProxy;
  try {
    pdf = await getDocument({
      data: new Uint8Array(bytes),
      verbosity: VerbosityLevel.ERRORS,
      isEvalSupported: false,
    }).promise;
  } catch (err) {
    throw new InputError(`Cannot parse PDF ${label}: ${describe(err)}`);
  }

  try {
    if (pdf.numPages === 0) {
      throw new InputError(`PDF ${label} has no pages.`);
    }
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push(buildTextFromItems(content.items.filter(isTextItem)));
    }
    const text = normalizeWhitespace(pages.join("\n"));
    if (!text) {
      throw new InputError(`No text could be extracted from PDF ${label}.`);
    }
    return text;
  } catch (err) {
    if (err instanceof InputError) {
      throw err;
    }
    throw new InputError(`Cannot parse PDF ${label}: ${describe(err)}`);
  } finally {
    await pdf.destroy();
  }
}

export const fileSourceReader: SourceReader = {
  isFile(filePath) {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  },
  async readText(filePath) {
    return decodeUtf8(readBytes(filePath), filePath);
  },
  async readPdf(filePath) {
    return extractTextFromPdfBytes(readBytes(filePath), filePath);
  },
};

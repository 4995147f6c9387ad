import path from "node:path";

import {
  DEFAULT_JOB_DESCRIPTION,
  DEFAULT_RESUME_PDF,
  DEFAULT_RESUME_TEXT,
  EXIT_USAGE,
  KNOWLEDGE_BASE_FILE,
} from "../../../shared/constants";
import { CliError } from "../../../shared/errors/cli-error";
import { ConfigurationError, InputError } from "../../../shared/errors/app-errors";
import type { InputOrigin, ResolvedInputs } from "../../../shared/types";
import { detectSourceType, fileSourceReader } from "./text-extraction";
import type { SourceReader } from "./text-extraction";

export interface ResolveInputsOptions {
  cwd: string;
  useKnowledgeBase?: boolean;
  reader?: SourceReader;
}

interface LoadedText {
  text: string;
  origin: InputOrigin;
}

async function readFile(reader: SourceReader, filePath: string, allowPdf: boolean): Promise<LoadedText> {
  const sourceKind = detectSourceType(filePath);
  if (sourceKind === "pdf" && !allowPdf) {
    throw new InputError(`PDF is not supported for job descriptions: ${filePath}`);
  }
  const text = sourceKind === "pdf" ? await reader.readPdf(filePath) : await reader.readText(filePath);
  return { text, origin: { kind: "file", path: filePath, sourceKind } };
}

async function readFileOrLiteral(
  reader: SourceReader,
  cwd: string,
  value: string,
  allowPdf: boolean,
): Promise<LoadedText> {
  const candidate = path.resolve(cwd, value);
  if (reader.isFile(candidate)) {
    return readFile(reader, candidate, allowPdf);
  }
  return { text: value, origin: { kind: "literal" } };
}

async function readDefaultResume(reader: SourceReader, cwd: string): Promise<LoadedText> {
  for (const name of [DEFAULT_RESUME_PDF, DEFAULT_RESUME_TEXT]) {
    const candidate = path.join(cwd, name);
    if (reader.isFile(candidate)) {
      return readFile(reader, candidate, true);
    }
  }
  throw new ConfigurationError(
    `No resume given and no default resume found (${DEFAULT_RESUME_PDF} or ${DEFAULT_RESUME_TEXT} in ${cwd}).`,
  );
}

async function readDefaultJobDescription(reader: SourceReader, cwd: string): Promise<LoadedText> {
  const candidate = path.join(cwd, DEFAULT_JOB_DESCRIPTION);
  if (!reader.isFile(candidate)) {
    throw new ConfigurationError(
      `No job description given and default file ${DEFAULT_JOB_DESCRIPTION} not found in ${cwd}.`,
    );
  }
  return readFile(reader, candidate, false);
}

async function readKnowledgeBase(reader: SourceReader, cwd: string): Promise<LoadedText> {
  const candidate = path.join(cwd, KNOWLEDGE_BASE_FILE);
  if (!reader.isFile(candidate)) {
    throw new ConfigurationError(`Knowledge base file not found: ${candidate}`);
  }
  return readFile(reader, candidate, false);
}

function requireText(loaded: LoadedText, label: string): LoadedText {
  if (!loaded.text.trim()) {
    const where = loaded.origin.kind === "file" ? ` (${loaded.origin.path})` : "";
    throw new InputError(`The ${label} is empty${where}.`);
  }
  return loaded;
}

/**
 * Maps zero, one or two positional arguments to resume and job-description
 * text. A single argument is always the job description.
 */
export async function resolveInputs(positionals: string[], options: ResolveInputsOptions): Promise<ResolvedInputs> {
  const reader = options.reader ?? fileSourceReader;
  const { cwd } = options;
  if (positionals.length > 2) {
    throw new CliError(`Expected at most two arguments, got ${positionals.length}.`, EXIT_USAGE);
  }

  const [first, second] = positionals;
  let resumeArg: string | undefined;
  let jobArg: string | undefined;
  if (second !== undefined) {
    resumeArg = first;
    jobArg = second;
  } else {
    jobArg = first;
  }

  let resume: LoadedText;
  if (options.useKnowledgeBase) {
    resume = await readKnowledgeBase(reader, cwd);
  } else if (resumeArg !== undefined) {
    resume = await readFileOrLiteral(reader, cwd, resumeArg, true);
  } else {
    resume = await readDefaultResume(reader, cwd);
  }

  const jobDescription =
    jobArg !== undefined
      ? await readFileOrLiteral(reader, cwd, jobArg, false)
      : await readDefaultJobDescription(reader, cwd);

  const checkedResume = requireText(resume, "resume");
  const checkedJob = requireText(jobDescription, "job description");
  return {
    resume: checkedResume.text,
    jobDescription: checkedJob.text,
    resumeOrigin: checkedResume.origin,
    jobDescriptionOrigin: checkedJob.origin,
  };
}

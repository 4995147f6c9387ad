import { assertMaxArgs, assertNoUnknownOptions, splitAtTerminator, takeFlag, takeOption } from "../../../../shared/cli-args";
import { makeLogger, redactSecret, writeStderr, writeStdout } from "../../../../shared/cli-io";
import type { CliStreams } from "../../../../shared/cli-io";
import {
  DEFAULT_JOB_DESCRIPTION,
  DEFAULT_RESUME_PDF,
  DEFAULT_RESUME_TEXT,
  KNOWLEDGE_BASE_FILE,
} from "../../../../shared/constants";
import type { AppConfig, InputOrigin, TextCompleter } from "../../../../shared/types";
import { createOpenAiCompleter } from "../../../../infrastructure/openai/chat-completions";
import type { OpenAiCompleterOptions } from "../../../../infrastructure/openai/chat-completions";
import { resolveInputs } from "../../../inputs/application/input-resolver";
import type { SourceReader } from "../../../inputs/application/text-extraction";
import { buildGenerationRequest } from "../../../letter/application/prompt";
import { generateCoverLetter } from "../../../letter/application/letter-generator";
import { writeLetter } from "../../../output/application/output-writer";

export interface GenerateCommandDeps {
  cwd: string;
  config: AppConfig;
  streams: CliStreams;
  reader?: SourceReader;
  createCompleter?: (options: OpenAiCompleterOptions) => TextCompleter;
}

export const USAGE = [
  "Usage: cover-letter [resume] [job_description] [options]",
  "",
  "Arguments (file paths or literal text):",
  `  resume            resume text, or a .pdf/.txt file (default: ${DEFAULT_RESUME_PDF}, then ${DEFAULT_RESUME_TEXT})`,
  `  job_description   job description text or file (default: ${DEFAULT_JOB_DESCRIPTION})`,
  "  With a single argument, it is taken as the job description.",
  "",
  "Options:",
  "  -o, --output PATH          write the letter to PATH instead of stdout",
  "  -m, --model NAME           OpenAI model (default: $OPENAI_MODEL or gpt-4o)",
  `      --kb, --use-knowledge-base  read the resume from ${KNOWLEDGE_BASE_FILE}`,
  "      --dry-run              print the request that would be sent and exit",
  "      --verbose              log progress to stderr",
  "  -h, --help                 show this help",
  "  --                         treat every later argument as text, even if it starts with a dash",
  "",
  "Environment: OPENAI_API_KEY (required), OPENAI_BASE_URL, OPENAI_MODEL,",
  "CONTACT_EMAIL, CONTACT_PHONE, CONTACT_LINKEDIN, CONTACT_WEBSITE. A .env file is read if present.",
].join("\n");

function describeOrigin(origin: InputOrigin): string {
  return origin.kind === "file" ? `${origin.sourceKind} file ${origin.path}` : "command-line text";
}

export async function cmdGenerate(rawArgs: string[], deps: GenerateCommandDeps): Promise<void> {
  const { options: args, rest } = splitAtTerminator(rawArgs);
  const { config, streams, cwd } = deps;

  if (takeFlag(args, ["--help", "-h"])) {
    writeStdout(USAGE, streams);
    return;
  }
  const outputPath = takeOption(args, ["--output", "-o"]);
  const model = takeOption(args, ["--model", "-m"]) ?? config.defaultModel;
  const useKnowledgeBase = takeFlag(args, ["--kb", "--use-knowledge-base"]);
  const dryRun = takeFlag(args, "--dry-run");
  const verbose = takeFlag(args, "--verbose");
  assertNoUnknownOptions(args);
  const positionals = [...args, ...rest];
  assertMaxArgs(positionals, 2, "cover-letter");

  const log = makeLogger(streams, verbose);

  const inputs = await resolveInputs(positionals, { cwd, useKnowledgeBase, reader: deps.reader });
  log(`resume: ${describeOrigin(inputs.resumeOrigin)} (${inputs.resume.length} chars)`);
  log(`job description: ${describeOrigin(inputs.jobDescriptionOrigin)} (${inputs.jobDescription.length} chars)`);

  const request = buildGenerationRequest({
    resume: inputs.resume,
    jobDescription: inputs.jobDescription,
    contact: config.contact,
    model,
  });

  if (dryRun) {
    const preview = {
      endpoint: `${config.apiBaseUrl}/chat/completions`,
      model: request.model,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      messages: request.messages,
    };
    writeStdout(JSON.stringify(preview, null, 2), streams);
    return;
  }

  const apiKey = config.apiKey ?? "";
  if (apiKey) {
    log(`requesting ${model} at ${config.apiBaseUrl} with key ${redactSecret(apiKey)}`);
  }
  const createCompleter = deps.createCompleter ?? createOpenAiCompleter;
  const letter = await generateCoverLetter(request, {
    apiKey,
    completer: createCompleter({ apiKey, apiBaseUrl: config.apiBaseUrl }),
  });
  log(`received ${letter.length} chars`);

  const written = await writeLetter(letter, { outputPath, cwd, stdout: streams.stdout });
  if (written) {
    writeStderr(`Cover letter saved to ${written}`, streams);
  }
}

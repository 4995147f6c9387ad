import { EXIT_OK, EXIT_UNEXPECTED } from "./shared/constants";
import { CliError } from "./shared/errors/cli-error";
import { writeStderr } from "./shared/cli-io";
import { cmdGenerate } from "./features/generate/interface/cli/generate.command";
import type { GenerateCommandDeps } from "./features/generate/interface/cli/generate.command";

/** Runs one invocation and maps the outcome to a process exit code. */
export async function runCli(argv: string[], deps: GenerateCommandDeps): Promise<number> {
  try {
    await cmdGenerate(argv, deps);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CliError) {
      writeStderr(`Error: ${err.message}`, deps.streams);
      return err.exitCode;
    }
    writeStderr(`Error: ${err instanceof Error ? err.message : String(err)}`, deps.streams);
    return EXIT_UNEXPECTED;
  }
}

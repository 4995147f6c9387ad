import { runCli } from "./cli";
import { processStreams } from "./shared/cli-io";
import { loadAppConfig, loadDotEnv } from "./infrastructure/config/env-config";

async function main(): Promise<void> {
  const cwd = process.cwd();
  loadDotEnv(cwd);
  const exitCode = await runCli(process.argv.slice(2), {
    cwd,
    config: loadAppConfig(process.env),
    streams: processStreams(),
  });
  process.exitCode = exitCode;
}

void main();

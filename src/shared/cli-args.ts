import { EXIT_USAGE } from "./constants";
import { CliError } from "./errors/cli-error";

function toNames(option: string | readonly string[]): readonly string[] {
  return typeof option === "string" ? [option] : option;
}

function findOption(args: string[], names: readonly string[]): number {
  return args.findIndex((token) => names.includes(token));
}

export function takeOption(args: string[], option: string | readonly string[]): string | undefined {
  const names = toNames(option);
  const idx = findOption(args, names);
  if (idx < 0) {
    return undefined;
  }
  const value = args[idx + 1];
  if (!value || value.startsWith("-")) {
    throw new CliError(`\`${args[idx]}\` requires a value.`, EXIT_USAGE);
  }
  args.splice(idx, 2);
  if (findOption(args, names) >= 0) {
    throw new CliError(`\`${names[0]}\` may only be given once.`, EXIT_USAGE);
  }
  return value;
}

export function takeFlag(args: string[], flag: string | readonly string[]): boolean {
  const names = toNames(flag);
  let found = false;
  let idx = findOption(args, names);
  while (idx >= 0) {
    args.splice(idx, 1);
    found = true;
    idx = findOption(args, names);
  }
  return found;
}

/**
 * Splits at the first bare `--`. Tokens after it are positional even when
 * they look like options.
 */
export function splitAtTerminator(args: string[]): { options: string[]; rest: string[] } {
  const idx = args.indexOf("--");
  if (idx < 0) {
    return { options: [...args], rest: [] };
  }
  return { options: args.slice(0, idx), rest: args.slice(idx + 1) };
}

export function assertNoUnknownOptions(args: string[]): void {
  const unknown = args.find((token) => /^--[A-Za-z][\w-]*$/.test(token) || /^-[A-Za-z]$/.test(token));
  if (unknown) {
    throw new CliError(`Unknown option: ${unknown}`, EXIT_USAGE);
  }
}

export function assertMaxArgs(args: string[], max: number, context: string): void {
  if (args.length > max) {
    throw new CliError(`Unexpected arguments for ${context}: ${args.slice(max).join(" ")}`, EXIT_USAGE);
  }
}

export interface OutputStream {
  write(chunk: string, callback?: (error?: Error | null) => void): unknown;
  once?(event: "error", listener: (error: Error) => void): unknown;
  off?(event: "error", listener: (error: Error) => void): unknown;
  isTTY?: boolean;
}

export interface CliStreams {
  stdout: OutputStream;
  stderr: OutputStream;
}

export function processStreams(): CliStreams {
  return { stdout: process.stdout, stderr: process.stderr };
}

export function writeStdout(line: string, streams: CliStreams = processStreams()): void {
  streams.stdout.write(`${line}\n`);
}

export function writeStderr(line: string, streams: CliStreams = processStreams()): void {
  streams.stderr.write(`${line}\n`);
}

export function redactSecret(value: string): string {
  if (value.length <= 8) {
    return "***";
  }
  return `${value.slice(0, 3)}...${value.slice(-4)}`;
}

export function makeLogger(streams: CliStreams, verbose: boolean): (line: string) => void {
  return (line) => {
    if (verbose) {
      writeStderr(line, streams);
    }
  };
}

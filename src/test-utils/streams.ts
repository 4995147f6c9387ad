import type { CliStreams, OutputStream } from "../shared/cli-io";

export interface CapturedStream extends OutputStream {
  text(): string;
}

export function captureStream(isTTY = false, failWith?: Error): CapturedStream {
  const chunks: string[] = [];
  return {
    isTTY,
    write(chunk: string, callback?: (error?: Error | null) => void) {
      if (failWith) {
        queueMicrotask(() => callback?.(failWith));
        return false;
      }
      chunks.push(chunk);
      queueMicrotask(() => callback?.(null));
      return true;
    },
    text() {
      return chunks.join("");
    },
  };
}

export function captureStreams(): CliStreams & { stdout: CapturedStream; stderr: CapturedStream } {
  return { stdout: captureStream(), stderr: captureStream() };
}

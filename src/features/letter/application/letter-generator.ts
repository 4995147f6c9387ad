import { AuthenticationError, RemoteServiceError } from "../../../shared/errors/app-errors";
import type { GenerationRequest, GenerationResult, TextCompleter } from "../../../shared/types";

export interface LetterGeneratorDeps {
  apiKey?: string;
  completer: TextCompleter;
}

export async function generateCoverLetter(
  request: GenerationRequest,
  deps: LetterGeneratorDeps,
): Promise<GenerationResult> {
  if (!deps.apiKey?.trim()) {
    throw new AuthenticationError("OPENAI_API_KEY is not set. Add it to your environment or a .env file.");
  }
  const letter = (await deps.completer(request)).trim();
  if (!letter) {
    throw new RemoteServiceError("OpenAI returned an empty cover letter.");
  }
  return letter;
}
